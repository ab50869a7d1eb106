import type { ScoreRecord } from '../types/score'
import { BinaryCursor } from './binary-cursor'
import { CHART_ID_BYTES, chartIdFromBytes } from './chart-id'
import { DecodeError } from './errors'
import { MAX_DIFFICULTY_ID } from './instruments'

// chart id + instrument count + play count
const CHART_HEADER_BYTES = CHART_ID_BYTES + 1 + 3
const INSTRUMENT_BLOCK_BYTES = 16
const OPAQUE_FIELD_BYTES = 4

export function readScoreStoreVersion(bytes: Uint8Array): number {
  return readHeader(new BinaryCursor(bytes))
}

function readHeader(cursor: BinaryCursor): number {
  const version = cursor.readU32()
  if (version === 0) {
    throw new DecodeError('invalid-header', 'Score store header is zero', { offset: 0 })
  }
  return version
}

/**
 * Decode scoredata.bin into one record per (chart, instrument, difficulty).
 * Throws on any structural problem; never returns a partial list.
 */
export function decodeScoreStore(bytes: Uint8Array): ScoreRecord[] {
  const cursor = new BinaryCursor(bytes)
  readHeader(cursor)

  const chartCount = cursor.readU32()
  const minimum = chartCount * CHART_HEADER_BYTES
  if (minimum > cursor.remaining()) {
    throw new DecodeError(
      'truncated-data',
      `Chart count ${chartCount} needs at least ${minimum} bytes but only ${cursor.remaining()} remain`,
      { offset: cursor.position - 4 },
    )
  }

  const records: ScoreRecord[] = []
  for (let chart = 0; chart < chartCount; chart += 1) {
    const chartId = chartIdFromBytes(cursor.readFixedBytes(CHART_ID_BYTES))
    const instrumentCount = cursor.readU8()
    const playCount = cursor.readU24()

    const blockBytes = instrumentCount * INSTRUMENT_BLOCK_BYTES
    if (blockBytes > cursor.remaining()) {
      throw new DecodeError(
        'truncated-data',
        `Chart ${chartId} declares ${instrumentCount} instrument(s) but only ${cursor.remaining()} bytes remain`,
        { offset: cursor.position },
      )
    }

    for (let i = 0; i < instrumentCount; i += 1) {
      records.push(readInstrumentBlock(cursor, chartId, playCount))
    }
  }

  return records
}

function readInstrumentBlock(cursor: BinaryCursor, chartId: string, playCount: number): ScoreRecord {
  const start = cursor.position
  const instrumentId = cursor.readU16()
  const difficultyId = cursor.readU8()
  const completionNumerator = cursor.readU16()
  const completionDenominator = cursor.readU16()
  const stars = cursor.readU8()
  cursor.readFixedBytes(OPAQUE_FIELD_BYTES)
  const score = cursor.readU32()

  if (difficultyId > MAX_DIFFICULTY_ID) {
    throw new DecodeError(
      'invalid-value',
      `Chart ${chartId} has difficulty ${difficultyId}, expected 0-${MAX_DIFFICULTY_ID}`,
      { offset: start + 2 },
    )
  }

  return {
    chartId,
    instrumentId,
    difficultyId,
    completionNumerator,
    completionDenominator,
    stars,
    score,
    playCount,
  }
}
