import { describe, expect, it } from 'vitest'
import { DecodeError } from '../shared/lib/errors'
import { decodeScoreStore, readScoreStoreVersion } from '../shared/lib/score-store'
import { ByteWriter, SCORE_STORE_VERSION, buildScoreStore, chartHex } from './helpers/fixtures'

function decodeErrorKind(bytes: Uint8Array): string | undefined {
  try {
    decodeScoreStore(bytes)
  } catch (error) {
    if (error instanceof DecodeError) return error.kind
    throw error
  }
  return undefined
}

const twoInstrumentStore = buildScoreStore([
  {
    id: chartHex(0x01),
    playCount: 7,
    scores: [
      {
        instrumentId: 0,
        difficultyId: 3,
        completionNumerator: 120,
        completionDenominator: 150,
        stars: 5,
        score: 123456,
      },
      {
        instrumentId: 4,
        difficultyId: 2,
        completionNumerator: 10,
        completionDenominator: 20,
        stars: 3,
        score: 5000,
        opaque: 0xdeadbeef,
      },
    ],
  },
  { id: chartHex(0x02), playCount: 1, scores: [{ instrumentId: 1, difficultyId: 0, score: 900 }] },
])

describe('decodeScoreStore', () => {
  it('decodes every instrument block with its chart play count', () => {
    expect(decodeScoreStore(twoInstrumentStore)).toEqual([
      {
        chartId: chartHex(0x01),
        instrumentId: 0,
        difficultyId: 3,
        completionNumerator: 120,
        completionDenominator: 150,
        stars: 5,
        score: 123456,
        playCount: 7,
      },
      {
        chartId: chartHex(0x01),
        instrumentId: 4,
        difficultyId: 2,
        completionNumerator: 10,
        completionDenominator: 20,
        stars: 3,
        score: 5000,
        playCount: 7,
      },
      {
        chartId: chartHex(0x02),
        instrumentId: 1,
        difficultyId: 0,
        completionNumerator: 0,
        completionDenominator: 0,
        stars: 0,
        score: 900,
        playCount: 1,
      },
    ])
  })

  it('is a pure function of its input', () => {
    expect(decodeScoreStore(twoInstrumentStore)).toEqual(decodeScoreStore(twoInstrumentStore))
  })

  it('preserves unknown instrument ids', () => {
    const bytes = buildScoreStore([{ id: chartHex(0x03), scores: [{ instrumentId: 99, score: 1 }] }])
    expect(decodeScoreStore(bytes)[0].instrumentId).toBe(99)
  })

  it('reads the full 24-bit play count', () => {
    const bytes = buildScoreStore([{ id: chartHex(0x03), playCount: 0x123456, scores: [{ score: 1 }] }])
    expect(decodeScoreStore(bytes)[0].playCount).toBe(1193046)
  })

  it('does not validate the opaque field', () => {
    const bytes = buildScoreStore([
      { id: chartHex(0x04), scores: [{ score: 10, opaque: 0 }, { score: 20, difficultyId: 2, opaque: 0xffffffff }] },
    ])
    expect(decodeScoreStore(bytes).map((r) => r.score)).toEqual([10, 20])
  })

  it('returns an empty list for a store with no charts', () => {
    expect(decodeScoreStore(buildScoreStore([]))).toEqual([])
  })

  it('keeps charts that list no instruments out of the output', () => {
    const bytes = buildScoreStore([
      { id: chartHex(0x05), scores: [] },
      { id: chartHex(0x06), scores: [{ score: 42 }] },
    ])
    expect(decodeScoreStore(bytes).map((r) => r.chartId)).toEqual([chartHex(0x06)])
  })

  it('throws truncated-data when the last byte is missing', () => {
    const truncated = twoInstrumentStore.subarray(0, twoInstrumentStore.length - 1)
    expect(decodeErrorKind(truncated)).toBe('truncated-data')
  })

  it('throws truncated-data when cut inside an instrument block', () => {
    const bytes = buildScoreStore([{ id: chartHex(0x0a), scores: [{ score: 1 }, { score: 2, difficultyId: 2 }] }])
    // header (8) + chart header (20) + 10 bytes of the first block
    const truncated = bytes.subarray(0, 38)
    expect(decodeErrorKind(truncated)).toBe('truncated-data')
  })

  it('throws truncated-data when the chart count cannot fit', () => {
    const bytes = new ByteWriter().u32(SCORE_STORE_VERSION).u32(1000).toBytes()
    expect(decodeErrorKind(bytes)).toBe('truncated-data')
  })

  it('throws truncated-data for a buffer shorter than the header', () => {
    expect(decodeErrorKind(Uint8Array.from([1, 2, 3]))).toBe('truncated-data')
  })

  it('rejects a zero header', () => {
    const bytes = buildScoreStore([{ id: chartHex(0x07), scores: [{ score: 1 }] }], 0)
    expect(decodeErrorKind(bytes)).toBe('invalid-header')
  })

  it('rejects difficulties outside Easy..Expert', () => {
    const bytes = buildScoreStore([{ id: chartHex(0x08), scores: [{ score: 1, difficultyId: 4 }] }])
    expect(decodeErrorKind(bytes)).toBe('invalid-value')
  })

  it('ignores trailing bytes after the last chart', () => {
    const bytes = new ByteWriter().raw(buildScoreStore([{ id: chartHex(0x09), scores: [{ score: 5 }] }])).u32(0).toBytes()
    expect(decodeScoreStore(bytes)).toHaveLength(1)
  })
})

describe('readScoreStoreVersion', () => {
  it('returns the header value', () => {
    expect(readScoreStoreVersion(twoInstrumentStore)).toBe(SCORE_STORE_VERSION)
  })
})
