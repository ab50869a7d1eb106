import { CATEGORY_TABLES, type CategoryTable } from '../../shared/lib/song-cache'
import type { ScoreRecord } from '../../shared/types/score'

export class ByteWriter {
  #bytes: number[] = []

  u8(value: number): this {
    this.#bytes.push(value & 0xff)
    return this
  }

  u16(value: number): this {
    return this.u8(value).u8(value >>> 8)
  }

  u24(value: number): this {
    return this.u16(value).u8(value >>> 16)
  }

  u32(value: number): this {
    return this.u16(value).u16(value >>> 16)
  }

  raw(bytes: ArrayLike<number>): this {
    for (let i = 0; i < bytes.length; i += 1) this.u8(bytes[i])
    return this
  }

  /** 7-bit encoded length prefix followed by the bytes */
  prefixed(bytes: ArrayLike<number>): this {
    if (bytes.length < 0x80) {
      this.u8(bytes.length)
    } else {
      this.u8((bytes.length & 0x7f) | 0x80).u8(bytes.length >>> 7)
    }
    return this.raw(bytes)
  }

  string(text: string): this {
    return this.prefixed(new TextEncoder().encode(text))
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.#bytes)
  }
}

/** 32-char chart id whose 16 bytes all equal `fill` */
export function chartHex(fill: number): string {
  return fill.toString(16).padStart(2, '0').repeat(16)
}

export function hexToBytes(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2)
  for (let i = 0; i < bytes.length; i += 1) {
    bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16)
  }
  return bytes
}

export interface ScoreFixture {
  instrumentId?: number
  difficultyId?: number
  completionNumerator?: number
  completionDenominator?: number
  stars?: number
  score: number
  opaque?: number
}

export interface ChartFixture {
  id: string
  playCount?: number
  scores: ScoreFixture[]
}

export const SCORE_STORE_VERSION = 20211003

export function buildScoreStore(charts: ChartFixture[], version: number = SCORE_STORE_VERSION): Uint8Array {
  const writer = new ByteWriter().u32(version).u32(charts.length)
  for (const chart of charts) {
    writer.raw(hexToBytes(chart.id)).u8(chart.scores.length).u24(chart.playCount ?? 1)
    for (const score of chart.scores) {
      writer
        .u16(score.instrumentId ?? 0)
        .u8(score.difficultyId ?? 3)
        .u16(score.completionNumerator ?? 0)
        .u16(score.completionDenominator ?? 0)
        .u8(score.stars ?? 0)
        .u32(score.opaque ?? 1)
        .u32(score.score)
    }
  }
  return writer.toBytes()
}

export function record(overrides: Partial<ScoreRecord> & Pick<ScoreRecord, 'score'>): ScoreRecord {
  return {
    chartId: chartHex(0xaa),
    instrumentId: 0,
    difficultyId: 3,
    completionNumerator: 0,
    completionDenominator: 0,
    stars: 0,
    playCount: 1,
    ...overrides,
  }
}

export interface SongFixture {
  filepath: string | Uint8Array
  filename?: string | Uint8Array
  chartId: string
  indices?: Partial<Record<CategoryTable, number>>
  lengthMs?: number
}

export interface SongCacheFixture {
  version?: number
  tables?: Partial<Record<CategoryTable, Array<string | Uint8Array>>>
  songs: SongFixture[]
}

function writeText(writer: ByteWriter, value: string | Uint8Array): void {
  if (typeof value === 'string') writer.string(value)
  else writer.prefixed(value)
}

export function buildSongCache(fixture: SongCacheFixture): Uint8Array {
  const writer = new ByteWriter().u32(fixture.version ?? 1).raw(new Uint8Array(16))

  CATEGORY_TABLES.forEach((name, marker) => {
    const entries = fixture.tables?.[name] ?? []
    writer.u8(marker).u32(entries.length)
    for (const entry of entries) writeText(writer, entry)
  })

  writer.u32(fixture.songs.length)
  for (const song of fixture.songs) {
    writeText(writer, song.filepath)
    writer.raw(new Uint8Array(16).fill(0x11))
    writeText(writer, song.filename ?? '')
    writer.u8(0)
    for (const name of CATEGORY_TABLES) {
      writer.u32(song.indices?.[name] ?? 0)
    }
    writer
      .u32(song.lengthMs ?? 0)
      .u32(0)
      .raw(new Uint8Array(8))
      .raw(new Uint8Array(8))
      .raw(hexToBytes(song.chartId))
  }

  return writer.toBytes()
}

/** Bytes that are not valid UTF-8 */
export const INVALID_UTF8 = Uint8Array.from([0x66, 0xff, 0xfe, 0x6f])
