import type { ChartId } from '../types/score'
import type {
  SkippedSongRecord,
  SongCacheDecodeResult,
  SongMetadata,
  TitleResolution,
} from '../types/song'
import { BinaryCursor, decodeUtf8 } from './binary-cursor'
import { CHART_ID_BYTES, chartIdFromBytes, isBlankChartId } from './chart-id'
import { DecodeError, isDecodeError } from './errors'
import { deriveTitleFromPath } from './song-path'

export const CATEGORY_TABLES = [
  'title',
  'artist',
  'album',
  'genre',
  'year',
  'charter',
  'playlist',
] as const

export type CategoryTable = (typeof CATEGORY_TABLES)[number]

export type CategoryTables = Record<CategoryTable, Array<string | undefined>>
export type CategoryIndices = Record<CategoryTable, number>

const CHECKSUM_BYTES = 16
const FOLDER_ID_BYTES = 16
const INTENSITY_BYTES = 8
const TIMESTAMP_BYTES = 8

interface RawSongRecord {
  offset: number
  filepath: Uint8Array
  filename: Uint8Array
  indices: CategoryIndices
  lengthMs: number
  chartId: Uint8Array
}

// Object literal properties evaluate left to right, so reads happen in table order
function perCategory<T>(read: (name: CategoryTable) => T): Record<CategoryTable, T> {
  return {
    title: read('title'),
    artist: read('artist'),
    album: read('album'),
    genre: read('genre'),
    year: read('year'),
    charter: read('charter'),
    playlist: read('playlist'),
  }
}

function readCategoryTables(cursor: BinaryCursor): { tables: CategoryTables; invalid: number } {
  let invalid = 0

  const tables = perCategory((name) => {
    cursor.readU8() // marker
    const count = cursor.readU32()
    // A length-prefixed string is at least one byte
    if (count > cursor.remaining()) {
      throw new DecodeError(
        'truncated-data',
        `Category table '${name}' declares ${count} entries but only ${cursor.remaining()} bytes remain`,
        { offset: cursor.position - 4 },
      )
    }

    const entries: Array<string | undefined> = []
    for (let i = 0; i < count; i += 1) {
      const start = cursor.position
      const raw = cursor.readLengthPrefixed()
      try {
        entries.push(decodeUtf8(raw, start))
      } catch (error) {
        if (!isDecodeError(error, 'malformed-string')) throw error
        entries.push(undefined)
        invalid += 1
      }
    }
    return entries
  })

  return { tables, invalid }
}

function readRawSongRecord(cursor: BinaryCursor): RawSongRecord {
  const offset = cursor.position
  const filepath = cursor.readLengthPrefixed()
  cursor.readFixedBytes(FOLDER_ID_BYTES)
  const filename = cursor.readLengthPrefixed()
  cursor.readU8() // delimiter

  const indices = perCategory(() => cursor.readU32())

  const lengthMs = cursor.readU32()
  cursor.readU32() // preview start
  cursor.readFixedBytes(INTENSITY_BYTES)
  cursor.readFixedBytes(TIMESTAMP_BYTES)
  const chartId = cursor.readFixedBytes(CHART_ID_BYTES)

  return { offset, filepath, filename, indices, lengthMs, chartId }
}

function lookup(tables: CategoryTables, indices: CategoryIndices, name: CategoryTable): string | undefined {
  const value = tables[name][indices[name]]
  return value?.trim() || undefined
}

/**
 * The per-song category indices drift out of step with the tables, so the
 * filepath is the primary title source and the index only a fallback.
 */
export function resolveTitle(
  filepath: string,
  tables: CategoryTables,
  indices: CategoryIndices,
): TitleResolution {
  const fromPath = deriveTitleFromPath(filepath)
  if (fromPath) {
    return { kind: 'resolved', ...fromPath, via: 'filepath' }
  }

  const title = lookup(tables, indices, 'title')
  if (title) {
    return { kind: 'resolved', title, artist: lookup(tables, indices, 'artist'), via: 'index' }
  }

  return { kind: 'unresolved' }
}

function toMetadata(raw: RawSongRecord, tables: CategoryTables): SongMetadata {
  if (isBlankChartId(raw.chartId)) {
    throw new DecodeError('invalid-value', 'Song record has no chart id', { offset: raw.offset })
  }

  const directory = decodeUtf8(raw.filepath, raw.offset)
  const filename = decodeUtf8(raw.filename, raw.offset)
  const filepath = joinSongPath(directory, filename)
  const resolution = resolveTitle(filepath, tables, raw.indices)

  return {
    chartId: chartIdFromBytes(raw.chartId),
    title: resolution.kind === 'resolved' ? resolution.title : undefined,
    artist: resolution.kind === 'resolved' ? resolution.artist : undefined,
    charter: lookup(tables, raw.indices, 'charter'),
    album: lookup(tables, raw.indices, 'album'),
    genre: lookup(tables, raw.indices, 'genre'),
    year: lookup(tables, raw.indices, 'year'),
    lengthMs: raw.lengthMs > 0 ? raw.lengthMs : undefined,
    filepath,
    resolution,
  }
}

/** Appends the chart filename unless the stored path already ends with it */
export function joinSongPath(directory: string, filename: string): string {
  if (!filename) return directory
  if (!directory) return filename
  const normalizedDir = directory.replace(/[\\/]+$/, '')
  const lastSegment = normalizedDir.split(/[\\/]/).pop()
  if (lastSegment === filename) return normalizedDir
  const separator = directory.includes('\\') && !directory.includes('/') ? '\\' : '/'
  return `${normalizedDir}${separator}${filename}`
}

/**
 * Decode songcache.bin into metadata keyed by chart id. Records with bad text
 * or no chart id are skipped and reported; structural damage still throws.
 */
export function decodeSongCache(bytes: Uint8Array): SongCacheDecodeResult {
  const cursor = new BinaryCursor(bytes)
  const version = cursor.readU32()
  cursor.readFixedBytes(CHECKSUM_BYTES)

  const { tables, invalid } = readCategoryTables(cursor)

  const songCount = cursor.readU32()
  const songs = new Map<ChartId, SongMetadata>()
  const skipped: SkippedSongRecord[] = []

  for (let index = 0; index < songCount; index += 1) {
    const raw = readRawSongRecord(cursor)
    try {
      const metadata = toMetadata(raw, tables)
      songs.set(metadata.chartId, metadata)
    } catch (error) {
      if (!isDecodeError(error) || error.kind === 'truncated-data') throw error
      skipped.push({ index, reason: error.message })
    }
  }

  return { version, songs, skipped, invalidTableEntries: invalid }
}
