import type { SongMetadata, SongMetadataOverrides } from '../types/song'
import { splitPath } from './song-path'

type OverrideField = keyof SongMetadataOverrides

const TEXT_FIELDS = ['title', 'artist', 'charter', 'album', 'genre', 'year'] as const

// First non-empty alias wins
const FIELD_ALIASES: Array<[OverrideField, string[]]> = [
  ['artist', ['artist', 'frets']],
  ['title', ['name', 'title', 'song']],
  ['album', ['album']],
  ['genre', ['genre']],
  ['year', ['year']],
  ['charter', ['charter', 'frets', 'modchart']],
  ['lengthMs', ['song_length']],
]

function readSongSection(text: string): Map<string, string> | undefined {
  const values = new Map<string, string>()
  let inSong = false
  let found = false

  for (const rawLine of text.replace(/^\uFEFF/, '').split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line || line.startsWith(';') || line.startsWith('#')) continue

    const section = line.match(/^\[(.+)\]$/)
    if (section) {
      inSong = section[1].trim().toLowerCase() === 'song'
      found = found || inSong
      continue
    }
    if (!inSong) continue

    const eq = line.indexOf('=')
    if (eq <= 0) continue
    const key = line.slice(0, eq).trim().toLowerCase()
    const value = line.slice(eq + 1).trim()
    if (value && !values.has(key)) values.set(key, value)
  }

  return found ? values : undefined
}

/** Metadata from a song folder's song.ini; undefined when it carries none */
export function parseSongIni(text: string): SongMetadataOverrides | undefined {
  const section = readSongSection(text)
  if (!section) return undefined

  const overrides: SongMetadataOverrides = {}
  for (const [field, aliases] of FIELD_ALIASES) {
    const alias = aliases.find((name) => section.has(name))
    const value = alias ? section.get(alias) : undefined
    if (!value) continue

    if (field === 'lengthMs') {
      const length = Number.parseInt(value, 10)
      if (Number.isFinite(length) && length > 0) overrides.lengthMs = length
    } else {
      overrides[field] = value
    }
  }

  return Object.keys(overrides).length > 0 ? overrides : undefined
}

export function applyMetadataOverrides(
  base: SongMetadata,
  overrides: SongMetadataOverrides | undefined,
): SongMetadata {
  if (!overrides) return base
  const merged: SongMetadata = { ...base }
  for (const field of TEXT_FIELDS) {
    const value = overrides[field]
    if (value) merged[field] = value
  }
  if (overrides.lengthMs !== undefined) merged.lengthMs = overrides.lengthMs
  return merged
}

/**
 * song.ini sits beside a loose chart file or inside a song folder. .sng
 * archives embed their metadata and have none.
 */
export function songIniPathFor(filepath: string): string | undefined {
  const segments = splitPath(filepath)
  const last = segments[segments.length - 1]
  if (!last) return undefined

  const lower = last.toLowerCase()
  if (lower.endsWith('.sng')) return undefined
  if (lower === 'song.ini') return filepath

  const isChartFile = lower.endsWith('.chart') || lower.endsWith('.mid')
  const separator = filepath.includes('\\') && !filepath.includes('/') ? '\\' : '/'
  const trimmed = filepath.replace(/[\\/]+$/, '')
  if (isChartFile) {
    const cut = Math.max(trimmed.lastIndexOf('/'), trimmed.lastIndexOf('\\'))
    return cut === -1 ? 'song.ini' : `${trimmed.slice(0, cut)}${separator}song.ini`
  }
  return `${trimmed}${separator}song.ini`
}
