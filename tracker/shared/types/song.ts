import type { ChartId } from './score'

export type TitleSource = 'filepath' | 'index'

export type TitleResolution =
  | { kind: 'resolved'; title: string; artist?: string; via: TitleSource }
  | { kind: 'unresolved' }

export interface SongMetadata {
  chartId: ChartId
  title?: string
  artist?: string
  charter?: string
  album?: string
  genre?: string
  year?: string
  lengthMs?: number
  filepath: string
  resolution: TitleResolution
}

export interface SkippedSongRecord {
  /** Position of the record in the cache, zero-based */
  index: number
  reason: string
}

export interface SongCacheDecodeResult {
  version: number
  songs: Map<ChartId, SongMetadata>
  skipped: SkippedSongRecord[]
  invalidTableEntries: number
}

/** Fields a song.ini (or a manual edit) may override */
export type SongMetadataOverrides = Partial<
  Pick<SongMetadata, 'title' | 'artist' | 'charter' | 'album' | 'genre' | 'year' | 'lengthMs'>
>
