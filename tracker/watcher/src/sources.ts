import { readFile } from 'node:fs/promises'
import type { TrackerConfig } from '../../shared/lib/config'

export interface ScoreSource {
  /** One complete, stable read of scoredata.bin */
  readScoreStore(): Promise<Uint8Array>
  /** undefined when the game has not written a song cache yet */
  readSongCache(): Promise<Uint8Array | undefined>
  readSongIni?(iniPath: string): Promise<string | undefined>
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readOptional(filePath: string): Promise<Buffer | undefined> {
  try {
    return await readFile(filePath)
  } catch (error) {
    if (isNotFound(error)) return undefined
    throw error
  }
}

export function createFileSource(config: Pick<TrackerConfig, 'scoreStorePath' | 'songCachePath'>): ScoreSource {
  return {
    async readScoreStore() {
      return readFile(config.scoreStorePath)
    },
    async readSongCache() {
      return readOptional(config.songCachePath)
    },
    async readSongIni(iniPath: string) {
      const bytes = await readOptional(iniPath)
      return bytes?.toString('utf8')
    },
  }
}
