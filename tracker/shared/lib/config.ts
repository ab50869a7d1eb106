import { homedir } from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import type { TrackerEnv } from '../types/env'

export const DEFAULT_DEBOUNCE_MS = 2000
export const STATE_FILE_NAME = '.score_tracker_state.json'
export const SCORE_STORE_FILE = 'scoredata.bin'
export const SONG_CACHE_FILE = 'songcache.bin'

export interface TrackerConfig {
  dataDir: string
  scoreStorePath: string
  songCachePath: string
  stateFile: string
  debounceMs: number
}

// Unset and blank variables both mean "use the default"
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim().length === 0 ? undefined : value
}

const ConfigEnvSchema = z.object({
  CH_DATA_DIR: z.preprocess(blankToUndefined, z.string().trim().optional()),
  TRACKER_STATE_FILE: z.preprocess(blankToUndefined, z.string().trim().optional()),
  TRACKER_DEBOUNCE_MS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^\d+$/, 'TRACKER_DEBOUNCE_MS must be a whole number of milliseconds')
      .transform((value) => Number.parseInt(value, 10))
      .optional(),
  ),
})

export interface PlatformInfo {
  platform: NodeJS.Platform
  home: string
  userProfile?: string
}

/** Where Clone Hero keeps scoredata.bin and songcache.bin */
export function defaultDataDir(info: PlatformInfo): string {
  if (info.platform === 'win32') {
    const profile = info.userProfile ?? info.home
    return path.win32.join(profile, 'AppData', 'LocalLow', 'srylain Inc_', 'Clone Hero')
  }
  if (info.platform === 'darwin') {
    return path.posix.join(info.home, 'Library', 'Application Support', 'com.srylain.CloneHero')
  }
  return path.posix.join(info.home, '.config', 'unity3d', 'srylain Inc_', 'Clone Hero')
}

export function loadConfig(
  env: TrackerEnv,
  info: PlatformInfo = { platform: process.platform, home: homedir(), userProfile: process.env.USERPROFILE },
): TrackerConfig {
  const parsed = ConfigEnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new Error(`Invalid configuration: ${issue?.path.join('.') ?? 'env'}: ${issue?.message ?? 'invalid'}`)
  }

  const dataDir = parsed.data.CH_DATA_DIR ?? defaultDataDir(info)
  const join = info.platform === 'win32' ? path.win32.join : path.join

  return {
    dataDir,
    scoreStorePath: join(dataDir, SCORE_STORE_FILE),
    songCachePath: join(dataDir, SONG_CACHE_FILE),
    stateFile: parsed.data.TRACKER_STATE_FILE ?? join(dataDir, STATE_FILE_NAME),
    debounceMs: parsed.data.TRACKER_DEBOUNCE_MS ?? DEFAULT_DEBOUNCE_MS,
  }
}
