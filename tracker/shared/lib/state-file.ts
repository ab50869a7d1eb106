import { z } from 'zod'
import type { ScoreRecord } from '../types/score'
import { StateFileError } from './errors'
import { scoreKeyOf } from './reconcile'
import { type PersistedScores, formatScoreKey } from './snapshot'

export const CurrentStateSchema = z.object({
  score_values: z.record(z.string(), z.number().int().nonnegative()),
  last_updated: z.number().optional(),
})

// Older trackers stored the set of seen keys without their scores
export const LegacyStateSchema = z.object({
  known_scores: z.array(z.string()),
})

export type CurrentStateFile = z.infer<typeof CurrentStateSchema>

export type LoadedState =
  | { kind: 'empty' }
  | { kind: 'current'; scores: PersistedScores; lastUpdated?: number }
  | { kind: 'legacy'; keys: string[] }

export function parseStateFile(text: string, path?: string): LoadedState {
  if (text.trim().length === 0) {
    return { kind: 'empty' }
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new StateFileError('State file is not valid JSON', { path, cause: error })
  }

  const current = CurrentStateSchema.safeParse(json)
  if (current.success) {
    return {
      kind: 'current',
      scores: current.data.score_values,
      lastUpdated: current.data.last_updated,
    }
  }

  const legacy = LegacyStateSchema.safeParse(json)
  if (legacy.success) {
    return { kind: 'legacy', keys: legacy.data.known_scores }
  }

  throw new StateFileError(`State file has an unknown shape: ${current.error.issues[0]?.message ?? 'invalid'}`, {
    path,
    cause: current.error,
  })
}

/**
 * Legacy files carry no score values, so the current store becomes the
 * baseline. Duplicate keys keep their highest score.
 */
export function migrateLegacyState(records: readonly ScoreRecord[]): PersistedScores {
  const scores: PersistedScores = {}
  for (const record of records) {
    const key = formatScoreKey(scoreKeyOf(record))
    const existing = scores[key]
    if (existing === undefined || record.score > existing) {
      scores[key] = record.score
    }
  }
  return scores
}

export function serializeState(scores: PersistedScores, now: Date = new Date()): string {
  const file: CurrentStateFile = {
    score_values: scores,
    last_updated: now.getTime() / 1000,
  }
  return `${JSON.stringify(file, null, 2)}\n`
}
