import type { ScoreRecord } from '../types/score'

export const INSTRUMENT_NAMES: Readonly<Record<number, string>> = {
  0: 'Lead Guitar',
  1: 'Bass',
  2: 'Rhythm',
  3: 'Keys',
  4: 'Drums',
  5: 'GH Live Guitar',
  6: 'GH Live Bass',
}

export const DIFFICULTY_NAMES = ['Easy', 'Medium', 'Hard', 'Expert'] as const
export type DifficultyName = (typeof DIFFICULTY_NAMES)[number]

export const MAX_DIFFICULTY_ID = DIFFICULTY_NAMES.length - 1

// Unknown ids are surfaced, never dropped
export function instrumentName(instrumentId: number): string {
  return INSTRUMENT_NAMES[instrumentId] ?? `Unknown (${instrumentId})`
}

export function difficultyName(difficultyId: number): string {
  return DIFFICULTY_NAMES[difficultyId] ?? `Unknown (${difficultyId})`
}

export function completionPercent(
  record: Pick<ScoreRecord, 'completionNumerator' | 'completionDenominator'>,
): number {
  if (record.completionDenominator <= 0) return 0
  const ratio = (record.completionNumerator / record.completionDenominator) * 100
  return Math.round((ratio + Number.EPSILON) * 100) / 100
}
