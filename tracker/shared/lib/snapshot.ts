import type { ScoreKey } from '../types/score'
import { isChartId } from './chart-id'
import { InvalidKeyError } from './errors'

export type PersistedScores = Record<string, number>

function isIdPart(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

export function formatScoreKey(key: ScoreKey): string {
  const text = `${key.chartId}:${key.instrumentId}:${key.difficultyId}`
  if (!isChartId(key.chartId)) {
    throw new InvalidKeyError(text, 'chart id must be 32 lowercase hex characters')
  }
  if (!isIdPart(key.instrumentId) || !isIdPart(key.difficultyId)) {
    throw new InvalidKeyError(text, 'instrument and difficulty must be non-negative integers')
  }
  return text
}

export function parseScoreKey(text: string): ScoreKey {
  const parts = text.split(':')
  if (parts.length !== 3) {
    throw new InvalidKeyError(text, 'expected <chartId>:<instrument>:<difficulty>')
  }
  const [chartId, instrument, difficulty] = parts
  if (!/^\d+$/.test(instrument) || !/^\d+$/.test(difficulty)) {
    throw new InvalidKeyError(text, 'instrument and difficulty must be non-negative integers')
  }
  const key = {
    chartId,
    instrumentId: Number.parseInt(instrument, 10),
    difficultyId: Number.parseInt(difficulty, 10),
  }
  // One spelling per key: "00" and "0" must not alias
  if (formatScoreKey(key) !== text) {
    throw new InvalidKeyError(text, 'key is not in canonical form')
  }
  return key
}

/**
 * Last known score per (chart, instrument, difficulty). The only state carried
 * between runs. `apply` overwrites without comparing; the reconciler owns the
 * policy.
 */
export class ScoreSnapshot {
  readonly #scores = new Map<string, number>()

  private constructor() {}

  static empty(): ScoreSnapshot {
    return new ScoreSnapshot()
  }

  static load(persisted: PersistedScores): ScoreSnapshot {
    const snapshot = new ScoreSnapshot()
    for (const [text, score] of Object.entries(persisted)) {
      if (!Number.isSafeInteger(score) || score < 0) {
        throw new InvalidKeyError(text, `stored score ${score} is not a non-negative integer`)
      }
      snapshot.#scores.set(formatScoreKey(parseScoreKey(text)), score)
    }
    return snapshot
  }

  get size(): number {
    return this.#scores.size
  }

  lookup(key: ScoreKey): number | undefined {
    return this.#scores.get(formatScoreKey(key))
  }

  apply(key: ScoreKey, score: number): void {
    this.#scores.set(formatScoreKey(key), score)
  }

  export(): PersistedScores {
    return Object.fromEntries(this.#scores)
  }
}
