import type { ChangeEvent, ChangeSummary, ScoreKey, ScoreRecord, ScoreShortfall } from '../types/score'
import type { ScoreSnapshot } from './snapshot'

export function scoreKeyOf(record: ScoreRecord): ScoreKey {
  return {
    chartId: record.chartId,
    instrumentId: record.instrumentId,
    difficultyId: record.difficultyId,
  }
}

export function classify(record: ScoreRecord, previous: number | undefined): ChangeEvent {
  if (previous === undefined) {
    return { record, kind: 'new-chart' }
  }
  if (record.score > previous) {
    return { record, kind: 'improved', previousScore: previous }
  }
  // Ties and regressions carry no new information
  return { record, kind: 'unchanged', previousScore: previous }
}

/**
 * Classify every decoded record against the snapshot, in store order.
 * New and improved scores are written back before the next record is looked
 * at, so a chart listed twice is compared against its own earlier entry.
 * Keys missing from the store are never visited.
 */
export function reconcile(records: readonly ScoreRecord[], snapshot: ScoreSnapshot): ChangeEvent[] {
  const events: ChangeEvent[] = []

  for (const record of records) {
    const key = scoreKeyOf(record)
    const event = classify(record, snapshot.lookup(key))
    if (event.kind !== 'unchanged') {
      snapshot.apply(key, record.score)
    }
    events.push(event)
  }

  return events
}

export function summarizeChanges(events: readonly ChangeEvent[]): ChangeSummary {
  const summary: ChangeSummary = { newCharts: 0, improved: 0, unchanged: 0 }
  for (const event of events) {
    if (event.kind === 'new-chart') summary.newCharts += 1
    else if (event.kind === 'improved') summary.improved += 1
    else summary.unchanged += 1
  }
  return summary
}

export function isAnnounceable(event: ChangeEvent): boolean {
  return event.kind !== 'unchanged'
}

/** A replayed chart that scored below the best on record; undefined otherwise */
export function shortfallOf(event: ChangeEvent): ScoreShortfall | undefined {
  const best = event.previousScore
  if (event.kind !== 'unchanged' || best === undefined || event.record.score === best) {
    return undefined
  }
  const percentOfBest = best > 0 ? Math.round((event.record.score / best) * 10000) / 100 : 0
  return { score: event.record.score, best, difference: best - event.record.score, percentOfBest }
}
