/** 16-byte chart hash, carried as 32 lowercase hex characters */
export type ChartId = string

export interface ScoreRecord {
  chartId: ChartId
  instrumentId: number
  difficultyId: number
  // Opaque ratio pair from the game; not hit/total note counts
  completionNumerator: number
  completionDenominator: number
  stars: number
  score: number
  /** Shared by every record of the same chart */
  playCount: number
}

export interface ScoreKey {
  chartId: ChartId
  instrumentId: number
  difficultyId: number
}

export type ChangeKind = 'new-chart' | 'improved' | 'unchanged'

export interface ChangeEvent {
  record: ScoreRecord
  kind: ChangeKind
  /** Absent for new-chart */
  previousScore?: number
}

export interface ChangeSummary {
  newCharts: number
  improved: number
  unchanged: number
}

export interface ScoreShortfall {
  score: number
  best: number
  difference: number
  percentOfBest: number
}
