import { ensureError, errorCodeOf } from '../../../shared/lib/errors'
import { type ObservabilityEnv, logEvent } from '../../../shared/lib/observability'
import { isAnnounceable, reconcile, shortfallOf, summarizeChanges } from '../../../shared/lib/reconcile'
import { decodeScoreStore } from '../../../shared/lib/score-store'
import { ScoreSnapshot } from '../../../shared/lib/snapshot'
import { decodeSongCache } from '../../../shared/lib/song-cache'
import { applyMetadataOverrides, parseSongIni, songIniPathFor } from '../../../shared/lib/song-ini'
import { migrateLegacyState } from '../../../shared/lib/state-file'
import type { LoadedState } from '../../../shared/lib/state-file'
import type { ChangeEvent, ChangeSummary, ScoreRecord } from '../../../shared/types/score'
import type { SongMetadata } from '../../../shared/types/song'
import type { Announcer } from '../announcer'
import type { ScoreSource } from '../sources'
import type { StateStore } from '../state-store'

export interface ScanDeps {
  env: ObservabilityEnv
  source: ScoreSource
  stateStore: StateStore
  announce: Announcer
}

export interface ScanResult {
  success: boolean
  /** First run or migrated legacy state: scores recorded, nothing announced */
  baseline: boolean
  counts: ChangeSummary
  events: ChangeEvent[]
  announced: number
  announceFailures: number
  errors: string[]
}

function emptyResult(): ScanResult {
  return {
    success: false,
    baseline: false,
    counts: { newCharts: 0, improved: 0, unchanged: 0 },
    events: [],
    announced: 0,
    announceFailures: 0,
    errors: [],
  }
}

function buildSnapshot(state: LoadedState, records: ScoreRecord[]): ScoreSnapshot {
  switch (state.kind) {
    case 'current':
      return ScoreSnapshot.load(state.scores)
    case 'legacy':
      return ScoreSnapshot.load(migrateLegacyState(records))
    case 'empty':
      return ScoreSnapshot.empty()
  }
}

async function loadSongMetadata(deps: ScanDeps): Promise<Map<string, SongMetadata>> {
  try {
    const bytes = await deps.source.readSongCache()
    if (!bytes) return new Map()

    const decoded = decodeSongCache(bytes)
    if (decoded.skipped.length > 0 || decoded.invalidTableEntries > 0) {
      logEvent(deps.env, 'warn', {
        event: 'scan.songcache',
        status: 'success',
        message: 'Song cache decoded with skipped entries',
        fields: {
          songs: decoded.songs.size,
          skippedRecords: decoded.skipped.length,
          invalidTableEntries: decoded.invalidTableEntries,
          firstSkip: decoded.skipped[0]?.reason,
        },
      })
    }
    return decoded.songs
  } catch (error) {
    logEvent(deps.env, 'warn', {
      event: 'scan.songcache',
      status: 'fail',
      message: 'Song cache unreadable; announcing without metadata',
      errorCode: errorCodeOf(error),
      error,
    })
    return new Map()
  }
}

async function enrich(deps: ScanDeps, metadata: SongMetadata | undefined): Promise<SongMetadata | undefined> {
  if (!metadata || !deps.source.readSongIni) return metadata

  const iniPath = songIniPathFor(metadata.filepath)
  if (!iniPath) return metadata

  try {
    const text = await deps.source.readSongIni(iniPath)
    return text === undefined ? metadata : applyMetadataOverrides(metadata, parseSongIni(text))
  } catch (error) {
    logEvent(deps.env, 'warn', {
      event: 'scan.songini',
      status: 'fail',
      message: `Unable to read ${iniPath}`,
      error,
    })
    return metadata
  }
}

function logShortfalls(env: ObservabilityEnv, events: readonly ChangeEvent[]): void {
  for (const event of events) {
    const shortfall = shortfallOf(event)
    if (!shortfall) continue
    const { record } = event
    logEvent(env, 'info', {
      event: 'scan.no-improvement',
      status: 'success',
      message: 'Score updated but did not improve personal best',
      fields: {
        chartId: record.chartId,
        instrumentId: record.instrumentId,
        difficultyId: record.difficultyId,
        ...shortfall,
      },
    })
  }
}

interface ReconcileOutcome {
  events: ChangeEvent[]
  baseline: boolean
  tracked: number
}

// State is saved before anything is announced
async function reconcileStore(deps: ScanDeps): Promise<ReconcileOutcome> {
  const state = await deps.stateStore.load()
  const records = decodeScoreStore(await deps.source.readScoreStore())
  const snapshot = buildSnapshot(state, records)

  const events = reconcile(records, snapshot)
  await deps.stateStore.save(snapshot.export())
  return { events, baseline: state.kind !== 'current', tracked: snapshot.size }
}

/**
 * One reconciliation pass: decode the score store, diff it against the
 * persisted snapshot, persist, then announce new and improved scores.
 * Also serves as the catch-up scan for scores set while the tracker was off.
 */
export async function handleScan(deps: ScanDeps): Promise<ScanResult> {
  const startedAt = Date.now()
  const result = emptyResult()
  logEvent(deps.env, 'info', { event: 'scan', status: 'start' })

  let outcome: ReconcileOutcome
  try {
    outcome = await reconcileStore(deps)
  } catch (error) {
    const { message } = ensureError(error, 'Scan failed')
    result.errors.push(message)
    logEvent(deps.env, 'error', {
      event: 'scan',
      status: 'fail',
      message,
      errorCode: errorCodeOf(error),
      durationMs: Date.now() - startedAt,
      error,
    })
    return result
  }

  const { events } = outcome
  result.baseline = outcome.baseline
  result.success = true
  result.events = events
  result.counts = summarizeChanges(events)
  logShortfalls(deps.env, events)

  const announceable = result.baseline ? [] : events.filter(isAnnounceable)
  if (announceable.length > 0) {
    const songs = await loadSongMetadata(deps)
    for (const event of announceable) {
      const metadata = await enrich(deps, songs.get(event.record.chartId))
      try {
        const delivery = await deps.announce(event, metadata)
        if (delivery === 'sent') result.announced += 1
        if (delivery === 'failed') result.announceFailures += 1
      } catch (error) {
        result.announceFailures += 1
        logEvent(deps.env, 'warn', {
          event: 'scan.announce',
          status: 'fail',
          message: `Announcement failed for ${event.record.chartId}`,
          error,
        })
      }
    }
  }

  logEvent(deps.env, 'info', {
    event: 'scan',
    status: 'success',
    message: result.baseline ? 'Baseline recorded' : undefined,
    durationMs: Date.now() - startedAt,
    fields: {
      ...result.counts,
      tracked: outcome.tracked,
      announced: result.announced,
      announceFailures: result.announceFailures,
    },
  })

  return result
}
