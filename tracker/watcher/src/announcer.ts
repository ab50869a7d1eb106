import { buildScoreEmbed, displayTitle } from '../../shared/lib/announce'
import {
  type ObservabilityEnv,
  isObservabilityEnabled,
  sendDiscordNotification,
} from '../../shared/lib/observability'
import type { ChangeEvent } from '../../shared/types/score'
import type { SongMetadata } from '../../shared/types/song'

export type AnnounceOutcome = 'sent' | 'skipped' | 'failed'

export type Announcer = (event: ChangeEvent, metadata: SongMetadata | undefined) => Promise<AnnounceOutcome>

export function announcementContent(event: ChangeEvent, metadata?: SongMetadata): string {
  const label = event.kind === 'improved' ? 'New personal best' : 'First score'
  return `${label}: ${displayTitle(event.record.chartId, metadata)}`
}

export function createDiscordAnnouncer(env: ObservabilityEnv): Announcer {
  return async (event, metadata) => {
    if (!isObservabilityEnabled(env) || !env.OBS_DISCORD_WEBHOOK_URL) {
      return 'skipped'
    }
    const result = await sendDiscordNotification(env, announcementContent(event, metadata), [
      buildScoreEmbed(event, metadata),
    ])
    return result.sent ? 'sent' : 'failed'
  }
}
