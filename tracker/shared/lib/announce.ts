import type { ChangeEvent } from '../types/score'
import type { SongMetadata } from '../types/song'
import { shortChartId } from './chart-id'
import { completionPercent, difficultyName, instrumentName } from './instruments'
import type { DiscordEmbed, DiscordEmbedField } from './observability'

export const EMBED_COLORS = {
  improved: 0x32cd32,
  newChart: 0x4169e1,
} as const

const numberFormat = new Intl.NumberFormat('en-US')

export function formatScore(value: number): string {
  return numberFormat.format(value)
}

export function formatStars(stars: number): string {
  return stars > 0 ? '★'.repeat(stars) : 'None'
}

export function displayTitle(chartId: string, metadata?: Pick<SongMetadata, 'title' | 'artist'>): string {
  if (!metadata?.title) return `Chart ${shortChartId(chartId)}`
  return metadata.artist ? `**${metadata.title}** by ${metadata.artist}` : `**${metadata.title}**`
}

export function buildScoreEmbed(event: ChangeEvent, metadata?: SongMetadata): DiscordEmbed {
  const { record } = event
  const improved = event.kind === 'improved'

  const fields: DiscordEmbedField[] = [
    { name: 'Instrument', value: instrumentName(record.instrumentId), inline: true },
    { name: 'Difficulty', value: difficultyName(record.difficultyId), inline: true },
    { name: 'Score', value: formatScore(record.score), inline: true },
    { name: 'Stars', value: formatStars(record.stars), inline: true },
    { name: 'Completion', value: `${completionPercent(record)}%`, inline: true },
    { name: 'Play Count', value: String(record.playCount), inline: true },
  ]

  if (metadata?.charter) {
    fields.push({ name: 'Charter', value: metadata.charter, inline: true })
  }

  if (improved && event.previousScore !== undefined) {
    const gain = record.score - event.previousScore
    fields.push({
      name: 'Previous Best',
      value: `${formatScore(event.previousScore)} (+${formatScore(gain)})`,
      inline: false,
    })
  }

  return {
    title: improved ? 'New personal best!' : 'First score on this chart!',
    description: displayTitle(record.chartId, metadata),
    color: improved ? EMBED_COLORS.improved : EMBED_COLORS.newChart,
    fields,
    footer: { text: record.chartId },
  }
}
