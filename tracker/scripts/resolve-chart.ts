import { readFile } from 'node:fs/promises'
import { pathToFileURL } from 'node:url'
import { loadConfig } from '../shared/lib/config'
import { logEvent } from '../shared/lib/observability'
import { decodeSongCache } from '../shared/lib/song-cache'
import type { SongMetadata } from '../shared/types/song'

export type CliOptions = {
  hash: string
  dataDir?: string
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: Partial<CliOptions> = {}

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    if (arg === '--hash' && argv[i + 1]) {
      opts.hash = argv[++i]
    } else if (arg === '--data-dir' && argv[i + 1]) {
      opts.dataDir = argv[++i]
    }
  }

  const hash = opts.hash?.trim().toLowerCase()
  if (!hash) {
    throw new Error('Missing required --hash <chart hash or prefix> argument')
  }
  if (!/^[0-9a-f]{1,32}$/.test(hash)) {
    throw new Error(`Invalid --hash '${opts.hash}'. Expected up to 32 hex characters.`)
  }

  return { hash, dataDir: opts.dataDir }
}

export function findByPrefix(songs: Map<string, SongMetadata>, prefix: string): SongMetadata[] {
  return [...songs.values()]
    .filter((song) => song.chartId.startsWith(prefix))
    .sort((a, b) => a.chartId.localeCompare(b.chartId))
}

export function describeSong(song: SongMetadata): string {
  const via = song.resolution.kind === 'resolved' ? song.resolution.via : 'unresolved'
  return [
    `${song.chartId}`,
    `  title:    ${song.title ?? '(unknown)'} [${via}]`,
    `  artist:   ${song.artist ?? '(unknown)'}`,
    `  charter:  ${song.charter ?? '(unknown)'}`,
    `  filepath: ${song.filepath}`,
  ].join('\n')
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2))
  const config = loadConfig({ ...process.env, CH_DATA_DIR: opts.dataDir ?? process.env.CH_DATA_DIR })

  const decoded = decodeSongCache(await readFile(config.songCachePath))
  console.log(`[info] ${decoded.songs.size} songs in ${config.songCachePath}`)
  if (decoded.skipped.length > 0) {
    console.log(`[warn] ${decoded.skipped.length} song record(s) skipped`)
  }

  const matches = findByPrefix(decoded.songs, opts.hash)
  if (matches.length === 0) {
    console.log(`[miss] no chart id starts with ${opts.hash}`)
    process.exitCode = 2
    return
  }
  for (const song of matches) {
    console.log(describeSong(song))
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    logEvent(process.env, 'error', {
      event: 'resolve-chart.error',
      status: 'fail',
      error,
    })
    process.exitCode = 1
  })
}
