import { pathToFileURL } from 'node:url'
import { type TrackerConfig, loadConfig } from '../../shared/lib/config'
import { logEvent } from '../../shared/lib/observability'
import type { TrackerEnv } from '../../shared/types/env'
import { createDiscordAnnouncer } from './announcer'
import { createFileSource } from './sources'
import { type ScanDeps, handleScan } from './stages/scan'
import { watchScoreStore } from './stages/watch'
import { FileStateStore } from './state-store'

export type Command = 'scan' | 'watch'

export type CliOptions = {
  command: Command
  dataDir?: string
  stateFile?: string
}

export function parseArgs(argv: string[]): CliOptions {
  const [command, ...rest] = argv
  if (command !== 'scan' && command !== 'watch') {
    throw new Error(`Unknown command '${command ?? ''}'. Use 'scan' or 'watch'.`)
  }

  const opts: CliOptions = { command }
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i]
    if (arg === '--data-dir' && rest[i + 1]) {
      opts.dataDir = rest[++i]
    } else if (arg === '--state' && rest[i + 1]) {
      opts.stateFile = rest[++i]
    } else {
      throw new Error(`Unknown argument '${arg}'`)
    }
  }
  return opts
}

function printUsage(): void {
  console.log('Usage: tsx tracker/watcher/src/index.ts <scan|watch> [--data-dir DIR] [--state FILE]\n')
  console.log('Environment variables:')
  console.log('  CH_DATA_DIR               (optional, Clone Hero data directory)')
  console.log('  TRACKER_STATE_FILE        (optional, defaults to <data dir>/.score_tracker_state.json)')
  console.log('  TRACKER_DEBOUNCE_MS       (optional, defaults to 2000)')
  console.log('  OBS_ENABLED               (optional, true to post announcements)')
  console.log('  OBS_DISCORD_WEBHOOK_URL   (required when OBS_ENABLED is true)')
  console.log('  OBS_SERVICE               (optional, log service label)')
}

export function resolveConfig(opts: CliOptions, env: TrackerEnv): TrackerConfig {
  return loadConfig({
    ...env,
    CH_DATA_DIR: opts.dataDir ?? env.CH_DATA_DIR,
    TRACKER_STATE_FILE: opts.stateFile ?? env.TRACKER_STATE_FILE,
  })
}

export function createScanDeps(config: TrackerConfig, env: TrackerEnv): ScanDeps {
  return {
    env,
    source: createFileSource(config),
    stateStore: new FileStateStore(config.stateFile),
    announce: createDiscordAnnouncer(env),
  }
}

export async function main(argv: string[], env: TrackerEnv = process.env): Promise<number> {
  if (argv.includes('--help') || argv.length === 0) {
    printUsage()
    return argv.length === 0 ? 1 : 0
  }

  const opts = parseArgs(argv)
  const config = resolveConfig(opts, env)
  const deps = createScanDeps(config, env)

  // Catch-up first: anything played while the tracker was off
  const initial = await handleScan(deps)
  if (opts.command === 'scan') {
    return initial.success ? 0 : 1
  }

  const watcher = watchScoreStore({
    env,
    dataDir: config.dataDir,
    debounceMs: config.debounceMs,
    onChange: async () => {
      await handleScan(deps)
    },
  })

  await new Promise<void>((resolve) => {
    process.once('SIGINT', resolve)
    process.once('SIGTERM', resolve)
  })
  await watcher.close()
  logEvent(env, 'info', { event: 'watch', status: 'success', message: 'Watcher stopped' })
  return 0
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      logEvent(process.env, 'error', {
        event: 'tracker.error',
        status: 'fail',
        error,
      })
      process.exitCode = 1
    })
}
