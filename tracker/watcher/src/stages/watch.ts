import { type FSWatcher, watch } from 'node:fs'
import { SCORE_STORE_FILE } from '../../../shared/lib/config'
import { type ObservabilityEnv, logEvent } from '../../../shared/lib/observability'

export interface SerialTrigger {
  /** Note a change; the task runs once the notifications go quiet */
  notify(): void
  /** Resolves when no run is pending or in flight */
  idle(): Promise<void>
  cancel(): void
}

/**
 * Coalesces bursts of change notifications into single task runs. Runs never
 * overlap; a notification that lands mid-run schedules one follow-up run.
 */
export function createSerialTrigger(
  task: () => Promise<void>,
  debounceMs: number,
  onError: (error: unknown) => void,
): SerialTrigger {
  let timer: ReturnType<typeof setTimeout> | undefined
  let running: Promise<void> | undefined
  let rerun = false
  let cancelled = false

  const start = (): void => {
    timer = undefined
    if (cancelled) return
    if (running) {
      rerun = true
      return
    }
    running = task()
      .catch(onError)
      .finally(() => {
        running = undefined
        if (rerun && !cancelled) {
          rerun = false
          schedule()
        }
      })
  }

  const schedule = (): void => {
    if (timer) clearTimeout(timer)
    timer = setTimeout(start, debounceMs)
  }

  return {
    notify() {
      if (cancelled) return
      schedule()
    },
    async idle() {
      while (timer || running) {
        if (running) {
          await running
        } else {
          await new Promise((resolve) => setTimeout(resolve, debounceMs))
        }
      }
    },
    cancel() {
      cancelled = true
      if (timer) clearTimeout(timer)
      timer = undefined
    },
  }
}

export interface WatchOptions {
  env: ObservabilityEnv
  dataDir: string
  debounceMs: number
  onChange: () => Promise<void>
}

export interface ScoreWatcher {
  close(): Promise<void>
}

// Watches the directory, not the file: scoredata.bin is replaced on every save

export function watchScoreStore(options: WatchOptions): ScoreWatcher {
  const trigger = createSerialTrigger(options.onChange, options.debounceMs, (error) => {
    logEvent(options.env, 'error', {
      event: 'watch.change',
      status: 'fail',
      message: 'Change handler failed',
      error,
    })
  })

  const watcher: FSWatcher = watch(options.dataDir, { persistent: true }, (_eventType, filename) => {
    if (filename === null || filename.toString() === SCORE_STORE_FILE) {
      trigger.notify()
    }
  })

  watcher.on('error', (error) => {
    logEvent(options.env, 'error', {
      event: 'watch',
      status: 'fail',
      message: `Watching ${options.dataDir} failed`,
      error,
    })
  })

  logEvent(options.env, 'info', {
    event: 'watch',
    status: 'start',
    fields: { dataDir: options.dataDir, debounceMs: options.debounceMs },
  })

  return {
    async close() {
      watcher.close()
      trigger.cancel()
      await trigger.idle()
    },
  }
}
