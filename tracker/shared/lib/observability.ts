import type { TrackerEnv } from '../types/env'

export type LogLevel = 'info' | 'warn' | 'error'

export type ObservabilityEnv = Pick<TrackerEnv, 'OBS_ENABLED' | 'OBS_DISCORD_WEBHOOK_URL' | 'OBS_SERVICE'>

export interface LogEventOptions {
  event: string
  status?: 'start' | 'success' | 'fail' | string
  message?: string
  durationMs?: number
  errorCode?: string
  fields?: Record<string, unknown>
  error?: unknown
}

export interface DiscordEmbedField {
  name: string
  value: string
  inline?: boolean
}

export interface DiscordEmbed {
  title: string
  description?: string
  color?: number
  fields?: DiscordEmbedField[]
  footer?: { text: string }
  timestamp?: string
}

export interface ObservabilityResult {
  payload: Record<string, unknown>
  sent: boolean
  destination?: 'discord'
  errorMessage?: string
}

export const DEFAULT_SERVICE = 'score-tracker'

export function isObservabilityEnabled(env: ObservabilityEnv): boolean {
  return env.OBS_ENABLED === 'true' || env.OBS_ENABLED === '1'
}

export function logEvent(
  env: ObservabilityEnv,
  level: LogLevel,
  options: LogEventOptions,
): Record<string, unknown> {
  const payload = {
    ts: new Date().toISOString(),
    level,
    service: env.OBS_SERVICE || DEFAULT_SERVICE,
    event: options.event,
    status: options.status,
    message: options.message,
    durationMs: options.durationMs,
    errorCode: options.errorCode,
    ...options.fields,
    error:
      options.error instanceof Error
        ? { message: options.error.message, stack: options.error.stack }
        : options.error,
  }

  const line = JSON.stringify(payload)
  if (level === 'error') {
    console.error(line)
  } else if (level === 'warn') {
    console.warn(line)
  } else {
    console.log(line)
  }

  return payload
}

export async function sendDiscordNotification(
  env: ObservabilityEnv,
  content: string,
  embeds: DiscordEmbed[] = [],
): Promise<ObservabilityResult> {
  const payload: Record<string, unknown> = { content, embeds }

  if (!isObservabilityEnabled(env)) {
    return { payload, sent: false, errorMessage: 'observability disabled' }
  }

  const webhook = env.OBS_DISCORD_WEBHOOK_URL
  if (!webhook) {
    return { payload, sent: false, errorMessage: 'webhook missing' }
  }

  try {
    const res = await fetch(webhook, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        content,
        embeds: embeds.length > 0 ? embeds : undefined,
      }),
    })

    if (!res.ok) {
      return {
        payload,
        sent: false,
        destination: 'discord',
        errorMessage: `discord responded ${res.status}`,
      }
    }

    return { payload, sent: true, destination: 'discord' }
  } catch (error) {
    logEvent(env, 'warn', {
      event: 'observability.discord',
      status: 'fail',
      message: 'failed to send discord notification',
      error,
    })
    return {
      payload,
      sent: false,
      destination: 'discord',
      errorMessage: error instanceof Error ? error.message : 'unknown error',
    }
  }
}
