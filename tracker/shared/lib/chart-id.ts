import type { ChartId } from '../types/score'

export const CHART_ID_BYTES = 16
const CHART_ID_REGEX = /^[0-9a-f]{32}$/

export function chartIdFromBytes(bytes: Uint8Array): ChartId {
  let hex = ''
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, '0')
  }
  return hex
}

export function isChartId(value: string): value is ChartId {
  return CHART_ID_REGEX.test(value)
}

export function isBlankChartId(bytes: Uint8Array): boolean {
  return bytes.every((byte) => byte === 0)
}

/** First 8 hex chars, used as a display fallback when no title is known */
export function shortChartId(chartId: ChartId): string {
  return chartId.slice(0, 8)
}
