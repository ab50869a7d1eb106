export interface TrackerEnv {
  /** Clone Hero data directory holding scoredata.bin and songcache.bin */
  CH_DATA_DIR?: string
  /** Defaults to <CH_DATA_DIR>/.score_tracker_state.json */
  TRACKER_STATE_FILE?: string
  /** Quiet period before a scoredata.bin change is read (defaults to 2000) */
  TRACKER_DEBOUNCE_MS?: string
  /**
   * Observability feature flag. When falsey, structured logging remains local
   * and Discord webhook posts are skipped.
   */
  OBS_ENABLED?: string
  /** Discord incoming webhook URL for score announcements */
  OBS_DISCORD_WEBHOOK_URL?: string
  /** Optional service label for log payloads */
  OBS_SERVICE?: string
}
