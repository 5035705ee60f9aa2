/**
 * Catalog of every event the clock service emits.
 *
 * Naming Convention:
 * - Event names: dot.notation.lowercase
 * - Constants: UPPER_SNAKE_CASE
 * - Event classes: PascalCase matching the action (e.g., TimeSyncCompletedEvent)
 */
export const EVENT_NAMES = {
  /** A sync run found a usable server and replaced the offset */
  TIME_SYNC_COMPLETED: 'time.sync.completed',

  /** A sync run exhausted every server and attempt */
  TIME_SYNC_FAILED: 'time.sync.failed',

  /** Synchronized state was cleared on request */
  TIME_SYNC_RESET: 'time.sync.reset',

  /** |offset| reached the warning threshold (default 100ms) */
  TIME_DRIFT_WARNING: 'time.drift.warning',

  /** |offset| reached the critical threshold (default 500ms) */
  TIME_DRIFT_CRITICAL: 'time.drift.critical',

  /** A critical SystemError reached the global filter */
  SYSTEM_HEALTH_CRITICAL: 'system.health.critical',
} as const;
