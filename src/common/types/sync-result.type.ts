/**
 * Outcome of one `sync()` run: the first successful exchange, or the
 * exhaustion of every server and attempt.
 */
export type SyncResult = SyncSuccess | SyncFailure;

export interface SyncSuccess {
  readonly status: 'success';
  /** Network time minus local time, in ms (positive: local clock is behind) */
  readonly offsetMillis: number;
  /** Round-trip transit time with server processing time removed */
  readonly roundTripDelayMillis: number;
  /** Server entry as configured (`host` or `host:port`) */
  readonly serverAddress: string;
}

export interface SyncFailure {
  readonly status: 'failure';
  readonly error: string;
  /** Last error observed across all attempts, if any attempt ran */
  readonly cause?: Error;
}

export function isSyncSuccess(result: SyncResult): result is SyncSuccess {
  return result.status === 'success';
}
