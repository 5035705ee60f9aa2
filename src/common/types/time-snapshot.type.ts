/**
 * Consistent read of the synchronized state plus a fresh clock sample.
 */
export interface TimeSnapshot {
  /** System time plus offset */
  readonly epochMillis: number;
  readonly offsetMillis: number;
  readonly isSynced: boolean;
  /** Local time of the last successful sync, null while unsynchronized */
  readonly lastSyncTimeMillis: number | null;
  /** True while unsynchronized or once the offset outlives the cache duration */
  readonly isStale: boolean;
}
