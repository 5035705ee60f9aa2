export interface SynchronizedState {
  readonly offsetMillis: number;
  readonly isSynced: boolean;
  readonly lastSyncTimeMillis: number;
}

export const INITIAL_SYNC_STATE: SynchronizedState = Object.freeze({
  offsetMillis: 0,
  isSynced: false,
  lastSyncTimeMillis: 0,
});

/**
 * Holds the engine's synchronized state as one frozen record. Every write
 * swaps the whole record, so a reader sees either the old or the new values,
 * never a mix.
 */
export class SyncStateStore {
  private state: SynchronizedState = INITIAL_SYNC_STATE;

  read(): SynchronizedState {
    return this.state;
  }

  markSynced(offsetMillis: number, syncedAtMillis: number): SynchronizedState {
    this.state = Object.freeze({
      offsetMillis,
      isSynced: true,
      lastSyncTimeMillis: syncedAtMillis,
    });
    return this.state;
  }

  reset(): void {
    this.state = INITIAL_SYNC_STATE;
  }
}
