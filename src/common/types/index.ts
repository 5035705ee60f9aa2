export { isSyncSuccess } from './sync-result.type';
export type { SyncResult, SyncSuccess, SyncFailure } from './sync-result.type';
export type { TimeSnapshot } from './time-snapshot.type';
