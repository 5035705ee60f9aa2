export * from './modules/time-sync/protocol';
export {
  NtpSyncEngine,
  SYNC_FAILURE_MESSAGE,
  computeClockOffset,
} from './modules/time-sync/sync-engine';
export type { ClockMeasurement } from './modules/time-sync/sync-engine';
export {
  DEFAULT_NTP_CONFIG,
  DEFAULT_NTP_SERVERS,
  NtpConfigBuilder,
  parseServerAddress,
  worstCaseSyncDurationMs,
} from './common/config/ntp-config';
export type { NtpConfig, ServerAddress } from './common/config/ntp-config';
export * from './common/interfaces';
export * from './common/types';
export * from './common/errors';
export { UdpTimeTransport } from './connectors/udp/udp-time.transport';
export {
  DEFAULT_HTTP_TIME_URL,
  HttpTimeTransport,
} from './connectors/http/http-time.transport';
export { networkClock } from './common/services/network-clock';
export type { NetworkClockOptions } from './common/services/network-clock';
export { SyncLock } from './common/services/sync-lock';
export {
  getCorrelationId,
  withCorrelationId,
} from './common/services/correlation-context';
