export { SystemError } from './system-error';
export type { RetryStrategy, ErrorSeverity } from './system-error';
export {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './system-health-error';
export { ConfigValidationError } from './config-validation-error';
export {
  NtpProtocolError,
  NTP_PROTOCOL_ERROR_CODES,
} from './ntp-protocol-error';
export type { NtpProtocolErrorCode } from './ntp-protocol-error';
export {
  TimeTransportError,
  TIME_TRANSPORT_ERROR_CODES,
} from './time-transport-error';
export type { TimeTransportErrorCode } from './time-transport-error';
