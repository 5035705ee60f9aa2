import { SystemError } from './system-error';

export const TIME_TRANSPORT_ERROR_CODES = {
  TIMEOUT: 5101,
  HOST_UNRESOLVABLE: 5102,
  IO_ERROR: 5103,
} as const;

export type TimeTransportErrorCode =
  (typeof TIME_TRANSPORT_ERROR_CODES)[keyof typeof TIME_TRANSPORT_ERROR_CODES];

/**
 * Error class for transport failures (code range 5100-5199).
 *
 * - 5101: Timeout (WARNING, retried per sync policy)
 * - 5102: Host Unresolvable (WARNING, retried per sync policy)
 * - 5103: I/O Error (WARNING, retried per sync policy)
 */
export class TimeTransportError extends SystemError {
  constructor(
    code: TimeTransportErrorCode,
    message: string,
    public readonly host: string,
    public readonly port: number,
    public readonly cause?: Error,
  ) {
    super(code, message, 'warning', undefined, { host, port });
  }
}
