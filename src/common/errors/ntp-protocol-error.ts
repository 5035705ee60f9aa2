import { SystemError } from './system-error';

export const NTP_PROTOCOL_ERROR_CODES = {
  /** Fewer than 48 bytes handed to the decoder */
  MALFORMED_PACKET: 5001,
  /** Server answered with stratum 0 (kiss-of-death) */
  SERVER_REJECTED: 5002,
} as const;

export type NtpProtocolErrorCode =
  (typeof NTP_PROTOCOL_ERROR_CODES)[keyof typeof NTP_PROTOCOL_ERROR_CODES];

/**
 * Error class for SNTP wire-level failures (code range 5000-5099).
 * Both codes fail a single exchange attempt; the sync engine folds them into its retry loop.
 */
export class NtpProtocolError extends SystemError {
  constructor(
    code: NtpProtocolErrorCode,
    message: string,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, 'warning', undefined, metadata);
  }
}
