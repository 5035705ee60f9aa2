export interface RetryStrategy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export type ErrorSeverity = 'critical' | 'error' | 'warning';

/**
 * Base error class for all system errors.
 * Subclasses define error code ranges:
 * - SystemHealthError: 4000-4999
 * - NtpProtocolError: 5000-5099
 * - TimeTransportError: 5100-5199
 */
export abstract class SystemError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: ErrorSeverity,
    public readonly retryStrategy?: RetryStrategy,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}
