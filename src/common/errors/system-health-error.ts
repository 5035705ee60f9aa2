import { ErrorSeverity, RetryStrategy, SystemError } from './system-error';

/**
 * System health errors (codes 4000-4999)
 * Used for clock health and lifecycle issues: stale offsets, use before initialization
 */
export class SystemHealthError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: ErrorSeverity,
    public readonly component?: string,
    retryStrategy?: RetryStrategy,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, retryStrategy, metadata);
  }
}

export const SYSTEM_HEALTH_ERROR_CODES = {
  /** Cached offset older than the configured cache duration: warning */
  STALE_OFFSET: 4003,
  /** Process-wide clock used before initialize(): critical, never retried */
  NOT_INITIALIZED: 4006,
  /** Network time requested while no successful sync exists: warning */
  CLOCK_NOT_SYNCHRONIZED: 4007,
} as const;
