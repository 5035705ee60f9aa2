import { SystemError } from './system-error';

/**
 * Thrown when NTP or service configuration is rejected.
 * Code 4010, in the SystemHealth range (4000-4999). Severity: critical.
 */
export class ConfigValidationError extends SystemError {
  constructor(
    message: string,
    public readonly validationErrors: string[],
  ) {
    super(4010, message, 'critical', undefined, { validationErrors });
  }
}
