import { BaseEvent } from './base.event';

/**
 * Emitted by the global error filter for every critical SystemError.
 */
export class SystemHealthCriticalEvent extends BaseEvent {
  constructor(
    public readonly errorCode: number,
    public readonly message: string,
    public readonly errorName: string,
    public readonly metadata?: Record<string, unknown>,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
