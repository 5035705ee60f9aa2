import { getCorrelationId } from '../services/correlation-context';

/**
 * Base class for all clock events. Carries the emission time and the
 * correlation id of the sync run that produced the event, taken from the
 * async context when not passed explicitly.
 */
export abstract class BaseEvent {
  public readonly timestamp: Date;
  public readonly correlationId: string | undefined;

  protected constructor(correlationId?: string) {
    this.timestamp = new Date();
    this.correlationId = correlationId ?? getCorrelationId();
  }
}
