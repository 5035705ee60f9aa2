import { BaseEvent } from './base.event';

export class TimeSyncCompletedEvent extends BaseEvent {
  constructor(
    public readonly offsetMillis: number,
    public readonly roundTripDelayMillis: number,
    public readonly serverAddress: string,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Every server and attempt failed. The previous offset, if any, is kept.
 */
export class TimeSyncFailedEvent extends BaseEvent {
  constructor(
    public readonly error: string,
    public readonly lastErrorMessage: string | undefined,
    public readonly servers: readonly string[],
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class TimeSyncResetEvent extends BaseEvent {
  constructor(
    public readonly previousOffsetMillis: number,
    public readonly wasSynced: boolean,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Emitted when |offset| is at or above the warning threshold but below the
 * critical one. Operator should investigate but not urgent.
 */
export class TimeWarningEvent extends BaseEvent {
  constructor(
    public readonly driftMs: number,
    public readonly serverUsed: string,
    public readonly thresholdMs: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Emitted when |offset| is at or above the critical threshold.
 */
export class TimeCriticalEvent extends BaseEvent {
  constructor(
    public readonly driftMs: number,
    public readonly serverUsed: string,
    public readonly thresholdMs: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
