import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';

import { worstCaseSyncDurationMs } from '../../common/config/ntp-config';
import type { NtpConfig } from '../../common/config/ntp-config';
import { NTP_CONFIG_TOKEN } from '../../common/config/ntp-config.loader';
import {
  ConfigValidationError,
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from '../../common/errors';
import {
  EVENT_NAMES,
  TimeCriticalEvent,
  TimeSyncCompletedEvent,
  TimeSyncFailedEvent,
  TimeSyncResetEvent,
  TimeWarningEvent,
} from '../../common/events';
import { CLOCK_TOKEN } from '../../common/interfaces/clock.interface';
import type { IClock } from '../../common/interfaces/clock.interface';
import { TIME_TRANSPORT_TOKEN } from '../../common/interfaces/time-transport.interface';
import type { ITimeTransport } from '../../common/interfaces/time-transport.interface';
import {
  getCorrelationId,
  withCorrelationId,
} from '../../common/services/correlation-context';
import { SyncLock } from '../../common/services/sync-lock';
import { SyncResult, SyncSuccess } from '../../common/types/sync-result.type';
import { TimeSnapshot } from '../../common/types/time-snapshot.type';
import { clampTimerDelay } from '../../common/utils/timer-delay';
import { NtpSyncEngine } from './sync-engine';

export const RESYNC_INTERVAL_NAME = 'ntpResync';

const LOCK_MARGIN_MS = 5_000;

export interface DriftThresholds {
  warningMs: number;
  criticalMs: number;
}

/**
 * Nest-facing owner of the service's single NtpSyncEngine.
 * Serializes sync runs, classifies the measured offset against the drift
 * thresholds and keeps the offset fresh with a resync interval.
 */
@Injectable()
export class TimeSyncService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(TimeSyncService.name);
  private readonly engine: NtpSyncEngine;
  private readonly lock: SyncLock;
  private readonly driftThresholds: DriftThresholds;

  constructor(
    @Inject(NTP_CONFIG_TOKEN) private readonly config: NtpConfig,
    @Inject(TIME_TRANSPORT_TOKEN) private readonly transport: ITimeTransport,
    @Inject(CLOCK_TOKEN) clock: IClock,
    configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.engine = new NtpSyncEngine(config, transport, clock);
    this.lock = new SyncLock(worstCaseSyncDurationMs(config) + LOCK_MARGIN_MS);
    this.driftThresholds = readDriftThresholds(configService);
  }

  onApplicationBootstrap(): void {
    this.logger.log({
      message: 'Time sync service initialized',
      module: 'time-sync',
      data: {
        servers: this.config.ntpServers,
        transport: this.transport.kind,
        syncOnInit: this.config.syncOnInit,
        cacheDurationMs: this.config.cacheDurationMs,
        driftThresholds: this.driftThresholds,
      },
    });

    if (this.config.syncOnInit) {
      // Boot does not wait on the network; reads fall back to system time
      void this.runInBackground('Initial NTP sync failed', () => this.sync());
    }

    if (Number.isFinite(this.config.cacheDurationMs)) {
      const interval = setInterval(
        () => {
          void this.runInBackground('Scheduled NTP resync failed', () =>
            this.ensureSynchronized(),
          );
        },
        clampTimerDelay(this.config.cacheDurationMs),
      );
      this.schedulerRegistry.addInterval(RESYNC_INTERVAL_NAME, interval);
    }
  }

  onApplicationShutdown(): void {
    if (this.schedulerRegistry.doesExist('interval', RESYNC_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(RESYNC_INTERVAL_NAME);
    }
  }

  /**
   * Run one synchronization. Overlapping callers queue behind the one in
   * flight.
   */
  sync(correlationId?: string): Promise<SyncResult> {
    return withCorrelationId(
      () => this.lock.runExclusive(() => this.runSync()),
      correlationId,
    );
  }

  /**
   * Sync only when the offset is missing or older than the cache duration.
   */
  ensureSynchronized(correlationId?: string): Promise<TimeSnapshot> {
    return withCorrelationId(
      () =>
        this.lock.runExclusive(async () => {
          // Re-checked under the lock: a queued caller may find it fresh
          if (this.engine.isStale()) {
            await this.runSync();
          }
          return this.engine.snapshot();
        }),
      correlationId,
    );
  }

  reset(): TimeSnapshot {
    const previous = this.engine.snapshot();
    this.engine.reset();
    this.logger.log({
      message: 'Synchronized state reset',
      correlationId: getCorrelationId(),
      module: 'time-sync',
      data: { previousOffsetMillis: previous.offsetMillis },
    });
    this.eventEmitter.emit(
      EVENT_NAMES.TIME_SYNC_RESET,
      new TimeSyncResetEvent(previous.offsetMillis, previous.isSynced),
    );
    return this.engine.snapshot();
  }

  /**
   * @throws SystemHealthError CLOCK_NOT_SYNCHRONIZED while no sync has succeeded
   * @throws SystemHealthError STALE_OFFSET once the offset outlives the cache duration
   */
  requireNetworkTime(): Date {
    const snapshot = this.engine.snapshot();
    if (!snapshot.isSynced) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.CLOCK_NOT_SYNCHRONIZED,
        'Network time is not available until a sync succeeds',
        'warning',
        'time-sync',
      );
    }
    if (snapshot.isStale) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.STALE_OFFSET,
        'Network time offset is older than the cache duration',
        'warning',
        'time-sync',
        undefined,
        {
          lastSyncTimeMillis: snapshot.lastSyncTimeMillis,
          cacheDurationMs: this.config.cacheDurationMs,
        },
      );
    }
    return new Date(snapshot.epochMillis);
  }

  now(): Date | null {
    return this.engine.now();
  }

  nowOrSystem(): Date {
    return this.engine.nowOrSystem();
  }

  currentTimeMillis(): number {
    return this.engine.currentTimeMillis();
  }

  offset(): number {
    return this.engine.offset();
  }

  isSynchronized(): boolean {
    return this.engine.isSynchronized();
  }

  isStale(): boolean {
    return this.engine.isStale();
  }

  snapshot(): TimeSnapshot {
    return this.engine.snapshot();
  }

  getLastSyncTime(): Date | null {
    return this.engine.getLastSyncTime();
  }

  getTransportKind(): string {
    return this.transport.kind;
  }

  private async runSync(): Promise<SyncResult> {
    const result = await this.engine.sync();

    if (result.status === 'success') {
      this.eventEmitter.emit(
        EVENT_NAMES.TIME_SYNC_COMPLETED,
        new TimeSyncCompletedEvent(
          result.offsetMillis,
          result.roundTripDelayMillis,
          result.serverAddress,
        ),
      );
      this.evaluateDrift(result);
    } else {
      this.eventEmitter.emit(
        EVENT_NAMES.TIME_SYNC_FAILED,
        new TimeSyncFailedEvent(
          result.error,
          result.cause?.message,
          this.config.ntpServers,
        ),
      );
    }

    return result;
  }

  private evaluateDrift(result: SyncSuccess): void {
    const driftMs = Math.abs(result.offsetMillis);
    const { warningMs, criticalMs } = this.driftThresholds;

    if (driftMs >= criticalMs) {
      this.logger.error({
        message: 'Clock drift critical threshold exceeded',
        correlationId: getCorrelationId(),
        module: 'time-sync',
        data: { offsetMillis: result.offsetMillis, threshold: criticalMs },
      });
      this.eventEmitter.emit(
        EVENT_NAMES.TIME_DRIFT_CRITICAL,
        new TimeCriticalEvent(result.offsetMillis, result.serverAddress, criticalMs),
      );
    } else if (driftMs >= warningMs) {
      this.logger.warn({
        message: 'Clock drift warning threshold exceeded',
        correlationId: getCorrelationId(),
        module: 'time-sync',
        data: { offsetMillis: result.offsetMillis, threshold: warningMs },
      });
      this.eventEmitter.emit(
        EVENT_NAMES.TIME_DRIFT_WARNING,
        new TimeWarningEvent(result.offsetMillis, result.serverAddress, warningMs),
      );
    } else {
      this.logger.debug({
        message: 'Clock drift within acceptable range',
        correlationId: getCorrelationId(),
        module: 'time-sync',
        data: { offsetMillis: result.offsetMillis },
      });
    }
  }

  private async runInBackground(
    failureMessage: string,
    task: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.logger.error({
        message: failureMessage,
        module: 'time-sync',
        data: {
          error: error instanceof Error ? error.message : 'Unknown error',
        },
      });
    }
  }
}

export function readDriftThresholds(
  configService: ConfigService,
): DriftThresholds {
  const rawWarning = configService.get<string>('NTP_DRIFT_WARNING_MS', '100');
  const rawCritical = configService.get<string>('NTP_DRIFT_CRITICAL_MS', '500');
  const warningMs = Number(rawWarning);
  const criticalMs = Number(rawCritical);

  const errors: string[] = [];
  if (!Number.isFinite(warningMs) || warningMs <= 0) {
    errors.push(
      `NTP_DRIFT_WARNING_MS must be a positive number, got "${rawWarning}"`,
    );
  }
  if (!Number.isFinite(criticalMs) || criticalMs <= 0) {
    errors.push(
      `NTP_DRIFT_CRITICAL_MS must be a positive number, got "${rawCritical}"`,
    );
  }
  if (errors.length === 0 && criticalMs < warningMs) {
    errors.push(
      `NTP_DRIFT_CRITICAL_MS (${criticalMs}) must not be below NTP_DRIFT_WARNING_MS (${warningMs})`,
    );
  }
  if (errors.length > 0) {
    throw new ConfigValidationError('Invalid drift thresholds', errors);
  }

  return { warningMs, criticalMs };
}
