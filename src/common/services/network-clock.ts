import { Logger } from '@nestjs/common';
import { DEFAULT_NTP_CONFIG, worstCaseSyncDurationMs } from '../config/ntp-config';
import type { NtpConfig } from '../config/ntp-config';
import {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from '../errors/system-health-error';
import { systemClock } from '../interfaces/clock.interface';
import type { IClock } from '../interfaces/clock.interface';
import type { ITimeTransport } from '../interfaces/time-transport.interface';
import { SyncResult } from '../types/sync-result.type';
import { TimeSnapshot } from '../types/time-snapshot.type';
import { UdpTimeTransport } from '../../connectors/udp/udp-time.transport';
import { NtpSyncEngine } from '../../modules/time-sync/sync-engine';
import { withCorrelationId } from './correlation-context';
import { SyncLock } from './sync-lock';

export interface NetworkClockOptions {
  config?: NtpConfig;
  transport?: ITimeTransport;
  clock?: IClock;
}

interface ClockState {
  engine: NtpSyncEngine;
  lock: SyncLock;
}

const LOCK_MARGIN_MS = 5_000;
const logger = new Logger('NetworkClock');

let current: ClockState | null = null;

function requireState(): ClockState {
  if (current === null) {
    throw new SystemHealthError(
      SYSTEM_HEALTH_ERROR_CODES.NOT_INITIALIZED,
      'Network clock used before initialize()',
      'critical',
      'network-clock',
    );
  }
  return current;
}

function runSync(state: ClockState): Promise<SyncResult> {
  return withCorrelationId(() =>
    state.lock.runExclusive(() => state.engine.sync()),
  );
}

/**
 * Process-wide clock for code that lives outside the Nest container.
 * Owns at most one engine; every read before `initialize()` (or after
 * `shutdown()`) throws NOT_INITIALIZED.
 */
export const networkClock = {
  /**
   * Replace any existing engine. Resolves with the first sync result when
   * the config asks for `syncOnInit`, otherwise with null.
   */
  async initialize(options: NetworkClockOptions = {}): Promise<SyncResult | null> {
    const config = options.config ?? DEFAULT_NTP_CONFIG;
    const engine = new NtpSyncEngine(
      config,
      options.transport ?? new UdpTimeTransport(),
      options.clock ?? systemClock,
    );
    const state: ClockState = {
      engine,
      lock: new SyncLock(worstCaseSyncDurationMs(config) + LOCK_MARGIN_MS),
    };
    current = state;

    logger.log({
      message: 'Network clock initialized',
      module: 'network-clock',
      data: { servers: config.ntpServers, syncOnInit: config.syncOnInit },
    });

    return config.syncOnInit ? runSync(state) : null;
  },

  isInitialized(): boolean {
    return current !== null;
  },

  getEngine(): NtpSyncEngine {
    return requireState().engine;
  },

  sync(): Promise<SyncResult> {
    return runSync(requireState());
  },

  now(): Date | null {
    return requireState().engine.now();
  },

  nowOrSystem(): Date {
    return requireState().engine.nowOrSystem();
  },

  currentTimeMillis(): number {
    return requireState().engine.currentTimeMillis();
  },

  offset(): number {
    return requireState().engine.offset();
  },

  isSynchronized(): boolean {
    return requireState().engine.isSynchronized();
  },

  snapshot(): TimeSnapshot {
    return requireState().engine.snapshot();
  },

  reset(): void {
    requireState().engine.reset();
  },

  /** Drop the engine. A sync already in flight still settles. */
  shutdown(): void {
    if (current !== null) {
      current = null;
      logger.log({ message: 'Network clock shut down', module: 'network-clock' });
    }
  },
};
