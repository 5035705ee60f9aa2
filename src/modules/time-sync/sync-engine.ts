import { Logger } from '@nestjs/common';

import { NtpConfig, parseServerAddress } from '../../common/config/ntp-config';
import {
  ConfigValidationError,
  NtpProtocolError,
  NTP_PROTOCOL_ERROR_CODES,
  RetryStrategy,
} from '../../common/errors';
import { IClock, systemClock } from '../../common/interfaces/clock.interface';
import { ITimeTransport } from '../../common/interfaces/time-transport.interface';
import { getCorrelationId } from '../../common/services/correlation-context';
import { SyncResult } from '../../common/types/sync-result.type';
import { TimeSnapshot } from '../../common/types/time-snapshot.type';
import { withRetry } from '../../common/utils/with-retry';
import {
  KISS_OF_DEATH_STRATUM,
  createNtpRequest,
  decodeNtpPacket,
  encodeNtpPacket,
  kissCode,
} from './protocol';
import { SyncStateStore } from './sync-state';

export const SYNC_FAILURE_MESSAGE = 'Failed to sync with any NTP server';

export interface ClockMeasurement {
  offsetMillis: number;
  roundTripDelayMillis: number;
}

/**
 * Four-timestamp SNTP estimate, assuming symmetric network delay.
 * t0/t3 are local send/receive times, t1/t2 the server's receive/transmit.
 */
export function computeClockOffset(
  t0: number,
  t1: number,
  t2: number,
  t3: number,
): ClockMeasurement {
  return {
    offsetMillis: Math.trunc((t1 - t0 + (t2 - t3)) / 2),
    roundTripDelayMillis: t3 - t0 - (t2 - t1),
  };
}

/**
 * Synchronizes a local clock against an ordered list of SNTP servers and
 * serves offset-corrected time from the result.
 *
 * `sync()` walks the servers in order, giving each `retryCount + 1`
 * attempts with `retryDelayMs` between them, and stops at the first usable
 * reply. It resolves with a failure result instead of rejecting when every
 * attempt fails. Reads never touch the network.
 *
 * Concurrent `sync()` calls are allowed here; callers sharing one engine
 * serialize them with a SyncLock.
 */
export class NtpSyncEngine {
  private readonly logger = new Logger(NtpSyncEngine.name);
  private readonly state = new SyncStateStore();
  private readonly retryStrategy: RetryStrategy;

  constructor(
    private readonly config: NtpConfig,
    private readonly transport: ITimeTransport,
    private readonly clock: IClock = systemClock,
  ) {
    this.retryStrategy = {
      maxRetries: config.retryCount,
      initialDelayMs: config.retryDelayMs,
      maxDelayMs: config.retryDelayMs,
      backoffMultiplier: 1,
    };
  }

  async sync(): Promise<SyncResult> {
    let lastError: Error | undefined;

    for (const server of this.config.ntpServers) {
      try {
        const measurement = await withRetry(
          () => this.exchangeWith(server),
          this.retryStrategy,
          (attempt, error) => this.logAttemptFailure(server, attempt, error),
        );

        this.state.markSynced(measurement.offsetMillis, this.clock.now());

        this.logger.log({
          message: 'NTP sync successful',
          correlationId: getCorrelationId(),
          module: 'time-sync',
          data: { server, transport: this.transport.kind, ...measurement },
        });

        return {
          status: 'success',
          offsetMillis: measurement.offsetMillis,
          roundTripDelayMillis: measurement.roundTripDelayMillis,
          serverAddress: server,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logAttemptFailure(server, this.config.retryCount + 1, lastError);
        this.logger.warn({
          message: 'NTP server exhausted, trying next',
          correlationId: getCorrelationId(),
          module: 'time-sync',
          data: { server },
        });
      }
    }

    this.logger.error({
      message: SYNC_FAILURE_MESSAGE,
      correlationId: getCorrelationId(),
      module: 'time-sync',
      data: {
        servers: this.config.ntpServers,
        error: lastError?.message,
      },
    });

    return { status: 'failure', error: SYNC_FAILURE_MESSAGE, cause: lastError };
  }

  /** Network time, or null while unsynchronized */
  now(): Date | null {
    const state = this.state.read();
    if (!state.isSynced) {
      return null;
    }
    return new Date(this.clock.now() + state.offsetMillis);
  }

  nowOrSystem(): Date {
    return new Date(this.currentTimeMillis());
  }

  /** System time plus the current offset (zero while unsynchronized) */
  currentTimeMillis(): number {
    return this.clock.now() + this.state.read().offsetMillis;
  }

  offset(): number {
    return this.state.read().offsetMillis;
  }

  isSynchronized(): boolean {
    return this.state.read().isSynced;
  }

  isStale(): boolean {
    return this.toSnapshot(this.state.read(), this.clock.now()).isStale;
  }

  getLastSyncTime(): Date | null {
    const state = this.state.read();
    return state.isSynced ? new Date(state.lastSyncTimeMillis) : null;
  }

  snapshot(): TimeSnapshot {
    return this.toSnapshot(this.state.read(), this.clock.now());
  }

  reset(): void {
    this.state.reset();
    this.logger.debug({
      message: 'Synchronized state reset',
      module: 'time-sync',
    });
  }

  getConfig(): NtpConfig {
    return this.config;
  }

  private toSnapshot(
    state: ReturnType<SyncStateStore['read']>,
    systemNow: number,
  ): TimeSnapshot {
    const isStale =
      !state.isSynced ||
      systemNow - state.lastSyncTimeMillis >= this.config.cacheDurationMs;
    return {
      epochMillis: systemNow + state.offsetMillis,
      offsetMillis: state.offsetMillis,
      isSynced: state.isSynced,
      lastSyncTimeMillis: state.isSynced ? state.lastSyncTimeMillis : null,
      isStale,
    };
  }

  private async exchangeWith(server: string): Promise<ClockMeasurement> {
    const address = parseServerAddress(server);
    if (!address) {
      throw new ConfigValidationError(`Invalid NTP server entry: ${server}`, [
        `ntpServers entry "${server}" is not a valid host[:port]`,
      ]);
    }

    const t0 = this.clock.now();
    const request = encodeNtpPacket(createNtpRequest(t0));
    const responseBytes = await this.transport.exchange(
      address.host,
      address.port,
      request,
      this.config.timeoutMs,
    );
    const t3 = this.clock.now();
    const response = decodeNtpPacket(responseBytes);

    if (response.stratum === KISS_OF_DEATH_STRATUM) {
      throw new NtpProtocolError(
        NTP_PROTOCOL_ERROR_CODES.SERVER_REJECTED,
        `NTP server ${server} rejected the request (kiss-of-death)`,
        { server, kissCode: kissCode(response) },
      );
    }

    return computeClockOffset(
      t0,
      response.receiveTimestamp.toEpochMillis(),
      response.transmitTimestamp.toEpochMillis(),
      t3,
    );
  }

  private logAttemptFailure(server: string, attempt: number, error: Error): void {
    this.logger.warn({
      message: 'NTP sync attempt failed',
      correlationId: getCorrelationId(),
      module: 'time-sync',
      data: {
        server,
        attempt,
        code: 'code' in error ? error.code : undefined,
        error: error.message,
      },
    });
  }
}
