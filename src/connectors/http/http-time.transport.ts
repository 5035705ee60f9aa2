import {
  TimeTransportError,
  TIME_TRANSPORT_ERROR_CODES,
} from '../../common/errors';
import { ITimeTransport } from '../../common/interfaces/time-transport.interface';
import {
  NTP_VERSION,
  NtpMode,
  NtpTimestamp,
  createNtpPacket,
  encodeNtpPacket,
} from '../../modules/time-sync/protocol';

export const DEFAULT_HTTP_TIME_URL = 'https://worldtimeapi.org/api/ip';

const SYNTHETIC_STRATUM = 2;
const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);

/**
 * Fallback for hosts without outbound UDP. Reads `unixtime` (seconds) from a
 * JSON time service and answers with a synthetic stratum-2 server packet
 * whose receive and transmit timestamps both carry that time. The engine's
 * host and port are not used; every exchange goes to the configured URL.
 */
export class HttpTimeTransport implements ITimeTransport {
  readonly kind = 'http';

  constructor(private readonly url: string = DEFAULT_HTTP_TIME_URL) {}

  async exchange(
    host: string,
    port: number,
    _request: Buffer,
    timeoutMs: number,
  ): Promise<Buffer> {
    let payload: unknown;
    try {
      const response = await fetch(this.url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new TimeTransportError(
          TIME_TRANSPORT_ERROR_CODES.IO_ERROR,
          `Time service ${this.url} answered HTTP ${response.status}`,
          host,
          port,
        );
      }

      payload = await response.json();
    } catch (error) {
      throw this.toTransportError(error, host, port, timeoutMs);
    }

    const unixSeconds = readUnixTime(payload);
    if (unixSeconds === null) {
      throw new TimeTransportError(
        TIME_TRANSPORT_ERROR_CODES.IO_ERROR,
        `Time service ${this.url} returned no numeric unixtime`,
        host,
        port,
      );
    }

    const serverTime = NtpTimestamp.fromEpochMillis(
      Math.round(unixSeconds * 1000),
    );
    return encodeNtpPacket(
      createNtpPacket({
        version: NTP_VERSION,
        mode: NtpMode.SERVER,
        stratum: SYNTHETIC_STRATUM,
        receiveTimestamp: serverTime,
        transmitTimestamp: serverTime,
      }),
    );
  }

  private toTransportError(
    error: unknown,
    host: string,
    port: number,
    timeoutMs: number,
  ): TimeTransportError {
    if (error instanceof TimeTransportError) {
      return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === 'TimeoutError' || cause.name === 'AbortError') {
      return new TimeTransportError(
        TIME_TRANSPORT_ERROR_CODES.TIMEOUT,
        `Time service ${this.url} did not answer within ${timeoutMs}ms`,
        host,
        port,
        cause,
      );
    }

    const networkCode = readErrorCode(cause.cause);
    if (networkCode !== undefined && DNS_ERROR_CODES.has(networkCode)) {
      return new TimeTransportError(
        TIME_TRANSPORT_ERROR_CODES.HOST_UNRESOLVABLE,
        `Cannot resolve time service ${this.url}: ${networkCode}`,
        host,
        port,
        cause,
      );
    }

    return new TimeTransportError(
      TIME_TRANSPORT_ERROR_CODES.IO_ERROR,
      `Time service ${this.url} request failed: ${cause.message}`,
      host,
      port,
      cause,
    );
  }
}

function readUnixTime(payload: unknown): number | null {
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }
  const value = 'unixtime' in payload ? payload.unixtime : undefined;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function readErrorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return undefined;
  }
  return typeof value.code === 'string' ? value.code : undefined;
}
