import { ConfigValidationError } from '../errors/config-validation-error';
import { MAX_TIMER_DELAY_MS } from '../utils/timer-delay';

export const DEFAULT_NTP_SERVERS: readonly string[] = Object.freeze([
  'time.google.com',
  'time.apple.com',
  'time.cloudflare.com',
  'pool.ntp.org',
  'time.windows.com',
]);

const DEFAULT_NTP_PORT = 123;

/**
 * Immutable parameter set consumed by one sync engine.
 */
export interface NtpConfig {
  /** Tried strictly in order; each entry is `host`, `host:port` or `[ipv6]:port` */
  readonly ntpServers: readonly string[];
  readonly timeoutMs: number;
  /** Retries per server after the first attempt */
  readonly retryCount: number;
  /** Pause between attempts against the same server */
  readonly retryDelayMs: number;
  readonly syncOnInit: boolean;
  /** How long an offset stays fresh; Infinity keeps it forever */
  readonly cacheDurationMs: number;
}

export interface ServerAddress {
  host: string;
  port: number;
}

/**
 * Split a configured server entry into host and port.
 * Returns null for entries that cannot be dialled.
 */
export function parseServerAddress(entry: string): ServerAddress | null {
  const trimmed = entry.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (trimmed.startsWith('[')) {
    const match = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
    if (!match?.[1]) {
      return null;
    }
    return toAddress(match[1], match[2]);
  }

  const parts = trimmed.split(':');
  if (parts.length === 2) {
    return toAddress(parts[0] ?? '', parts[1]);
  }
  // Zero colons is a plain host; more than one is a bare IPv6 literal
  return { host: trimmed, port: DEFAULT_NTP_PORT };
}

function toAddress(host: string, rawPort?: string): ServerAddress | null {
  if (host.length === 0) {
    return null;
  }
  if (rawPort === undefined) {
    return { host, port: DEFAULT_NTP_PORT };
  }
  const port = Number(rawPort);
  if (!/^\d+$/.test(rawPort) || port < 1 || port > 65535) {
    return null;
  }
  return { host, port };
}

/**
 * Upper bound on how long one `sync()` can run against this config.
 */
export function worstCaseSyncDurationMs(config: NtpConfig): number {
  const attempts = config.retryCount + 1;
  const perServer =
    attempts * config.timeoutMs + config.retryCount * config.retryDelayMs;
  return config.ntpServers.length * perServer;
}

/**
 * Fluent builder for {@link NtpConfig}. `build()` validates every field and
 * reports all problems at once.
 *
 * @example
 * const config = new NtpConfigBuilder()
 *   .ntpServers(['time.google.com', 'time.apple.com'])
 *   .timeoutMs(5000)
 *   .build();
 */
export class NtpConfigBuilder {
  private servers: readonly string[] = DEFAULT_NTP_SERVERS;
  private timeout = 10_000;
  private retries = 3;
  private retryDelay = 1_000;
  private syncOnStart = true;
  private cacheDuration = Infinity;

  static from(config: NtpConfig): NtpConfigBuilder {
    return new NtpConfigBuilder()
      .ntpServers(config.ntpServers)
      .timeoutMs(config.timeoutMs)
      .retryCount(config.retryCount)
      .retryDelayMs(config.retryDelayMs)
      .syncOnInit(config.syncOnInit)
      .cacheDurationMs(config.cacheDurationMs);
  }

  ntpServers(servers: readonly string[]): this {
    this.servers = servers;
    return this;
  }

  timeoutMs(ms: number): this {
    this.timeout = ms;
    return this;
  }

  retryCount(count: number): this {
    this.retries = count;
    return this;
  }

  retryDelayMs(ms: number): this {
    this.retryDelay = ms;
    return this;
  }

  syncOnInit(enabled: boolean): this {
    this.syncOnStart = enabled;
    return this;
  }

  cacheDurationMs(ms: number): this {
    this.cacheDuration = ms;
    return this;
  }

  build(): NtpConfig {
    const errors: string[] = [];

    if (this.servers.length === 0) {
      errors.push('ntpServers must contain at least one server');
    }
    for (const server of this.servers) {
      if (parseServerAddress(server) === null) {
        errors.push(`ntpServers entry "${server}" is not a valid host[:port]`);
      }
    }
    if (!Number.isFinite(this.timeout) || this.timeout <= 0) {
      errors.push(`timeoutMs must be a positive number, got ${this.timeout}`);
    } else if (this.timeout > MAX_TIMER_DELAY_MS) {
      errors.push(
        `timeoutMs must be at most ${MAX_TIMER_DELAY_MS}, got ${this.timeout}`,
      );
    }
    if (!Number.isInteger(this.retries) || this.retries < 0) {
      errors.push(
        `retryCount must be a non-negative integer, got ${this.retries}`,
      );
    }
    if (!Number.isFinite(this.retryDelay) || this.retryDelay < 0) {
      errors.push(
        `retryDelayMs must be a non-negative number, got ${this.retryDelay}`,
      );
    } else if (this.retryDelay > MAX_TIMER_DELAY_MS) {
      errors.push(
        `retryDelayMs must be at most ${MAX_TIMER_DELAY_MS}, got ${this.retryDelay}`,
      );
    }
    if (Number.isNaN(this.cacheDuration) || this.cacheDuration <= 0) {
      errors.push(
        `cacheDurationMs must be positive or Infinity, got ${this.cacheDuration}`,
      );
    }

    if (errors.length > 0) {
      throw new ConfigValidationError('Invalid NTP configuration', errors);
    }

    return Object.freeze({
      ntpServers: Object.freeze(this.servers.map((server) => server.trim())),
      timeoutMs: this.timeout,
      retryCount: this.retries,
      retryDelayMs: this.retryDelay,
      syncOnInit: this.syncOnStart,
      cacheDurationMs: this.cacheDuration,
    });
  }
}

export const DEFAULT_NTP_CONFIG: NtpConfig = new NtpConfigBuilder().build();
