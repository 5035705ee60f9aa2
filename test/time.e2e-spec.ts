import { Test, TestingModule } from '@nestjs/testing';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AppModule } from '../src/app.module';
import { NtpConfigBuilder } from '../src/common/config/ntp-config';
import { NTP_CONFIG_TOKEN } from '../src/common/config/ntp-config.loader';
import { CLOCK_TOKEN } from '../src/common/interfaces/clock.interface';
import { TIME_TRANSPORT_TOKEN } from '../src/common/interfaces/time-transport.interface';
import { EVENT_NAMES, TimeSyncCompletedEvent } from '../src/common/events';
import {
  MockClock,
  MockTimeTransport,
  createFakeNtpTransport,
  createMockClock,
} from '../src/test/mock-factories';

const AUTH = { authorization: 'Bearer test-token' };

interface Envelope<T> {
  data: T;
  timestamp: string;
}

describe('Time API (e2e)', () => {
  let app: NestFastifyApplication;
  let clock: MockClock;
  let transport: MockTimeTransport;
  let completed: TimeSyncCompletedEvent[];

  beforeEach(async () => {
    clock = createMockClock();
    transport = createFakeNtpTransport(clock, {
      'primary.test': { error: new Error('primary down') },
      'secondary.test': { offsetMillis: 250, latencyMillis: 500 },
    });

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(NTP_CONFIG_TOKEN)
      .useValue(
        new NtpConfigBuilder()
          .ntpServers(['primary.test', 'secondary.test'])
          .retryCount(0)
          .retryDelayMs(0)
          .syncOnInit(false)
          .build(),
      )
      .overrideProvider(TIME_TRANSPORT_TOKEN)
      .useValue(transport)
      .overrideProvider(CLOCK_TOKEN)
      .useValue(clock)
      .compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(
      new FastifyAdapter(),
    );
    app.setGlobalPrefix('api');
    await app.init();
    await app.getHttpAdapter().getInstance().ready();

    completed = [];
    app
      .get(EventEmitter2)
      .on(EVENT_NAMES.TIME_SYNC_COMPLETED, (event: TimeSyncCompletedEvent) => {
        completed.push(event);
      });
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /api/time should report an unsynchronized clock', async () => {
    const result = await app.inject({ method: 'GET', url: '/api/time' });

    expect(result.statusCode).toBe(200);
    const payload = JSON.parse(result.payload) as Envelope<{
      epochMillis: number;
      isSynced: boolean;
      lastSyncTimeMillis: number | null;
      isStale: boolean;
    }>;
    expect(payload.data).toMatchObject({
      epochMillis: 1_704_067_200_000,
      isSynced: false,
      lastSyncTimeMillis: null,
      isStale: true,
    });
  });

  it('GET /api/time/network should answer 503 before the first sync', async () => {
    const result = await app.inject({ method: 'GET', url: '/api/time/network' });

    expect(result.statusCode).toBe(503);
    const payload = JSON.parse(result.payload) as {
      error: { code: number; severity: string };
    };
    expect(payload.error).toMatchObject({ code: 4007, severity: 'warning' });
  });

  it('POST /api/time/sync should require the operator token', async () => {
    const result = await app.inject({ method: 'POST', url: '/api/time/sync' });

    expect(result.statusCode).toBe(403);
    expect(transport.exchange).not.toHaveBeenCalled();
  });

  it('POST /api/time/sync should fall back to the next server', async () => {
    const result = await app.inject({
      method: 'POST',
      url: '/api/time/sync',
      headers: { ...AUTH, 'x-correlation-id': 'e2e-sync-1' },
    });

    expect(result.statusCode).toBe(200);
    const payload = JSON.parse(result.payload) as Envelope<unknown>;
    expect(payload.data).toEqual({
      status: 'success',
      offsetMillis: 250,
      roundTripDelayMillis: 500,
      serverAddress: 'secondary.test',
    });
    expect(transport.exchange.mock.calls.map(([host]) => host)).toEqual([
      'primary.test',
      'secondary.test',
    ]);
    expect(completed).toHaveLength(1);
    expect(completed[0]?.correlationId).toBe('e2e-sync-1');
  });

  it('GET /api/time/network should return offset-adjusted time after a sync', async () => {
    await app.inject({ method: 'POST', url: '/api/time/sync', headers: AUTH });

    const result = await app.inject({ method: 'GET', url: '/api/time/network' });

    expect(result.statusCode).toBe(200);
    const payload = JSON.parse(result.payload) as Envelope<{
      networkTime: string;
      epochMillis: number;
    }>;
    // the fake exchange advanced the mock clock by its 500ms latency
    expect(payload.data).toEqual({
      networkTime: '2024-01-01T00:00:00.750Z',
      epochMillis: 1_704_067_200_750,
    });
  });

  it('POST /api/time/sync should report failure in a 200 body', async () => {
    transport.exchange.mockRejectedValue(new Error('network unreachable'));

    const result = await app.inject({
      method: 'POST',
      url: '/api/time/sync',
      headers: AUTH,
    });

    expect(result.statusCode).toBe(200);
    const payload = JSON.parse(result.payload) as Envelope<unknown>;
    expect(payload.data).toEqual({
      status: 'failure',
      error: 'Failed to sync with any NTP server',
      cause: 'network unreachable',
    });
  });

  it('POST /api/time/reset should forget the offset', async () => {
    await app.inject({ method: 'POST', url: '/api/time/sync', headers: AUTH });

    const result = await app.inject({
      method: 'POST',
      url: '/api/time/reset',
      headers: AUTH,
    });

    expect(result.statusCode).toBe(200);
    const payload = JSON.parse(result.payload) as Envelope<{
      offsetMillis: number;
      isSynced: boolean;
    }>;
    expect(payload.data).toMatchObject({ offsetMillis: 0, isSynced: false });

    const health = await app.inject({ method: 'GET', url: '/api/health' });
    const healthPayload = JSON.parse(health.payload) as Envelope<{
      synchronized: boolean;
    }>;
    expect(healthPayload.data.synchronized).toBe(false);
  });
});
