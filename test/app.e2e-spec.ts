import { Test, TestingModule } from '@nestjs/testing';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from './../src/app.module';
import { TIME_TRANSPORT_TOKEN } from '../src/common/interfaces/time-transport.interface';
import { createMockTimeTransport } from '../src/test/mock-factories';

describe('AppController (e2e)', () => {
  let app: NestFastifyApplication;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(TIME_TRANSPORT_TOKEN)
      .useValue(createMockTimeTransport())
      .compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(
      new FastifyAdapter(),
    );
    app.setGlobalPrefix('api');
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('/api/health (GET)', async () => {
    const result = await app.inject({
      method: 'GET',
      url: '/api/health',
    });

    expect(result.statusCode).toBe(200);

    const payload = JSON.parse(result.payload) as {
      data: { status: string; service: string; synchronized: boolean };
      timestamp: string;
    };
    expect(payload.data).toEqual({
      status: 'degraded',
      service: 'sntp-clock-engine',
      synchronized: false,
    });
    expect(typeof payload.timestamp).toBe('string');
  });
});
