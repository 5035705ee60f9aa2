import { describe, it, expect } from 'vitest';
import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { ConnectorModule } from './connector.module';
import { TIME_TRANSPORT_TOKEN } from '../common/interfaces/time-transport.interface';
import { UdpTimeTransport } from './udp/udp-time.transport';
import { HttpTimeTransport } from './http/http-time.transport';

describe('ConnectorModule', () => {
  async function createModule(envOverrides: Record<string, string> = {}) {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: true,
          load: [() => envOverrides],
        }),
        ConnectorModule,
      ],
    }).compile();
    return moduleRef;
  }

  it('should default to the UDP transport when NTP_TRANSPORT is unset', async () => {
    const mod = await createModule({});

    expect(mod.get(TIME_TRANSPORT_TOKEN)).toBeInstanceOf(UdpTimeTransport);
  });

  it('should resolve to UdpTimeTransport when NTP_TRANSPORT=udp', async () => {
    const mod = await createModule({ NTP_TRANSPORT: 'udp' });

    expect(mod.get(TIME_TRANSPORT_TOKEN)).toBeInstanceOf(UdpTimeTransport);
  });

  it('should resolve to HttpTimeTransport when NTP_TRANSPORT=http', async () => {
    const mod = await createModule({
      NTP_TRANSPORT: 'HTTP',
      NTP_HTTP_TIME_URL: 'https://time.test/now',
    });

    expect(mod.get(TIME_TRANSPORT_TOKEN)).toBeInstanceOf(HttpTimeTransport);
  });

  it('should throw ConfigValidationError for an unknown transport', async () => {
    await expect(createModule({ NTP_TRANSPORT: 'carrier-pigeon' })).rejects.toThrow(
      'Invalid NTP transport',
    );
  });

  it('should throw ConfigValidationError for a relative time service URL', async () => {
    await expect(
      createModule({ NTP_TRANSPORT: 'http', NTP_HTTP_TIME_URL: '/time' }),
    ).rejects.toThrow('Invalid HTTP time service URL');
  });
});
