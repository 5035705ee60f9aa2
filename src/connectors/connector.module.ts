import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { UdpTimeTransport } from './udp/udp-time.transport';
import {
  DEFAULT_HTTP_TIME_URL,
  HttpTimeTransport,
} from './http/http-time.transport';
import {
  ITimeTransport,
  TIME_TRANSPORT_TOKEN,
} from '../common/interfaces/time-transport.interface';
import { ConfigValidationError } from '../common/errors/config-validation-error';

export type TimeTransportKind = 'udp' | 'http';

function validateTransportKind(config: ConfigService): TimeTransportKind {
  const kind = config.get<string>('NTP_TRANSPORT', 'udp').trim().toLowerCase();
  if (kind !== 'udp' && kind !== 'http') {
    throw new ConfigValidationError('Invalid NTP transport', [
      `NTP_TRANSPORT must be 'udp' or 'http', got '${kind}'`,
    ]);
  }
  return kind;
}

function validateHttpTimeUrl(config: ConfigService): string {
  const url = config.get<string>('NTP_HTTP_TIME_URL', DEFAULT_HTTP_TIME_URL);
  if (!URL.canParse(url)) {
    throw new ConfigValidationError('Invalid HTTP time service URL', [
      `NTP_HTTP_TIME_URL must be an absolute URL, got '${url}'`,
    ]);
  }
  return url;
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: TIME_TRANSPORT_TOKEN,
      useFactory: (config: ConfigService): ITimeTransport => {
        const kind = validateTransportKind(config);
        if (kind === 'http') {
          return new HttpTimeTransport(validateHttpTimeUrl(config));
        }
        return new UdpTimeTransport();
      },
      inject: [ConfigService],
    },
  ],
  exports: [TIME_TRANSPORT_TOKEN],
})
export class ConnectorModule {}
