import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConnectorModule } from '../../connectors/connector.module';
import {
  NTP_CONFIG_TOKEN,
  loadNtpConfig,
} from '../../common/config/ntp-config.loader';
import {
  CLOCK_TOKEN,
  systemClock,
} from '../../common/interfaces/clock.interface';
import { AuthTokenGuard } from '../../common/guards/auth-token.guard';
import { TimeController } from './time.controller';
import { TimeSyncService } from './time-sync.service';

@Module({
  imports: [ConnectorModule],
  controllers: [TimeController],
  providers: [
    {
      provide: NTP_CONFIG_TOKEN,
      useFactory: loadNtpConfig,
      inject: [ConfigService],
    },
    { provide: CLOCK_TOKEN, useValue: systemClock },
    TimeSyncService,
    AuthTokenGuard,
  ],
  exports: [TimeSyncService],
})
export class TimeSyncModule {}
