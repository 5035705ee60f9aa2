import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { TimeSyncModule } from './modules/time-sync/time-sync.module';
import { loggerConfig } from './common/config/logger.config';
import { SystemErrorFilter } from './common/filters/system-error.filter';

@Module({
  imports: [
    // CRITICAL: LoggerModule MUST be first to replace default logger early
    LoggerModule.forRoot(loggerConfig),

    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env.${process.env.NODE_ENV || 'development'}`,
    }),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      verboseMemoryLeak: true,
    }),
    ScheduleModule.forRoot(), // SchedulerRegistry for the resync interval
    TimeSyncModule,
  ],
  controllers: [AppController],
  providers: [AppService, { provide: APP_FILTER, useClass: SystemErrorFilter }],
})
export class AppModule {}
