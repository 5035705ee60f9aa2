import { Injectable } from '@nestjs/common';
import { HealthCheckResponseDto } from './common/dto/health-check-response.dto';
import { TimeSyncService } from './modules/time-sync/time-sync.service';

@Injectable()
export class AppService {
  constructor(private readonly timeSyncService: TimeSyncService) {}

  getHealth(): HealthCheckResponseDto {
    // Falling back to system time keeps the service up, but degraded
    const snapshot = this.timeSyncService.snapshot();

    return {
      data: {
        status: snapshot.isStale ? 'degraded' : 'ok',
        service: 'sntp-clock-engine',
        synchronized: snapshot.isSynced,
      },
      timestamp: new Date().toISOString(),
    };
  }
}
