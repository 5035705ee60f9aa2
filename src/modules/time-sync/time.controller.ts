import {
  Controller,
  Get,
  Headers,
  HttpCode,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiHeader,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { AuthTokenGuard } from '../../common/guards/auth-token.guard';
import { SyncResult } from '../../common/types/sync-result.type';
import { TimeSnapshot } from '../../common/types/time-snapshot.type';
import { SyncResultDto, SyncResultResponseDto } from './dto/sync-result.dto';
import {
  NetworkTimeResponseDto,
  TimeSnapshotDto,
  TimeSnapshotResponseDto,
} from './dto/time-snapshot.dto';
import { TimeSyncService } from './time-sync.service';

const CORRELATION_HEADER = 'x-correlation-id';

@ApiTags('Time')
@Controller('time')
export class TimeController {
  constructor(private readonly timeSyncService: TimeSyncService) {}

  @Get()
  @ApiOperation({ summary: 'Current synchronized clock state' })
  getTime(): TimeSnapshotResponseDto {
    return {
      data: toSnapshotDto(this.timeSyncService.snapshot()),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('network')
  @ApiOperation({ summary: 'Network time, only while a fresh offset is held' })
  @ApiResponse({
    status: 503,
    description: 'Clock not synchronized yet, or offset stale',
  })
  getNetworkTime(): NetworkTimeResponseDto {
    const now = this.timeSyncService.requireNetworkTime();
    return {
      data: { networkTime: now.toISOString(), epochMillis: now.getTime() },
      timestamp: new Date().toISOString(),
    };
  }

  @Post('sync')
  @HttpCode(200)
  @UseGuards(AuthTokenGuard)
  @ApiBearerAuth()
  @ApiHeader({ name: CORRELATION_HEADER, required: false })
  @ApiOperation({ summary: 'Synchronize now; failure is reported in the body' })
  async sync(
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ): Promise<SyncResultResponseDto> {
    const result = await this.timeSyncService.sync(correlationId || undefined);
    return {
      data: toSyncResultDto(result),
      timestamp: new Date().toISOString(),
    };
  }

  @Post('reset')
  @HttpCode(200)
  @UseGuards(AuthTokenGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Forget the measured offset' })
  reset(): TimeSnapshotResponseDto {
    return {
      data: toSnapshotDto(this.timeSyncService.reset()),
      timestamp: new Date().toISOString(),
    };
  }
}

function toSnapshotDto(snapshot: TimeSnapshot): TimeSnapshotDto {
  return {
    epochMillis: snapshot.epochMillis,
    iso: new Date(snapshot.epochMillis).toISOString(),
    offsetMillis: snapshot.offsetMillis,
    isSynced: snapshot.isSynced,
    lastSyncTimeMillis: snapshot.lastSyncTimeMillis,
    isStale: snapshot.isStale,
  };
}

function toSyncResultDto(result: SyncResult): SyncResultDto {
  if (result.status === 'success') {
    return {
      status: 'success',
      offsetMillis: result.offsetMillis,
      roundTripDelayMillis: result.roundTripDelayMillis,
      serverAddress: result.serverAddress,
    };
  }
  return {
    status: 'failure',
    error: result.error,
    cause: result.cause?.message,
  };
}
