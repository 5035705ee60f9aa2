import { ApiProperty } from '@nestjs/swagger';

export class HealthStatusDto {
  @ApiProperty({ enum: ['ok', 'degraded'], example: 'ok' })
  status!: 'ok' | 'degraded';

  @ApiProperty({ example: 'sntp-clock-engine' })
  service!: string;

  @ApiProperty({ description: 'Whether a network time offset is held' })
  synchronized!: boolean;
}

export class HealthCheckResponseDto {
  @ApiProperty({ type: HealthStatusDto })
  data!: HealthStatusDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
