import { ApiProperty } from '@nestjs/swagger';

export class TimeSnapshotDto {
  @ApiProperty({
    description: 'Network time (system time plus offset) in epoch ms',
    example: 1704067200250,
  })
  epochMillis!: number;

  @ApiProperty({ description: 'Network time as ISO 8601' })
  iso!: string;

  @ApiProperty({
    description: 'Network time minus local time in ms',
    example: 250,
  })
  offsetMillis!: number;

  @ApiProperty({ description: 'Whether a sync has succeeded since start or reset' })
  isSynced!: boolean;

  @ApiProperty({
    description: 'Local epoch ms of the last successful sync',
    type: Number,
    nullable: true,
  })
  lastSyncTimeMillis!: number | null;

  @ApiProperty({
    description: 'Unsynchronized, or older than the cache duration',
  })
  isStale!: boolean;
}

export class TimeSnapshotResponseDto {
  @ApiProperty({ type: TimeSnapshotDto })
  data!: TimeSnapshotDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class NetworkTimeDto {
  @ApiProperty({ description: 'Network time as ISO 8601' })
  networkTime!: string;

  @ApiProperty({ example: 1704067200250 })
  epochMillis!: number;
}

export class NetworkTimeResponseDto {
  @ApiProperty({ type: NetworkTimeDto })
  data!: NetworkTimeDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
