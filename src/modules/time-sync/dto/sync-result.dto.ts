import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class SyncResultDto {
  @ApiProperty({ enum: ['success', 'failure'] })
  status!: 'success' | 'failure';

  @ApiPropertyOptional({ example: 250 })
  offsetMillis?: number;

  @ApiPropertyOptional({ example: 42 })
  roundTripDelayMillis?: number;

  @ApiPropertyOptional({
    description: 'Server entry that answered',
    example: 'time.google.com',
  })
  serverAddress?: string;

  @ApiPropertyOptional({ example: 'Failed to sync with any NTP server' })
  error?: string;

  @ApiPropertyOptional({ description: 'Message of the last attempt failure' })
  cause?: string;
}

export class SyncResultResponseDto {
  @ApiProperty({ type: SyncResultDto })
  data!: SyncResultDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
