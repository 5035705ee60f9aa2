import { ConfigService } from '@nestjs/config';
import { plainToInstance, Transform } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
  validate,
} from 'class-validator';

import { ConfigValidationError } from '../errors/config-validation-error';
import { NtpConfig, NtpConfigBuilder } from './ntp-config';

export const NTP_CONFIG_TOKEN = 'NTP_CONFIG';

export const NTP_ENV_KEYS = [
  'NTP_SERVERS',
  'NTP_TIMEOUT_MS',
  'NTP_RETRY_COUNT',
  'NTP_RETRY_DELAY_MS',
  'NTP_SYNC_ON_INIT',
  'NTP_CACHE_DURATION_MS',
] as const;

export type NtpEnvironment = Partial<
  Record<(typeof NTP_ENV_KEYS)[number], string>
>;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function toNumber(value: unknown): unknown {
  const raw = blankToUndefined(value);
  return typeof raw === 'string' ? Number(raw.trim()) : raw;
}

function toServerList(value: unknown): unknown {
  const raw = blankToUndefined(value);
  if (typeof raw !== 'string') {
    return raw;
  }
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function toBoolean(value: unknown): unknown {
  const raw = blankToUndefined(value);
  if (typeof raw !== 'string') {
    return raw;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return raw;
}

function toCacheDuration(value: unknown): unknown {
  if (value === undefined) {
    return undefined;
  }
  const raw = blankToUndefined(value);
  if (raw === undefined) {
    return Infinity;
  }
  if (typeof raw === 'string' && raw.trim().toLowerCase() === 'infinite') {
    return Infinity;
  }
  return toNumber(raw);
}

/**
 * Raw `NTP_*` environment, coerced from strings. Unset keys keep the
 * builder defaults.
 */
export class NtpEnvironmentDto {
  @IsOptional()
  @Transform(({ value }) => toServerList(value))
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  NTP_SERVERS?: string[];

  @IsOptional()
  @Transform(({ value }) => toNumber(value))
  @IsInt()
  @IsPositive()
  NTP_TIMEOUT_MS?: number;

  @IsOptional()
  @Transform(({ value }) => toNumber(value))
  @IsInt()
  @Min(0)
  NTP_RETRY_COUNT?: number;

  @IsOptional()
  @Transform(({ value }) => toNumber(value))
  @IsInt()
  @Min(0)
  NTP_RETRY_DELAY_MS?: number;

  @IsOptional()
  @Transform(({ value }) => toBoolean(value))
  @IsBoolean()
  NTP_SYNC_ON_INIT?: boolean;

  // Empty or "infinite" keeps the offset fresh forever
  @IsOptional()
  @Transform(({ value }) => toCacheDuration(value))
  @IsNumber({ allowInfinity: true, allowNaN: false })
  @IsPositive()
  NTP_CACHE_DURATION_MS?: number;
}

/**
 * Validate the raw environment and build an {@link NtpConfig} from it.
 * Every problem, from the environment or from the builder, is reported in a
 * single ConfigValidationError.
 */
export async function parseNtpEnvironment(
  env: NtpEnvironment,
): Promise<NtpConfig> {
  const dto = plainToInstance(NtpEnvironmentDto, env);
  const errors = await validate(dto);

  if (errors.length > 0) {
    const messages = errors.map((error) => {
      const constraints = error.constraints
        ? Object.values(error.constraints).join(', ')
        : 'unknown validation error';
      return `${error.property}: ${constraints}`;
    });
    throw new ConfigValidationError(
      `NTP environment validation failed with ${messages.length} error(s)`,
      messages,
    );
  }

  const builder = new NtpConfigBuilder();
  if (dto.NTP_SERVERS !== undefined) builder.ntpServers(dto.NTP_SERVERS);
  if (dto.NTP_TIMEOUT_MS !== undefined) builder.timeoutMs(dto.NTP_TIMEOUT_MS);
  if (dto.NTP_RETRY_COUNT !== undefined) builder.retryCount(dto.NTP_RETRY_COUNT);
  if (dto.NTP_RETRY_DELAY_MS !== undefined) {
    builder.retryDelayMs(dto.NTP_RETRY_DELAY_MS);
  }
  if (dto.NTP_SYNC_ON_INIT !== undefined) {
    builder.syncOnInit(dto.NTP_SYNC_ON_INIT);
  }
  if (dto.NTP_CACHE_DURATION_MS !== undefined) {
    builder.cacheDurationMs(dto.NTP_CACHE_DURATION_MS);
  }
  return builder.build();
}

export function loadNtpConfig(configService: ConfigService): Promise<NtpConfig> {
  const env: NtpEnvironment = {};
  for (const key of NTP_ENV_KEYS) {
    const value = configService.get<string>(key);
    if (value !== undefined) {
      env[key] = String(value);
    }
  }
  return parseNtpEnvironment(env);
}
