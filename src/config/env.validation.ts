import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Process environment accepted at startup.
 * The two LINE credentials are mandatory: the app refuses to boot without them.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty({ message: 'LINE_CHANNEL_ACCESS_TOKEN must be set' })
  LINE_CHANNEL_ACCESS_TOKEN!: string;

  @IsString()
  @IsNotEmpty({ message: 'LINE_CHANNEL_SECRET must be set' })
  LINE_CHANNEL_SECRET!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  HOST?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  LINE_API_BASE?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  WEATHER_BASE_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  WEATHER_TIMEOUT_MS?: number;
}

export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated);

  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
