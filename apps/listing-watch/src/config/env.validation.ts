import { plainToInstance } from 'class-transformer';
import { IsBooleanString, IsIn, IsInt, IsNumber, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

class EnvironmentVariables {
  @IsOptional()
  @IsIn(['postgres', 'sqljs'])
  DB_TYPE?: string;

  @IsOptional()
  @IsString()
  DB_PATH?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT?: number;

  @IsOptional()
  @IsBooleanString()
  DB_SSL?: string;

  @IsOptional()
  @IsBooleanString()
  DB_LOGGING?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  MAX_ARCHIVE_SIZE_MB?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  BATCH_SAMPLE_RATIO?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  ADDRESS_MATCH_THRESHOLD?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  LISTINGS_PER_EMAIL?: number;

  @IsOptional()
  @IsString()
  REPORT_TIME_ZONE?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  SMTP_PORT?: number;
}

/**
 * Checks the environment once at startup. The config namespaces read the
 * values afterwards, so the raw environment is passed through unchanged.
 */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const variables = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(variables, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors.map((error) => Object.values(error.constraints ?? {}).join(', ')).join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return config;
}
