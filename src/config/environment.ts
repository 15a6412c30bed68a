import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { describeValidationErrors } from '../adapters/providers/hmac';

const toBoolean = ({ value }: { value: unknown }): boolean => value === true || value === 'true';

/**
 * Environment variables read at startup. Validated by ConfigModule; a bad
 * value stops the process before anything listens.
 */
export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 4010;

  @IsIn(['mock', 'typeorm'])
  STORAGE_TYPE: 'mock' | 'typeorm' = 'mock';

  @IsOptional()
  @IsString()
  DB_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  DB_PORT?: number;

  @IsOptional()
  @IsString()
  DB_USERNAME?: string;

  @IsOptional()
  @IsString()
  DB_PASSWORD?: string;

  @IsOptional()
  @IsString()
  DB_NAME?: string;

  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE: boolean = false;

  /**
   * Comma-separated, newest first
   */
  @IsNotEmpty()
  @IsString()
  PAYMENT_WEBHOOK_SECRETS!: string;

  @IsString()
  PAYMENT_SIGNATURE_HEADER: string = 'x-signature';

  @IsOptional()
  @IsUrl({ require_tld: false })
  PAYMENT_API_URL?: string;

  @IsOptional()
  @IsString()
  PAYMENT_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  ENRICHMENT_API_URL?: string;

  @IsOptional()
  @IsString()
  ENRICHMENT_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  CONTENT_API_URL?: string;

  @IsOptional()
  @IsString()
  CONTENT_API_KEY?: string;

  @IsOptional()
  @IsString()
  TELEGRAM_BOT_TOKEN?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  STEP_MAX_ATTEMPTS: number = 3;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  PAYMENT_TIMEOUT_MINUTES: number = 30;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  EVENT_RETENTION_DAYS: number = 30;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  SWEEP_INTERVAL_MS: number = 60_000;

  @IsString()
  PRODUCT_CATALOG_PATH: string = 'config/products.json';
}

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(`Invalid environment: ${describeValidationErrors(errors).join('; ')}`);
  }
  return validated;
}

export function parseSecrets(value: string): string[] {
  return value
    .split(',')
    .map((secret) => secret.trim())
    .filter((secret) => secret.length > 0);
}
