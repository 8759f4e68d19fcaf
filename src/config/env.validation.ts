import { plainToInstance, Type } from "class-transformer";
import {
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from "class-validator";
import { DEFAULT_BACKOFF_BASE_MS, DEFAULT_BACKOFF_MAX_MS } from "./ingestion.config";

export class EnvironmentVariables {
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(65535)
  PORT?: number;

  @IsOptional() @IsString()
  MONGODB_URI?: string;

  @IsOptional() @IsString()
  MONGODB_DB_NAME?: string;

  @IsOptional() @Type(() => Number) @IsInt() @Min(1)
  MONGODB_MAX_POOL_SIZE?: number;

  @IsOptional() @IsString()
  RABBITMQ_URL?: string;

  @IsOptional() @IsString()
  RABBITMQ_QUEUES?: string;

  @IsOptional() @IsString()
  RABBITMQ_DLQ_SUFFIX?: string;

  @IsOptional() @Type(() => Number) @IsInt() @Min(1)
  RABBITMQ_PREFETCH_COUNT?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(0)
  INGEST_MAX_RETRIES?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(0)
  INGEST_BACKOFF_BASE_MS?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(0)
  INGEST_BACKOFF_MAX_MS?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(1)
  STORE_WRITE_TIMEOUT_MS?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(1)
  CONSUMER_WATCHDOG_MS?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(0)
  SHUTDOWN_TIMEOUT_MS?: number;
}

/** Used as `ConfigModule.forRoot({ validate })`: fails startup on bad values. */
export function validateEnv(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(", ")}`)
      .join("; ");
    throw new Error(`Invalid environment: ${details}`);
  }

  // unset values fall back to the defaults buildIngestionConfig applies
  const base = validated.INGEST_BACKOFF_BASE_MS ?? DEFAULT_BACKOFF_BASE_MS;
  const max = validated.INGEST_BACKOFF_MAX_MS ?? DEFAULT_BACKOFF_MAX_MS;
  if (max < base) {
    throw new Error(
      `Invalid environment: INGEST_BACKOFF_MAX_MS (${max}) must not be less than INGEST_BACKOFF_BASE_MS (${base})`,
    );
  }
  return config;
}
