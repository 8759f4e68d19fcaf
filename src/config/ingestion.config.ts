import { registerAs } from "@nestjs/config";
import { parseAmqpUrls } from "../messaging/helper/mq-helper";

export type IngestionConfig = {
  port: number;
  mongo: {
    uri: string;
    dbName: string;
    maxPoolSize: number;
  };
  amqp: {
    /** null = consumers disabled */
    urls: string[] | null;
    queues: string[];
    dlqSuffix: string;
    prefetch: number;
  };
  retry: {
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  storeWriteTimeoutMs: number;
  watchdogMs: number;
  shutdownTimeoutMs: number;
};

export const DEFAULT_BACKOFF_BASE_MS = 1000;
export const DEFAULT_BACKOFF_MAX_MS = 30_000;

function intFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isInteger(n) ? n : fallback;
}

export function parseQueueList(value: string | undefined): string[] {
  const raw = value?.trim() ? value : "products,stocks,prices";
  const names = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return [...new Set(names)];
}

export function buildIngestionConfig(
  env: Record<string, string | undefined>,
): IngestionConfig {
  return {
    port: intFrom(env.PORT, 8000),
    mongo: {
      uri: env.MONGODB_URI || "mongodb://localhost:27017/data_ingestion",
      dbName: env.MONGODB_DB_NAME || "data_ingestion",
      maxPoolSize: intFrom(env.MONGODB_MAX_POOL_SIZE, 10),
    },
    amqp: {
      urls: parseAmqpUrls(env.RABBITMQ_URL),
      queues: parseQueueList(env.RABBITMQ_QUEUES),
      dlqSuffix: env.RABBITMQ_DLQ_SUFFIX || ".dlq",
      prefetch: intFrom(env.RABBITMQ_PREFETCH_COUNT, 1),
    },
    retry: {
      maxRetries: intFrom(env.INGEST_MAX_RETRIES, 3),
      backoffBaseMs: intFrom(env.INGEST_BACKOFF_BASE_MS, DEFAULT_BACKOFF_BASE_MS),
      backoffMaxMs: intFrom(env.INGEST_BACKOFF_MAX_MS, DEFAULT_BACKOFF_MAX_MS),
    },
    storeWriteTimeoutMs: intFrom(env.STORE_WRITE_TIMEOUT_MS, 5000),
    watchdogMs: intFrom(env.CONSUMER_WATCHDOG_MS, 60_000),
    shutdownTimeoutMs: intFrom(env.SHUTDOWN_TIMEOUT_MS, 10_000),
  };
}

export const ingestionConfig = registerAs("ingestion", () =>
  buildIngestionConfig(process.env),
);
