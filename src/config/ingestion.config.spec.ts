import { validateEnv } from "./env.validation";
import { buildIngestionConfig, parseQueueList } from "./ingestion.config";

describe("buildIngestionConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(buildIngestionConfig({})).toEqual({
      port: 8000,
      mongo: {
        uri: "mongodb://localhost:27017/data_ingestion",
        dbName: "data_ingestion",
        maxPoolSize: 10,
      },
      amqp: {
        urls: null,
        queues: ["products", "stocks", "prices"],
        dlqSuffix: ".dlq",
        prefetch: 1,
      },
      retry: { maxRetries: 3, backoffBaseMs: 1000, backoffMaxMs: 30000 },
      storeWriteTimeoutMs: 5000,
      watchdogMs: 60000,
      shutdownTimeoutMs: 10000,
    });
  });

  it("should read overrides", () => {
    const config = buildIngestionConfig({
      PORT: "9000",
      RABBITMQ_URL: "amqp://guest:test-secret@mq:5672",
      RABBITMQ_QUEUES: "stocks",
      INGEST_MAX_RETRIES: "5",
      INGEST_BACKOFF_BASE_MS: "250",
    });

    expect(config.port).toBe(9000);
    expect(config.amqp.urls).toEqual(["amqp://guest:test-secret@mq:5672"]);
    expect(config.amqp.queues).toEqual(["stocks"]);
    expect(config.retry).toEqual({ maxRetries: 5, backoffBaseMs: 250, backoffMaxMs: 30000 });
  });

  it("should trim and dedupe the queue list", () => {
    expect(parseQueueList(" stocks, prices ,stocks,")).toEqual(["stocks", "prices"]);
    expect(parseQueueList("  ")).toEqual(["products", "stocks", "prices"]);
  });
});

describe("validateEnv", () => {
  it("should pass a valid environment through unchanged", () => {
    const env = { PORT: "8080", INGEST_MAX_RETRIES: "0", UNRELATED: "x" };
    expect(validateEnv(env)).toBe(env);
  });

  it("should reject non-numeric and out-of-range values", () => {
    expect(() => validateEnv({ INGEST_MAX_RETRIES: "many" })).toThrow(
      /^Invalid environment: INGEST_MAX_RETRIES: /,
    );
    expect(() => validateEnv({ RABBITMQ_PREFETCH_COUNT: "0" })).toThrow(
      "Invalid environment: RABBITMQ_PREFETCH_COUNT: RABBITMQ_PREFETCH_COUNT must not be less than 1",
    );
  });

  it("should reject a backoff cap below the base delay", () => {
    expect(() =>
      validateEnv({ INGEST_BACKOFF_BASE_MS: "5000", INGEST_BACKOFF_MAX_MS: "2000" }),
    ).toThrow(
      "Invalid environment: INGEST_BACKOFF_MAX_MS (2000) must not be less than INGEST_BACKOFF_BASE_MS (5000)",
    );
    expect(() => validateEnv({ INGEST_BACKOFF_MAX_MS: "500" })).toThrow(
      "Invalid environment: INGEST_BACKOFF_MAX_MS (500) must not be less than INGEST_BACKOFF_BASE_MS (1000)",
    );
  });

  it("should accept a backoff cap equal to the base delay", () => {
    const env = { INGEST_BACKOFF_BASE_MS: "2000", INGEST_BACKOFF_MAX_MS: "2000" };
    expect(validateEnv(env)).toBe(env);
  });
});
