import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { Cron, CronExpression } from "@nestjs/schedule";
import { ingestionConfig } from "../config/ingestion.config";
import { errorMessage } from "../messaging/helper/mq-helper";
import { QUEUE_TRANSPORT_FACTORY } from "../messaging/mq.tokens";
import type { QueueTransportFactory } from "../messaging/mq.types";
import { StorageWriter } from "../storage/storage-writer";
import { MessageValidator } from "./message-validator";
import { ConsumerHealth, QueueConsumer } from "./queue-consumer";
import { RetryPolicy } from "./retry-policy";

export type DrainOutcome = "drained" | "forced";

export type IngestionHealth = {
  status: "healthy" | "degraded" | "disabled";
  queues: ConsumerHealth[];
};

@Injectable()
export class ConsumerManager
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(ConsumerManager.name);
  private readonly consumers = new Map<string, QueueConsumer>();
  private readonly policy: RetryPolicy;

  constructor(
    @Inject(QUEUE_TRANSPORT_FACTORY)
    private readonly transports: QueueTransportFactory | null,
    @Inject(ingestionConfig.KEY)
    private readonly config: ConfigType<typeof ingestionConfig>,
    private readonly validator: MessageValidator,
    private readonly writer: StorageWriter,
  ) {
    this.policy = new RetryPolicy(config.retry);
  }

  async onApplicationBootstrap() {
    await this.start();
  }

  async beforeApplicationShutdown(signal?: string) {
    const outcome = await this.drainAndStop(this.config.shutdownTimeoutMs);
    this.logger.log(
      `Consumers stopped${signal ? ` on ${signal}` : ""}: ${JSON.stringify(outcome)}`,
    );
  }

  /** One consumer per configured queue, all pulling concurrently. */
  async start(): Promise<void> {
    if (!this.transports) {
      this.logger.warn("RABBITMQ_URL not set. Ingestion consumers are disabled.");
      return;
    }

    for (const queue of this.config.amqp.queues) {
      if (this.consumers.has(queue)) continue;
      this.consumers.set(
        queue,
        new QueueConsumer({
          transport: this.transports(queue),
          validator: this.validator,
          writer: this.writer,
          policy: this.policy,
          watchdogMs: this.config.watchdogMs,
        }),
      );
    }

    await Promise.all([...this.consumers.values()].map((c) => c.start()));
    this.logger.log(`Started consumers: ${[...this.consumers.keys()].join(", ")}`);
  }

  /**
   * Each queue gets `timeoutMs` to settle its in-flight message; past that
   * its channel is closed and the broker redelivers what was unacked.
   */
  async drainAndStop(timeoutMs: number): Promise<Record<string, DrainOutcome>> {
    const entries = [...this.consumers.entries()];
    this.consumers.clear();

    const results = await Promise.all(
      entries.map(
        async ([queue, consumer]) =>
          [queue, await this.drainOne(consumer, timeoutMs)] as const,
      ),
    );
    return Object.fromEntries(results);
  }

  health(): IngestionHealth {
    const queues = [...this.consumers.values()].map((c) => c.health());
    if (!this.transports) return { status: "disabled", queues };
    const healthy = queues.length > 0 && queues.every((q) => q.healthy);
    return { status: healthy ? "healthy" : "degraded", queues };
  }

  @Cron(CronExpression.EVERY_10_SECONDS)
  watchdogSweep(): string[] {
    const unhealthy = this.health().queues.filter((q) => !q.healthy);
    for (const q of unhealthy) {
      this.logger.warn(
        `Queue ${q.queue} unhealthy: connected=${q.connected} consuming=${q.consuming} stalled=${q.stalled}` +
          (q.inFlightSince ? ` inFlightSince=${q.inFlightSince}` : ""),
      );
    }
    return unhealthy.map((q) => q.queue);
  }

  private async drainOne(
    consumer: QueueConsumer,
    timeoutMs: number,
  ): Promise<DrainOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<DrainOutcome>((resolve) => {
      timer = setTimeout(() => resolve("forced"), timeoutMs);
    });
    const drained = consumer.drain().then(
      (): DrainOutcome => "drained",
      (err: unknown): DrainOutcome => {
        this.logger.error(`Drain ${consumer.queue} failed: ${errorMessage(err)}`);
        return "forced";
      },
    );

    try {
      const outcome = await Promise.race([drained, timedOut]);
      if (outcome === "forced") {
        this.logger.warn(`Forcing ${consumer.queue} closed`);
        await consumer.abort();
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}
