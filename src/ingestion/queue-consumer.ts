import { Logger } from "@nestjs/common";
import { setTimeout as sleep } from "timers/promises";
import { errorMessage, safeJsonParse } from "../messaging/helper/mq-helper";
import type { InboundDelivery, QueueTransport } from "../messaging/mq.types";
import type {
  DeadLetter,
  IngestMessage,
  MessageValidation,
  RecordWriter,
} from "./ingestion.types";
import { PipelineStage, PipelineState, RetryPolicy } from "./retry-policy";

export type Delay = (ms: number, signal: AbortSignal) => Promise<void>;

export type QueueConsumerOptions = {
  transport: QueueTransport;
  validator: MessageValidation;
  writer: RecordWriter;
  policy: RetryPolicy;
  /** in-flight age after which the queue reports itself stalled */
  watchdogMs: number;
  delay?: Delay;
  clock?: () => Date;
};

export type ConsumerCounters = {
  acknowledged: number;
  deadLettered: number;
  retries: number;
  requeued: number;
};

export type ConsumerHealth = ConsumerCounters & {
  queue: string;
  running: boolean;
  connected: boolean;
  /** false after the broker cancelled the consumer until it is subscribed again */
  consuming: boolean;
  stalled: boolean;
  healthy: boolean;
  stage: PipelineStage | null;
  inFlightSince: string | null;
  lastProgressAt: string | null;
};

type DeadLetteredState = Extract<PipelineState, { stage: "DeadLettered" }>;

const defaultDelay: Delay = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

/**
 * Pulls one queue strictly in order: the next delivery is not looked at
 * until the previous one has been acked, dead-lettered or requeued.
 * Retries happen in place while the delivery stays unacked.
 */
export class QueueConsumer {
  private readonly logger: Logger;
  private readonly delay: Delay;
  private readonly clock: () => Date;

  private running = false;
  private accepting = false;
  private chain: Promise<void> = Promise.resolve();
  private backoff = new AbortController();

  private stage: PipelineStage | null = null;
  private inFlightSince: Date | null = null;
  private lastProgressAt: Date | null = null;
  private readonly counters: ConsumerCounters = {
    acknowledged: 0,
    deadLettered: 0,
    retries: 0,
    requeued: 0,
  };

  constructor(private readonly opts: QueueConsumerOptions) {
    this.logger = new Logger(`QueueConsumer:${opts.transport.queue}`);
    this.delay = opts.delay ?? defaultDelay;
    this.clock = opts.clock ?? (() => new Date());
  }

  get queue(): string {
    return this.opts.transport.queue;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.accepting = true;
    this.backoff = new AbortController();
    await this.opts.transport.consume((delivery) => this.enqueue(delivery));
    this.logger.log(
      `Consuming ${this.queue} (dead letters → ${this.opts.transport.deadLetterQueue})`,
    );
  }

  /**
   * Stops taking deliveries, cuts any pending backoff short and waits for
   * the in-flight message to settle before closing the channel.
   */
  async drain(): Promise<void> {
    if (!this.running) return;
    this.accepting = false;
    this.backoff.abort();
    await this.opts.transport.cancel();
    await this.chain;
    this.running = false;
    await this.opts.transport.close();
    this.logger.log(`Drained ${this.queue}`);
  }

  /** Closes the channel without waiting; the broker redelivers unacked messages. */
  async abort(): Promise<void> {
    this.accepting = false;
    this.backoff.abort();
    this.running = false;
    try {
      await this.opts.transport.close();
    } catch (err) {
      this.logger.warn(`Close ${this.queue} failed: ${errorMessage(err)}`);
    }
  }

  health(now: Date = this.clock()): ConsumerHealth {
    const { transport } = this.opts;
    const connected = this.running && transport.isConnected();
    const consuming = connected && transport.isConsuming();
    const stalled =
      this.inFlightSince !== null &&
      now.getTime() - this.inFlightSince.getTime() > this.opts.watchdogMs;

    return {
      queue: this.queue,
      running: this.running,
      connected,
      consuming,
      stalled,
      healthy: this.running && consuming && !stalled,
      stage: this.stage,
      inFlightSince: this.inFlightSince?.toISOString() ?? null,
      lastProgressAt: this.lastProgressAt?.toISOString() ?? null,
      ...this.counters,
    };
  }

  private enqueue(delivery: InboundDelivery): Promise<void> {
    const run = this.chain.then(() => this.handle(delivery));
    this.chain = run;
    return run;
  }

  private async handle(delivery: InboundDelivery): Promise<void> {
    if (!this.accepting) {
      this.requeue(delivery);
      return;
    }

    this.inFlightSince = this.clock();
    try {
      await this.process(delivery);
    } catch (err) {
      this.logger.error(
        `Unexpected failure on ${delivery.messageId}, requeueing: ${errorMessage(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      this.requeue(delivery);
    } finally {
      this.stage = null;
      this.inFlightSince = null;
      this.lastProgressAt = this.clock();
    }
  }

  private async process(delivery: InboundDelivery): Promise<void> {
    const { policy, validator, writer } = this.opts;

    this.stage = "Received";
    const message: IngestMessage = {
      body: safeJsonParse(delivery.content.toString("utf8")),
      messageId: delivery.messageId,
      deliveryTag: delivery.deliveryTag,
      redeliveryCount: delivery.redeliveryCount,
      receivedAt: this.clock(),
    };

    this.stage = "Validating";
    const validated = policy.afterValidation(
      validator.validate(message),
      delivery.redeliveryCount,
    );
    if (validated.stage === "Rejected") {
      this.stage = validated.stage;
      await this.deadLetter(delivery, message, policy.afterRejection(validated), null);
      return;
    }

    let persisting = validated;
    for (;;) {
      this.stage = persisting.stage;
      const next = policy.afterPersist(
        persisting,
        await writer.persist(persisting.record),
      );

      switch (next.stage) {
        case "Acknowledged":
          delivery.ack();
          this.counters.acknowledged++;
          this.logger.debug(
            `${persisting.record.collection}/${persisting.record.productCode} ${
              next.applied ? "written" : "skipped (stale)"
            } after ${next.attempts} attempt(s)`,
          );
          return;

        case "DeadLettered":
          await this.deadLetter(delivery, message, next, persisting.record.productCode);
          return;

        case "RetryScheduled": {
          this.stage = next.stage;
          this.counters.retries++;
          this.logger.warn(
            `[msgId=${delivery.messageId}] ${persisting.record.productCode} attempt ${next.attempt + 1} failed (${next.reason}), retry in ${next.delayMs}ms: ${next.cause}`,
          );
          if (!(await this.wait(next.delayMs))) {
            this.logger.warn(
              `Backoff cancelled for ${delivery.messageId}, handing it back to the broker`,
            );
            this.requeue(delivery);
            return;
          }
          persisting = policy.afterBackoff(next);
        }
      }
    }
  }

  /** false when the wait was cut short by drain/abort */
  private async wait(ms: number): Promise<boolean> {
    const signal = this.backoff.signal;
    if (signal.aborted) return false;
    try {
      await this.delay(ms, signal);
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }

  private async deadLetter(
    delivery: InboundDelivery,
    message: IngestMessage,
    state: DeadLetteredState,
    productCode: string | null,
  ): Promise<void> {
    const letter: DeadLetter = {
      original_message: message.body,
      failure_reason: state.reason,
      detail: state.detail,
      attempts: state.attempts,
      source_queue: this.queue,
      message_id: message.messageId,
      failed_at: this.clock().toISOString(),
    };
    if (state.field !== undefined) letter.field = state.field;

    // publish must succeed before the original is acked
    await this.opts.transport.publishDeadLetter(letter);
    this.stage = state.stage;
    delivery.ack();
    this.counters.deadLettered++;
    this.logger.warn(
      `[msgId=${message.messageId}] ${productCode ?? "-"} dead-lettered after ${state.attempts} attempt(s): ${state.reason} (${state.detail})`,
    );
  }

  private requeue(delivery: InboundDelivery): void {
    delivery.requeue();
    this.counters.requeued++;
  }
}
