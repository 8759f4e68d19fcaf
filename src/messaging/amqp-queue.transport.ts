import { Logger } from "@nestjs/common";
import type { ConfirmChannel, ConsumeMessage, Options } from "amqplib";
import type { DeadLetter } from "../ingestion/ingestion.types";
import { errorMessage, readRedeliveryCount } from "./helper/mq-helper";
import { basePublishOpts, bindIngestTopology } from "./mq.topology";
import type {
  DeliveryHandler,
  InboundDelivery,
  QueueTransport,
} from "./mq.types";

/** The parts of a ConfirmChannel the transport drives. */
export type ConsumeChannel = Pick<
  ConfirmChannel,
  "assertQueue" | "prefetch" | "consume" | "ack" | "nack" | "cancel"
>;

/** The parts of an amqp-connection-manager ChannelWrapper the transport uses. */
export interface ManagedChannel {
  on(event: "error", listener: (err: Error) => void): unknown;
  sendToQueue(
    queue: string,
    content: Buffer,
    options?: Options.Publish,
  ): Promise<boolean>;
  close(): Promise<void>;
}

/** The parts of an AmqpConnectionManager the transport uses. */
export interface ChannelSource {
  createChannel(opts: {
    name?: string;
    json?: boolean;
    setup: (ch: ConsumeChannel) => Promise<void>;
  }): ManagedChannel;
  isConnected(): boolean;
}

/**
 * QueueTransport over amqp-connection-manager. The consume call lives in
 * the channel setup so it is re-issued after every reconnect; acks go to
 * the raw channel the message came from. A consumer the broker cancels
 * (queue deleted, leader moved) is subscribed again on the same channel.
 */
export class AmqpQueueTransport implements QueueTransport {
  private readonly logger: Logger;
  private channelWrapper: ManagedChannel | null = null;
  private channel: ConsumeChannel | null = null;
  private consumerTag: string | null = null;
  private handler: DeliveryHandler | null = null;

  constructor(
    private readonly conn: ChannelSource,
    readonly queue: string,
    readonly deadLetterQueue: string,
    private readonly prefetch: number,
  ) {
    this.logger = new Logger(`AmqpQueueTransport:${queue}`);
  }

  async consume(handler: DeliveryHandler): Promise<void> {
    this.handler = handler;
    if (this.channelWrapper) {
      if (this.channel && !this.consumerTag) await this.setup(this.channel);
      return;
    }

    this.channelWrapper = this.conn.createChannel({
      name: `ingest:${this.queue}`,
      json: false,
      setup: this.setup,
    });
    this.channelWrapper.on("error", (err: Error) => {
      this.logger.error(`Channel error: ${err.message}`);
    });
  }

  private setup = async (ch: ConsumeChannel): Promise<void> => {
    await bindIngestTopology(ch, this.queue, this.deadLetterQueue);
    await ch.prefetch(this.prefetch);
    this.channel = ch;
    this.consumerTag = null;

    if (!this.handler) return;

    const { consumerTag } = await ch.consume(
      this.queue,
      (msg) => {
        if (msg) void this.dispatch(ch, msg);
        else void this.resubscribe(ch);
      },
      { noAck: false },
    );
    this.consumerTag = consumerTag;
    this.logger.log(`Consuming ${this.queue} (prefetch=${this.prefetch})`);
  };

  private async resubscribe(ch: ConsumeChannel): Promise<void> {
    this.consumerTag = null;
    if (!this.handler || this.channel !== ch) return;
    this.logger.warn(`Consumer on ${this.queue} was cancelled by the broker, subscribing again`);
    try {
      await this.setup(ch);
    } catch (err) {
      this.logger.error(`Re-subscribe to ${this.queue} failed: ${errorMessage(err)}`);
    }
  }

  private async dispatch(ch: ConsumeChannel, msg: ConsumeMessage) {
    const delivery = this.toDelivery(ch, msg);
    const handler = this.handler;
    if (!handler) {
      delivery.requeue();
      return;
    }
    try {
      await handler(delivery);
    } catch (err) {
      this.logger.error(
        `Unhandled delivery error [msgId=${delivery.messageId}]: ${errorMessage(err)}`,
      );
      delivery.requeue();
    }
  }

  private toDelivery(ch: ConsumeChannel, msg: ConsumeMessage): InboundDelivery {
    const { deliveryTag } = msg.fields;
    const messageId = String(
      msg.properties.messageId ?? `no-message-id:${deliveryTag}`,
    );

    return {
      content: msg.content,
      messageId,
      deliveryTag,
      redeliveryCount: readRedeliveryCount(msg),
      ack: () => {
        try {
          ch.ack(msg);
        } catch (err) {
          // channel gone: the broker redelivers the message on its own
          this.logger.warn(
            `Ack failed [msgId=${messageId}]: ${errorMessage(err)}`,
          );
        }
      },
      requeue: () => {
        try {
          ch.nack(msg, false, true);
        } catch (err) {
          this.logger.warn(
            `Requeue failed [msgId=${messageId}]: ${errorMessage(err)}`,
          );
        }
      },
    };
  }

  async cancel(): Promise<void> {
    this.handler = null;
    const ch = this.channel;
    const tag = this.consumerTag;
    this.consumerTag = null;
    if (!ch || !tag) return;

    try {
      await ch.cancel(tag);
    } catch (err) {
      this.logger.warn(`Cancel failed: ${errorMessage(err)}`);
    }
  }

  async publishDeadLetter(letter: DeadLetter): Promise<void> {
    if (!this.channelWrapper) {
      throw new Error(`Channel for ${this.queue} is not open`);
    }
    await this.channelWrapper.sendToQueue(
      this.deadLetterQueue,
      Buffer.from(JSON.stringify(letter)),
      basePublishOpts(letter.message_id, {
        "x-failure-reason": letter.failure_reason,
        "x-source-queue": this.queue,
      }),
    );
  }

  isConnected(): boolean {
    return this.channelWrapper !== null && this.conn.isConnected();
  }

  isConsuming(): boolean {
    return this.isConnected() && this.consumerTag !== null;
  }

  async close(): Promise<void> {
    const wrapper = this.channelWrapper;
    this.channelWrapper = null;
    this.channel = null;
    if (wrapper) await wrapper.close();
  }
}
