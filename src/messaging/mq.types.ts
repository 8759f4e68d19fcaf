import type { DeadLetter } from "../ingestion/ingestion.types";

/** One broker delivery, detached from the channel it arrived on. */
export interface InboundDelivery {
  readonly content: Buffer;
  readonly messageId: string;
  readonly deliveryTag: number;
  /** previous delivery attempts reported by the broker */
  readonly redeliveryCount: number;
  ack(): void;
  /** hand the message back to the broker for redelivery */
  requeue(): void;
}

export type DeliveryHandler = (delivery: InboundDelivery) => Promise<void>;

export interface QueueTransport {
  readonly queue: string;
  readonly deadLetterQueue: string;
  consume(handler: DeliveryHandler): Promise<void>;
  /** stop receiving new deliveries; unacked ones stay with the channel */
  cancel(): Promise<void>;
  publishDeadLetter(letter: DeadLetter): Promise<void>;
  isConnected(): boolean;
  /** a consumer is subscribed and the broker has not cancelled it */
  isConsuming(): boolean;
  close(): Promise<void>;
}

export type QueueTransportFactory = (queue: string) => QueueTransport;
