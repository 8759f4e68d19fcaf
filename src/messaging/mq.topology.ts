// mq.topology.ts
import type { Channel, Options } from "amqplib";

export const DLQ_MESSAGE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Source queue plus its dead-letter queue. Messages the broker itself
 * dead-letters (expiry, reject without requeue) land in the same DLQ.
 */
export async function bindIngestTopology(
  ch: Pick<Channel, "assertQueue">,
  queue: string,
  deadLetterQueue: string,
): Promise<void> {
  await ch.assertQueue(deadLetterQueue, {
    durable: true,
    arguments: { "x-message-ttl": DLQ_MESSAGE_TTL_MS },
  });

  await ch.assertQueue(queue, {
    durable: true,
    arguments: {
      "x-dead-letter-exchange": "", // default exchange
      "x-dead-letter-routing-key": deadLetterQueue,
    },
  });
}

export function basePublishOpts(
  messageId: string,
  headers: Record<string, unknown> = {},
): Options.Publish {
  return {
    persistent: true,
    contentType: "application/json",
    messageId,
    headers,
    timestamp: Date.now(),
  };
}
