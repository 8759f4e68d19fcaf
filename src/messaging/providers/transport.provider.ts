import { Provider } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import type { AmqpConnectionManager } from "amqp-connection-manager";
import { ingestionConfig } from "../../config/ingestion.config";
import { AmqpQueueTransport } from "../amqp-queue.transport";
import { deadLetterQueueName } from "../helper/mq-helper";
import { MQ_CONNECTION, QUEUE_TRANSPORT_FACTORY } from "../mq.tokens";
import type { QueueTransportFactory } from "../mq.types";

export const QueueTransportFactoryProvider: Provider = {
  provide: QUEUE_TRANSPORT_FACTORY,
  useFactory: (
    conn: AmqpConnectionManager | null,
    config: ConfigType<typeof ingestionConfig>,
  ): QueueTransportFactory | null => {
    if (!conn) return null;
    return (queue) =>
      new AmqpQueueTransport(
        conn,
        queue,
        deadLetterQueueName(queue, config.amqp.dlqSuffix),
        config.amqp.prefetch,
      );
  },
  inject: [MQ_CONNECTION, ingestionConfig.KEY],
};
