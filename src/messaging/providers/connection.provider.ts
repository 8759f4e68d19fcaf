import { Logger, Provider } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { connect, AmqpConnectionManager } from "amqp-connection-manager";
import { ingestionConfig } from "../../config/ingestion.config";
import { errorMessage } from "../helper/mq-helper";
import { MQ_CONNECTION } from "../mq.tokens";

export const MqConnectionProvider: Provider = {
  provide: MQ_CONNECTION,
  useFactory: (
    config: ConfigType<typeof ingestionConfig>,
  ): AmqpConnectionManager | null => {
    const urls = config.amqp.urls;
    if (!urls) return null;

    const logger = new Logger("AmqpConnection");
    const conn = connect(urls, {
      heartbeatIntervalInSeconds: 20,
      reconnectTimeInSeconds: 5,
    });
    conn.on("connect", () => logger.log("Connected to RabbitMQ"));
    conn.on("disconnect", ({ err }) =>
      logger.warn(`Disconnected: ${errorMessage(err)}`),
    );
    return conn;
  },
  inject: [ingestionConfig.KEY],
};
