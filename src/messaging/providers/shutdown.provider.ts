import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from "@nestjs/common";
import { AmqpConnectionManager } from "amqp-connection-manager";
import { errorMessage } from "../helper/mq-helper";
import { MQ_CONNECTION } from "../mq.tokens";

/** Closes the AMQP connection after consumers have drained. */
@Injectable()
export class MqShutdown implements OnApplicationShutdown {
  private readonly logger = new Logger(MqShutdown.name);

  constructor(
    @Inject(MQ_CONNECTION) private readonly conn: AmqpConnectionManager | null,
  ) {}

  async onApplicationShutdown() {
    if (!this.conn) return;
    try {
      await this.conn.close();
      this.logger.log("AMQP connection closed.");
    } catch (err) {
      this.logger.warn(`AMQP close failed: ${errorMessage(err)}`);
    }
  }
}
