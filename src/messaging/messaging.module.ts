import { Module, Global } from "@nestjs/common";
import { MQ_CONNECTION, QUEUE_TRANSPORT_FACTORY } from "./mq.tokens";
import { MQ_PROVIDERS } from "./providers";

@Global()
@Module({
  providers: [...MQ_PROVIDERS],
  exports: [MQ_CONNECTION, QUEUE_TRANSPORT_FACTORY],
})
export class MessagingModule {}
