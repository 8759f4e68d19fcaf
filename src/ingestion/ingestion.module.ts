import { Module } from "@nestjs/common";
import { StorageModule } from "../storage/storage.module";
import { ConsumerManager } from "./consumer-manager";
import { MessageValidator } from "./message-validator";

@Module({
  imports: [StorageModule],
  providers: [MessageValidator, ConsumerManager],
  exports: [ConsumerManager],
})
export class IngestionModule {}
