import { Module } from "@nestjs/common";
import { ConfigModule, ConfigType } from "@nestjs/config";
import { MongooseModule } from "@nestjs/mongoose";
import { ScheduleModule } from "@nestjs/schedule";
import { CatalogModule } from "./catalog/catalog.module";
import { validateEnv } from "./config/env.validation";
import { ingestionConfig } from "./config/ingestion.config";
import { HealthModule } from "./health/health.module";
import { IngestionModule } from "./ingestion/ingestion.module";
import { MessagingModule } from "./messaging/messaging.module";
import { SchemaRegistryModule } from "./schema-registry/schema-registry.module";

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
      load: [ingestionConfig],
      validate: validateEnv,
    }),
    MongooseModule.forRootAsync({
      inject: [ingestionConfig.KEY],
      useFactory: (config: ConfigType<typeof ingestionConfig>) => ({
        uri: config.mongo.uri,
        dbName: config.mongo.dbName,
        maxPoolSize: config.mongo.maxPoolSize,
      }),
    }),
    SchemaRegistryModule,
    MessagingModule,
    IngestionModule,
    CatalogModule,
    HealthModule,
  ],
})
export class AppModule {}
