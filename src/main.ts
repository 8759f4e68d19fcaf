import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { ingestionConfig } from "./config/ingestion.config";
import type { ConfigType } from "@nestjs/config";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get<ConfigType<typeof ingestionConfig>>(
    ingestionConfig.KEY,
  );

  app.enableCors();
  // consumers drain in beforeApplicationShutdown
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle("Catalog Ingestion API")
      .setDescription("Read access to ingested products, stocks and prices")
      .setVersion("1.0.0")
      .build(),
  );
  SwaggerModule.setup("docs", app, document);

  await app.listen(config.port);
  new Logger("Bootstrap").log(`Listening on :${config.port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger("Bootstrap").error(
    "Startup failed",
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
