// scripts/publish-test-message.ts
// Usage: npm run publish:test-message -- --queue stocks --product-code TEST-0001
import * as dotenv from "dotenv";
import { randomUUID } from "crypto";
import { parseArgs } from "util";
import { connect } from "amqp-connection-manager";
import type { ConfirmChannel } from "amqplib";
import { buildIngestionConfig } from "../src/config/ingestion.config";
import { deadLetterQueueName } from "../src/messaging/helper/mq-helper";
import { basePublishOpts, bindIngestTopology } from "../src/messaging/mq.topology";
import { CollectionName, isCollectionName } from "../src/schema-registry/schema.types";
dotenv.config();

export function sampleMessage(
  collection: CollectionName,
  productCode: string,
  now = new Date(),
): Record<string, unknown> {
  const stamp = now.toISOString();
  switch (collection) {
    case "products":
      return {
        collection,
        product_code: productCode,
        name: `Test Product ${productCode}`,
        description: "Sample product published by hand",
        category: "Test Category",
        brand: "TestBrand",
        sku: `SKU-${productCode}`,
        created_at: stamp,
        updated_at: stamp,
      };
    case "stocks":
      return {
        collection,
        product_code: productCode,
        warehouse_id: "WH-MAIN",
        quantity: 100,
        location: "A1-B2-C3",
        updated_at: stamp,
      };
    case "prices": {
      const expires = new Date(now);
      expires.setFullYear(expires.getFullYear() + 1);
      return {
        collection,
        product_code: productCode,
        price: 99.99,
        currency: "USD",
        effective_date: stamp,
        expires_at: expires.toISOString(),
        promotion_id: null,
      };
    }
  }
}

async function main() {
  const { values } = parseArgs({
    options: {
      queue: { type: "string", default: "products" },
      "product-code": { type: "string" },
    },
  });

  const queue = values.queue ?? "products";
  if (!isCollectionName(queue)) {
    throw new Error(`--queue must be one of products, stocks, prices (got ${queue})`);
  }
  const productCode =
    values["product-code"] ??
    `TEST-${randomUUID().slice(0, 8).toUpperCase()}`;

  const config = buildIngestionConfig(process.env);
  if (!config.amqp.urls) throw new Error("RABBITMQ_URL is not set");

  const conn = connect(config.amqp.urls);
  const dlq = deadLetterQueueName(queue, config.amqp.dlqSuffix);
  const ch = conn.createChannel({
    json: false,
    setup: (c: ConfirmChannel) => bindIngestTopology(c, queue, dlq),
  });

  try {
    await ch.waitForConnect();
    const message = sampleMessage(queue, productCode);
    await ch.sendToQueue(
      queue,
      Buffer.from(JSON.stringify(message)),
      basePublishOpts(randomUUID()),
    );
    console.log(`Published to ${queue}:`, JSON.stringify(message, null, 2));
  } finally {
    await ch.close();
    await conn.close();
  }
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
}
