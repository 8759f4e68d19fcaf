import { Test, TestingModule } from "@nestjs/testing";
import { ingestionConfig } from "../config/ingestion.config";
import { QUEUE_TRANSPORT_FACTORY } from "../messaging/mq.tokens";
import type { QueueTransportFactory } from "../messaging/mq.types";
import { SchemaRegistryModule } from "../schema-registry/schema-registry.module";
import { StorageWriter } from "../storage/storage-writer";
import { stockBody, testConfig } from "../testing/fixtures";
import { InMemoryTransport } from "../testing/in-memory-transport";
import { flush, Gate, ScriptedWriter } from "../testing/scripted-writer";
import { ConsumerManager } from "./consumer-manager";
import { MessageValidator } from "./message-validator";

describe("ConsumerManager", () => {
  let manager: ConsumerManager;
  let transports: Map<string, InMemoryTransport>;
  let writer: ScriptedWriter;

  async function build(factory: QueueTransportFactory | null) {
    const module: TestingModule = await Test.createTestingModule({
      imports: [SchemaRegistryModule],
      providers: [
        ConsumerManager,
        MessageValidator,
        { provide: StorageWriter, useValue: writer },
        { provide: QUEUE_TRANSPORT_FACTORY, useValue: factory },
        {
          provide: ingestionConfig.KEY,
          useValue: testConfig({ RABBITMQ_QUEUES: "stocks,prices" }),
        },
      ],
    }).compile();

    manager = module.get<ConsumerManager>(ConsumerManager);
  }

  beforeEach(async () => {
    transports = new Map();
    writer = new ScriptedWriter();
    await build((queue) => {
      const transport = new InMemoryTransport(queue);
      transports.set(queue, transport);
      return transport;
    });
  });

  afterEach(async () => {
    await manager.drainAndStop(50);
  });

  it("should start one consumer per configured queue", async () => {
    await manager.start();

    expect([...transports.keys()]).toEqual(["stocks", "prices"]);
    const health = manager.health();
    expect(health.status).toBe("healthy");
    expect(health.queues.map((q) => q.queue)).toEqual(["stocks", "prices"]);
  });

  it("should not create a second consumer when started twice", async () => {
    await manager.start();
    await manager.start();

    expect(manager.health().queues).toHaveLength(2);
  });

  it("should stay disabled without a broker", async () => {
    await build(null);
    await manager.start();

    expect(manager.health()).toEqual({ status: "disabled", queues: [] });
  });

  it("should report degraded and name the queue when one is unhealthy", async () => {
    await manager.start();
    const prices = transports.get("prices");
    if (prices) prices.connected = false;

    expect(manager.health().status).toBe("degraded");
    expect(manager.watchdogSweep()).toEqual(["prices"]);
  });

  it("should drain every queue and close its channel", async () => {
    await manager.start();

    await expect(manager.drainAndStop(1000)).resolves.toEqual({
      stocks: "drained",
      prices: "drained",
    });
    expect(transports.get("stocks")?.closed).toBe(true);
    expect(transports.get("prices")?.closed).toBe(true);
    expect(manager.health().queues).toEqual([]);
  });

  it("should force a queue whose in-flight message outlives the timeout", async () => {
    const gate = new Gate();
    writer.held = { productCode: "P-1", gate };
    await manager.start();

    const stuck = transports.get("stocks")?.deliver(stockBody("P-1"));
    await flush();

    await expect(manager.drainAndStop(20)).resolves.toEqual({
      stocks: "forced",
      prices: "drained",
    });
    expect(transports.get("stocks")?.closed).toBe(true);
    expect(stuck?.delivery.state).toBe("pending");

    gate.open();
    await stuck?.handled;
  });
});
