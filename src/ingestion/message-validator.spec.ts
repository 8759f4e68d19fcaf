import { Test, TestingModule } from "@nestjs/testing";
import { SchemaRegistryModule } from "../schema-registry/schema-registry.module";
import { message, stockBody, T0 } from "../testing/fixtures";
import { MessageValidator } from "./message-validator";

describe("MessageValidator", () => {
  let validator: MessageValidator;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [SchemaRegistryModule],
      providers: [MessageValidator],
    }).compile();

    validator = module.get<MessageValidator>(MessageValidator);
  });

  it("should accept a valid stock update and fill optional defaults", () => {
    expect(validator.validate(message(stockBody("P-100", 42)))).toEqual({
      valid: true,
      record: {
        collection: "stocks",
        productCode: "P-100",
        fields: { warehouse_id: "WH-1", quantity: 42, location: null, updated_at: null },
        receivedAt: T0,
      },
    });
  });

  it("should apply product defaults and ignore unknown fields", () => {
    const result = validator.validate(
      message({
        collection: "products",
        product_code: "P-200",
        name: "Desk Lamp",
        colour: "green",
      }),
    );

    expect(result).toEqual({
      valid: true,
      record: {
        collection: "products",
        productCode: "P-200",
        fields: {
          name: "Desk Lamp",
          description: "",
          category: null,
          brand: null,
          price: null,
          currency: "USD",
          sku: null,
          created_at: null,
          updated_at: null,
        },
        receivedAt: T0,
      },
    });
  });

  it("should keep the timestamps a producer sends with products and stocks", () => {
    const stamp = "2026-02-27T08:30:00.000Z";
    const product = validator.validate(
      message({
        collection: "products",
        product_code: "P-300",
        name: "Desk Lamp",
        created_at: stamp,
        updated_at: stamp,
      }),
    );
    const stock = validator.validate(message({ ...stockBody("P-300"), updated_at: stamp }));

    expect(product.valid && product.record.fields).toMatchObject({
      created_at: stamp,
      updated_at: stamp,
    });
    expect(stock.valid && stock.record.fields).toEqual({
      warehouse_id: "WH-1",
      quantity: 5,
      location: null,
      updated_at: stamp,
    });
  });

  it("should reject a stock updated_at that is not a string", () => {
    expect(
      validator.validate(message({ ...stockBody(), updated_at: 1700000000 })),
    ).toMatchObject({ valid: false, reason: "SchemaMismatch", field: "updated_at" });
  });

  it("should accept a price with a zero amount", () => {
    const result = validator.validate(
      message({ collection: "prices", product_code: "P-1", price: 0, currency: "EUR" }),
    );
    expect(result.valid).toBe(true);
  });

  it.each([
    ["a string", "not json"],
    ["an array", [1, 2]],
    ["null", null],
    ["a number", 7],
  ])("should reject %s body as MalformedPayload", (_label, body) => {
    expect(validator.validate(message(body))).toEqual({
      valid: false,
      reason: "MalformedPayload",
      detail: "message body is not a JSON object",
    });
  });

  it("should reject a missing collection", () => {
    expect(validator.validate(message({ product_code: "P-1" }))).toEqual({
      valid: false,
      reason: "UnknownCollection",
      field: "collection",
      detail: "collection is missing",
    });
  });

  it("should reject an unknown collection", () => {
    expect(
      validator.validate(message({ collection: "orders", product_code: "P-1" })),
    ).toEqual({
      valid: false,
      reason: "UnknownCollection",
      field: "collection",
      detail: "unknown collection: orders",
    });
  });

  it.each([
    ["missing", undefined],
    ["empty", ""],
    ["blank", "   "],
    ["not a string", 123],
  ])("should reject a %s product_code as MissingIdentifier", (_label, code) => {
    const body = { ...stockBody(), product_code: code };
    expect(validator.validate(message(body))).toEqual({
      valid: false,
      reason: "MissingIdentifier",
      field: "product_code",
      detail: "product_code is missing or empty",
    });
  });

  it("should reject a missing required field", () => {
    const result = validator.validate(
      message({ collection: "stocks", product_code: "P-1", warehouse_id: "WH-1" }),
    );
    expect(result).toEqual({
      valid: false,
      reason: "SchemaMismatch",
      field: "quantity",
      detail: "missing required field: quantity",
    });
  });

  it("should treat an explicit null required field as missing", () => {
    const result = validator.validate(
      message({ ...stockBody(), warehouse_id: null }),
    );
    expect(result).toMatchObject({
      valid: false,
      reason: "SchemaMismatch",
      field: "warehouse_id",
    });
  });

  it("should reject a string quantity", () => {
    expect(validator.validate(message(stockBody("P-1", "five")))).toEqual({
      valid: false,
      reason: "SchemaMismatch",
      field: "quantity",
      detail: "invalid field quantity: expected integer, got string",
    });
  });

  it("should reject a fractional quantity", () => {
    expect(validator.validate(message(stockBody("P-1", 2.5)))).toEqual({
      valid: false,
      reason: "SchemaMismatch",
      field: "quantity",
      detail: "invalid field quantity: expected integer, got number",
    });
  });

  it("should reject a negative price", () => {
    const result = validator.validate(
      message({ collection: "prices", product_code: "P-1", price: -1, currency: "EUR" }),
    );
    expect(result).toEqual({
      valid: false,
      reason: "SchemaMismatch",
      field: "price",
      detail: "invalid field price: must be >= 0",
    });
  });

  it("should type-check optional fields that are present", () => {
    const result = validator.validate(
      message({ ...stockBody(), location: 12 }),
    );
    expect(result).toEqual({
      valid: false,
      reason: "SchemaMismatch",
      field: "location",
      detail: "invalid field location: expected string, got integer",
    });
  });
});
