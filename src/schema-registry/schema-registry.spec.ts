import { COLLECTION_CONTRACTS } from "./collection-contracts";
import { SchemaRegistry } from "./schema-registry";
import { isCollectionName } from "./schema.types";

describe("SchemaRegistry", () => {
  const registry = new SchemaRegistry(COLLECTION_CONTRACTS);

  it("should resolve every built-in collection", () => {
    expect(registry.collections()).toEqual(["products", "stocks", "prices"]);
    expect(registry.resolve("stocks")?.fields.map((f) => f.name)).toEqual([
      "warehouse_id",
      "quantity",
      "location",
      "updated_at",
    ]);
  });

  it("should return undefined for an unknown collection", () => {
    expect(registry.resolve("orders")).toBeUndefined();
    expect(registry.resolve("")).toBeUndefined();
  });

  it("should hand out frozen contracts", () => {
    const contract = registry.resolve("prices");
    expect(Object.isFrozen(contract)).toBe(true);
    expect(Object.isFrozen(contract?.fields)).toBe(true);
    expect(Object.isFrozen(contract?.fields[0])).toBe(true);
  });

  it("should not be affected by later changes to the source contracts", () => {
    const source = [
      {
        collection: "stocks" as const,
        fields: [{ name: "quantity", type: "integer" as const, required: true }],
      },
    ];
    const local = new SchemaRegistry(source);
    source[0].fields[0].required = false;

    expect(local.resolve("stocks")?.fields[0].required).toBe(true);
  });

  it("should reject duplicate contracts", () => {
    expect(
      () =>
        new SchemaRegistry([
          { collection: "stocks", fields: [] },
          { collection: "stocks", fields: [] },
        ]),
    ).toThrow("Duplicate schema contract: stocks");
  });

  it("should narrow collection names", () => {
    expect(isCollectionName("prices")).toBe(true);
    expect(isCollectionName("Prices")).toBe(false);
    expect(isCollectionName(42)).toBe(false);
  });
});
