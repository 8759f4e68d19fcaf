import { CollectionName, SchemaContract } from "./schema.types";

function freezeContract(c: SchemaContract): SchemaContract {
  return Object.freeze({
    collection: c.collection,
    fields: Object.freeze(c.fields.map((f) => Object.freeze({ ...f }))),
  });
}

/**
 * Read-only lookup of collection contracts. Built once at startup; the
 * contracts it hands out are frozen copies, so callers cannot change what
 * other consumers see.
 */
export class SchemaRegistry {
  private readonly contracts: ReadonlyMap<string, SchemaContract>;

  constructor(contracts: readonly SchemaContract[]) {
    const map = new Map<string, SchemaContract>();
    for (const c of contracts) {
      if (map.has(c.collection)) {
        throw new Error(`Duplicate schema contract: ${c.collection}`);
      }
      map.set(c.collection, freezeContract(c));
    }
    this.contracts = map;
  }

  /** undefined when the collection has no contract */
  resolve(collection: string): SchemaContract | undefined {
    return this.contracts.get(collection);
  }

  collections(): CollectionName[] {
    return [...this.contracts.values()].map((c) => c.collection);
  }
}
