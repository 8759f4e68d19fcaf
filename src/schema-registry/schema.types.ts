export const COLLECTIONS = ["products", "stocks", "prices"] as const;
export type CollectionName = (typeof COLLECTIONS)[number];

export type FieldType = "string" | "number" | "integer" | "boolean";
export type FieldValue = string | number | boolean | null;

export type FieldSpec = {
  name: string;
  type: FieldType;
  required: boolean;
  /** lower bound for number / integer fields */
  min?: number;
  /** value stored when an optional field is absent */
  default?: FieldValue;
};

export type SchemaContract = {
  collection: CollectionName;
  fields: readonly FieldSpec[];
};

export function isCollectionName(x: unknown): x is CollectionName {
  return typeof x === "string" && (COLLECTIONS as readonly string[]).includes(x);
}
