import { SchemaContract } from "./schema.types";

export const COLLECTION_CONTRACTS: readonly SchemaContract[] = [
  {
    collection: "products",
    fields: [
      { name: "name", type: "string", required: true },
      { name: "description", type: "string", required: false, default: "" },
      { name: "category", type: "string", required: false, default: null },
      { name: "brand", type: "string", required: false, default: null },
      { name: "price", type: "number", required: false, min: 0, default: null },
      { name: "currency", type: "string", required: false, default: "USD" },
      { name: "sku", type: "string", required: false, default: null },
      { name: "created_at", type: "string", required: false, default: null },
      { name: "updated_at", type: "string", required: false, default: null },
    ],
  },
  {
    collection: "stocks",
    fields: [
      { name: "warehouse_id", type: "string", required: true },
      { name: "quantity", type: "integer", required: true, min: 0 },
      { name: "location", type: "string", required: false, default: null },
      { name: "updated_at", type: "string", required: false, default: null },
    ],
  },
  {
    collection: "prices",
    fields: [
      { name: "price", type: "number", required: true, min: 0 },
      { name: "currency", type: "string", required: true },
      { name: "effective_date", type: "string", required: false, default: null },
      { name: "expires_at", type: "string", required: false, default: null },
      { name: "promotion_id", type: "string", required: false, default: null },
      { name: "base_price", type: "number", required: false, min: 0, default: null },
      {
        name: "discount_percentage",
        type: "number",
        required: false,
        min: 0,
        default: null,
      },
      { name: "final_price", type: "number", required: false, min: 0, default: null },
    ],
  },
];
