import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";

/**
 * Shared by the products / stocks / prices models. Only the key and the
 * ordering timestamp are declared here; the remaining fields come from the
 * collection contract in the schema registry (`strict: false`).
 */
@Schema({ strict: false, versionKey: false })
export class IngestedDocument {
  @Prop({ type: String, required: true })
  product_code!: string;

  @Prop({ type: Date, required: true })
  received_at!: Date;
}

export const IngestedDocumentSchema =
  SchemaFactory.createForClass(IngestedDocument);

// one document per (collection, product_code)
IngestedDocumentSchema.index(
  { product_code: 1 },
  { unique: true, name: "uniq_product_code" },
);
