import { Provider } from "@nestjs/common";
import { getModelToken } from "@nestjs/mongoose";
import { Model } from "mongoose";
import { CollectionName } from "../schema-registry/schema.types";
import { IngestedDocument } from "./schemas/ingested-document.schema";

export const COLLECTION_MODELS = Symbol("COLLECTION_MODELS");

export const MODEL_NAMES: Readonly<Record<CollectionName, string>> = {
  products: "Product",
  stocks: "Stock",
  prices: "Price",
};

export type CollectionModels = Readonly<
  Record<CollectionName, Model<IngestedDocument>>
>;

export const CollectionModelsProvider: Provider = {
  provide: COLLECTION_MODELS,
  useFactory: (
    products: Model<IngestedDocument>,
    stocks: Model<IngestedDocument>,
    prices: Model<IngestedDocument>,
  ): CollectionModels => ({ products, stocks, prices }),
  inject: [
    getModelToken(MODEL_NAMES.products),
    getModelToken(MODEL_NAMES.stocks),
    getModelToken(MODEL_NAMES.prices),
  ],
};
