import { Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { FilterQuery } from "mongoose";
import {
  COLLECTION_MODELS,
  CollectionModels,
} from "../storage/collection-models.provider";
import { IngestedDocument } from "../storage/schemas/ingested-document.schema";
import { CollectionName } from "../schema-registry/schema.types";
import { DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT } from "./dto/list-catalog.query";

/** A stored document as returned to API callers (no `_id`). */
export type CatalogDocument = Record<string, unknown>;

const LABELS: Readonly<Record<CollectionName, string>> = {
  products: "Product",
  stocks: "Stock",
  prices: "Price",
};

@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(
    @Inject(COLLECTION_MODELS) private readonly models: CollectionModels,
  ) {}

  async findByProductCode(
    collection: CollectionName,
    productCode: string,
  ): Promise<CatalogDocument> {
    const doc = await this.models[collection]
      .findOne({ product_code: productCode }, { _id: 0 })
      .lean<CatalogDocument>()
      .exec();

    if (!doc) {
      this.logger.debug(`${collection}/${productCode} not found`);
      throw new NotFoundException(
        `${LABELS[collection]} not found: ${productCode}`,
      );
    }
    return doc;
  }

  /** Equality filters only; unset filter values are ignored. */
  async list(
    collection: CollectionName,
    filters: Readonly<Record<string, string | undefined>>,
    limit?: number,
  ): Promise<CatalogDocument[]> {
    const filter: FilterQuery<IngestedDocument> = {};
    for (const [field, value] of Object.entries(filters)) {
      if (value) filter[field] = value;
    }
    const n = Math.min(MAX_LIST_LIMIT, Math.max(1, limit ?? DEFAULT_LIST_LIMIT));

    return this.models[collection]
      .find(filter, { _id: 0 })
      .sort({ product_code: 1 })
      .limit(n)
      .lean<CatalogDocument[]>()
      .exec();
  }
}
