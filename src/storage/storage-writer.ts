import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { Model } from "mongoose";
import { ingestionConfig } from "../config/ingestion.config";
import type { IngestRecord, PersistResult } from "../ingestion/ingestion.types";
import type { FieldValue } from "../schema-registry/schema.types";
import {
  COLLECTION_MODELS,
  CollectionModels,
} from "./collection-models.provider";
import { IngestedDocument } from "./schemas/ingested-document.schema";
import {
  classifyStorageError,
  isDuplicateKeyError,
  withTimeout,
} from "./storage-errors";

export type StoredDocument = {
  product_code: string;
  received_at: Date;
  [field: string]: FieldValue | Date;
};

export function toStoredDocument(record: IngestRecord): StoredDocument {
  return {
    ...record.fields,
    product_code: record.productCode,
    received_at: record.receivedAt,
  };
}

/** Matches the stored document only when it is not newer than `record`. */
function notNewerThan(record: IngestRecord) {
  return {
    product_code: record.productCode,
    $or: [
      { received_at: { $lte: record.receivedAt } },
      { received_at: { $exists: false } },
    ],
  };
}

@Injectable()
export class StorageWriter {
  private readonly logger = new Logger(StorageWriter.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(COLLECTION_MODELS) private readonly models: CollectionModels,
    @Inject(ingestionConfig.KEY) config: ConfigType<typeof ingestionConfig>,
  ) {
    this.timeoutMs = config.storeWriteTimeoutMs;
  }

  /**
   * Idempotent replace-or-insert keyed by (collection, product_code).
   * Last write wins on received_at; never throws.
   */
  async persist(record: IngestRecord): Promise<PersistResult> {
    const model = this.models[record.collection];
    if (!model) {
      return {
        kind: "fatal",
        reason: "StorageConstraintViolation",
        cause: `no store for collection ${record.collection}`,
      };
    }
    if (!record.productCode.trim()) {
      return {
        kind: "fatal",
        reason: "StorageConstraintViolation",
        cause: "malformed identifier: empty product_code",
      };
    }

    const doc = toStoredDocument(record);
    try {
      await this.replace(model, record, doc, true);
      return { kind: "ok", applied: true };
    } catch (err) {
      if (isDuplicateKeyError(err)) return this.replaceExisting(model, record, doc);
      return classifyStorageError(err);
    }
  }

  /**
   * The upsert hit the unique index: either the stored document is newer
   * (nothing to do) or a concurrent insert won the race (replace it).
   */
  private async replaceExisting(
    model: Model<IngestedDocument>,
    record: IngestRecord,
    doc: StoredDocument,
  ): Promise<PersistResult> {
    try {
      const res = await this.replace(model, record, doc, false);
      if (res.matchedCount === 0) {
        this.logger.debug(
          `Skip stale ${record.collection}/${record.productCode} (received_at=${record.receivedAt.toISOString()})`,
        );
        return { kind: "ok", applied: false };
      }
      return { kind: "ok", applied: true };
    } catch (err) {
      return classifyStorageError(err);
    }
  }

  private replace(
    model: Model<IngestedDocument>,
    record: IngestRecord,
    doc: StoredDocument,
    upsert: boolean,
  ) {
    return withTimeout(
      model
        .replaceOne(notNewerThan(record), doc, {
          upsert,
          maxTimeMS: this.timeoutMs,
        })
        .exec(),
      this.timeoutMs,
    );
  }
}
