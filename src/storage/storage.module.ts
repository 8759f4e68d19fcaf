import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { COLLECTIONS } from "../schema-registry/schema.types";
import {
  COLLECTION_MODELS,
  CollectionModelsProvider,
  MODEL_NAMES,
} from "./collection-models.provider";
import { IngestedDocumentSchema } from "./schemas/ingested-document.schema";
import { StorageWriter } from "./storage-writer";

@Module({
  imports: [
    MongooseModule.forFeature(
      COLLECTIONS.map((collection) => ({
        name: MODEL_NAMES[collection],
        schema: IngestedDocumentSchema,
        collection,
      })),
    ),
  ],
  providers: [CollectionModelsProvider, StorageWriter],
  exports: [COLLECTION_MODELS, StorageWriter],
})
export class StorageModule {}
