import { Global, Module } from "@nestjs/common";
import { COLLECTION_CONTRACTS } from "./collection-contracts";
import { SchemaRegistry } from "./schema-registry";

@Global()
@Module({
  providers: [
    {
      provide: SchemaRegistry,
      useFactory: () => new SchemaRegistry(COLLECTION_CONTRACTS),
    },
  ],
  exports: [SchemaRegistry],
})
export class SchemaRegistryModule {}
