import type { CollectionName, FieldValue } from "../schema-registry/schema.types";

export type ValidationReason =
  | "MalformedPayload"
  | "UnknownCollection"
  | "MissingIdentifier"
  | "SchemaMismatch";

export type StorageReason =
  | "StorageUnavailable"
  | "StorageTimeout"
  | "StorageConstraintViolation";

export type FailureReason = ValidationReason | StorageReason;

/** A decoded delivery, as the validator sees it. */
export interface IngestMessage {
  readonly body: unknown;
  readonly messageId: string;
  readonly deliveryTag: number;
  readonly redeliveryCount: number;
  readonly receivedAt: Date;
}

export interface IngestRecord {
  readonly collection: CollectionName;
  readonly productCode: string;
  readonly fields: Readonly<Record<string, FieldValue>>;
  readonly receivedAt: Date;
}

export type ValidationResult =
  | { readonly valid: true; readonly record: IngestRecord }
  | {
      readonly valid: false;
      readonly reason: ValidationReason;
      readonly field?: string;
      readonly detail: string;
    };

export type PersistResult =
  | { readonly kind: "ok"; readonly applied: boolean }
  | {
      readonly kind: "retryable";
      readonly reason: "StorageUnavailable" | "StorageTimeout";
      readonly cause: string;
    }
  | {
      readonly kind: "fatal";
      readonly reason: "StorageConstraintViolation";
      readonly cause: string;
    };

export interface DeadLetter {
  original_message: unknown;
  failure_reason: FailureReason;
  detail: string;
  field?: string;
  attempts: number;
  source_queue: string;
  message_id: string;
  failed_at: string;
}

export interface MessageValidation {
  validate(message: IngestMessage): ValidationResult;
}

export interface RecordWriter {
  persist(record: IngestRecord): Promise<PersistResult>;
}
