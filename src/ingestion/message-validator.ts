import { Injectable } from "@nestjs/common";
import { SchemaRegistry } from "../schema-registry/schema-registry";
import {
  FieldSpec,
  FieldValue,
  isCollectionName,
} from "../schema-registry/schema.types";
import { isObj } from "../messaging/helper/mq-helper";
import type {
  IngestMessage,
  MessageValidation,
  ValidationReason,
  ValidationResult,
} from "./ingestion.types";

function invalid(
  reason: ValidationReason,
  detail: string,
  field?: string,
): ValidationResult {
  return field === undefined
    ? { valid: false, reason, detail }
    : { valid: false, reason, field, detail };
}

function typeLabel(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "number";
  }
  return typeof value;
}

type FieldCheck = { ok: true; value: FieldValue } | { ok: false; problem: string };

function checkField(spec: FieldSpec, value: unknown): FieldCheck {
  switch (spec.type) {
    case "string":
      return typeof value === "string"
        ? { ok: true, value }
        : { ok: false, problem: `expected string, got ${typeLabel(value)}` };
    case "boolean":
      return typeof value === "boolean"
        ? { ok: true, value }
        : { ok: false, problem: `expected boolean, got ${typeLabel(value)}` };
    case "integer":
    case "number": {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return {
          ok: false,
          problem: `expected ${spec.type}, got ${typeLabel(value)}`,
        };
      }
      if (spec.type === "integer" && !Number.isInteger(value)) {
        return { ok: false, problem: "expected integer, got number" };
      }
      if (spec.min !== undefined && value < spec.min) {
        return { ok: false, problem: `must be >= ${spec.min}` };
      }
      return { ok: true, value };
    }
  }
}

@Injectable()
export class MessageValidator implements MessageValidation {
  constructor(private readonly registry: SchemaRegistry) {}

  validate(message: IngestMessage): ValidationResult {
    const body = message.body;
    if (!isObj(body) || Array.isArray(body)) {
      return invalid("MalformedPayload", "message body is not a JSON object");
    }

    const collection = body.collection;
    if (collection === undefined || collection === null || collection === "") {
      return invalid("UnknownCollection", "collection is missing", "collection");
    }
    const contract =
      typeof collection === "string" ? this.registry.resolve(collection) : undefined;
    if (!contract || !isCollectionName(collection)) {
      return invalid(
        "UnknownCollection",
        `unknown collection: ${String(collection)}`,
        "collection",
      );
    }

    const productCode = body.product_code;
    if (typeof productCode !== "string" || productCode.trim() === "") {
      return invalid(
        "MissingIdentifier",
        "product_code is missing or empty",
        "product_code",
      );
    }

    const fields: Record<string, FieldValue> = {};
    for (const spec of contract.fields) {
      const value = body[spec.name];
      const absent = value === undefined || value === null;

      if (absent) {
        if (spec.required) {
          return invalid(
            "SchemaMismatch",
            `missing required field: ${spec.name}`,
            spec.name,
          );
        }
        fields[spec.name] = spec.default ?? null;
        continue;
      }

      const checked = checkField(spec, value);
      if (!checked.ok) {
        return invalid(
          "SchemaMismatch",
          `invalid field ${spec.name}: ${checked.problem}`,
          spec.name,
        );
      }
      fields[spec.name] = checked.value;
    }

    return {
      valid: true,
      record: {
        collection,
        productCode,
        fields,
        receivedAt: message.receivedAt,
      },
    };
  }
}
