import { isObj, errorMessage } from "../messaging/helper/mq-helper";
import type { PersistResult } from "../ingestion/ingestion.types";

export class StoreTimeoutError extends Error {
  override name = "StoreTimeoutError";
}

/** Rejects with StoreTimeoutError when `promise` has not settled within `ms`. */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new StoreTimeoutError(`store write exceeded ${ms}ms`)),
      ms,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

const TIMEOUT_NAMES = new Set([
  "StoreTimeoutError",
  "MongoNetworkTimeoutError",
  "MongoOperationTimeoutError",
  "MongoWaitQueueTimeoutError",
]);

const CONSTRAINT_NAMES = new Set([
  "ValidationError",
  "CastError",
  "StrictModeError",
  "ObjectParameterError",
  "MongoInvalidArgumentError",
]);

// MaxTimeMSExpired, NetworkTimeout, ExceededTimeLimit
const TIMEOUT_CODES = new Set([50, 89, 262]);

// BadValue, TypeMismatch, $-prefixed field, bad DBRef, document validation,
// duplicate key, key too long
const CONSTRAINT_CODES = new Set([2, 14, 52, 55, 121, 11000, 11001, 17280]);

function errorName(err: unknown): string {
  return isObj(err) && typeof err.name === "string" ? err.name : "";
}

function errorCode(err: unknown): number | null {
  return isObj(err) && typeof err.code === "number" ? err.code : null;
}

export function isDuplicateKeyError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 11000 || code === 11001;
}

/**
 * Maps a driver / mongoose failure onto the storage taxonomy. Network,
 * server selection, pool and stepdown errors, and anything not recognised,
 * count as unavailable: bounded retries, then dead-letter.
 */
export function classifyStorageError(
  err: unknown,
): Exclude<PersistResult, { kind: "ok" }> {
  const name = errorName(err);
  const code = errorCode(err);
  const cause = name ? `${name}: ${errorMessage(err)}` : errorMessage(err);

  if (TIMEOUT_NAMES.has(name) || (code !== null && TIMEOUT_CODES.has(code))) {
    return { kind: "retryable", reason: "StorageTimeout", cause };
  }
  if (CONSTRAINT_NAMES.has(name) || (code !== null && CONSTRAINT_CODES.has(code))) {
    return { kind: "fatal", reason: "StorageConstraintViolation", cause };
  }
  return { kind: "retryable", reason: "StorageUnavailable", cause };
}
