import {
  classifyStorageError,
  isDuplicateKeyError,
  StoreTimeoutError,
  withTimeout,
} from "./storage-errors";

function mongoError(name: string, message: string, code?: number) {
  return Object.assign(new Error(message), { name, code });
}

describe("classifyStorageError", () => {
  it("should treat server timeouts as StorageTimeout", () => {
    expect(
      classifyStorageError(mongoError("MongoServerError", "operation exceeded time limit", 50)),
    ).toEqual({
      kind: "retryable",
      reason: "StorageTimeout",
      cause: "MongoServerError: operation exceeded time limit",
    });
    expect(classifyStorageError(new StoreTimeoutError("store write exceeded 5ms")).reason).toBe(
      "StorageTimeout",
    );
  });

  it("should treat document validation failures as fatal", () => {
    expect(
      classifyStorageError(mongoError("MongoServerError", "Document failed validation", 121)),
    ).toEqual({
      kind: "fatal",
      reason: "StorageConstraintViolation",
      cause: "MongoServerError: Document failed validation",
    });
  });

  it("should treat server selection failures as unavailable", () => {
    expect(
      classifyStorageError(
        mongoError("MongoServerSelectionError", "Server selection timed out after 30000 ms"),
      ).reason,
    ).toBe("StorageUnavailable");
  });

  it("should treat anything unrecognised as unavailable", () => {
    expect(classifyStorageError("socket hang up")).toEqual({
      kind: "retryable",
      reason: "StorageUnavailable",
      cause: "socket hang up",
    });
  });

  it("should recognise duplicate key errors", () => {
    expect(isDuplicateKeyError(mongoError("MongoServerError", "E11000", 11000))).toBe(true);
    expect(isDuplicateKeyError(mongoError("MongoServerError", "BadValue", 2))).toBe(false);
  });
});

describe("withTimeout", () => {
  it("should pass through a value that settles in time", async () => {
    await expect(withTimeout(Promise.resolve(3), 50)).resolves.toBe(3);
  });

  it("should reject with StoreTimeoutError when too slow", async () => {
    await expect(withTimeout(new Promise(() => undefined), 10)).rejects.toBeInstanceOf(
      StoreTimeoutError,
    );
  });
});
