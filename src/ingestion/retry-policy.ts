import type {
  FailureReason,
  IngestRecord,
  PersistResult,
  StorageReason,
  ValidationResult,
} from "./ingestion.types";

export type RetrySettings = {
  maxRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

/**
 * Per-message pipeline state.
 *
 * Received → Validating → Persisting | Rejected
 * Rejected → DeadLettered
 * Persisting → Acknowledged | RetryScheduled | DeadLettered
 * RetryScheduled → Persisting
 *
 * `attempt` counts persist attempts that already failed for this message,
 * including those made before a broker redelivery.
 */
export type PipelineState =
  | { stage: "Received" }
  | { stage: "Validating" }
  | { stage: "Persisting"; record: IngestRecord; attempt: number }
  | { stage: "Rejected"; reason: FailureReason; detail: string; field?: string }
  | {
      stage: "RetryScheduled";
      record: IngestRecord;
      attempt: number;
      delayMs: number;
      reason: StorageReason;
      cause: string;
    }
  | { stage: "Acknowledged"; applied: boolean; attempts: number }
  | {
      stage: "DeadLettered";
      reason: FailureReason;
      detail: string;
      field?: string;
      attempts: number;
    };

export type PipelineStage = PipelineState["stage"];

type StateOf<S extends PipelineStage> = Extract<PipelineState, { stage: S }>;

/**
 * The single place where a validation / storage classification becomes the
 * next pipeline state. Pure: no clock, no I/O.
 */
export class RetryPolicy {
  constructor(private readonly settings: RetrySettings) {}

  /** 0 → base, 1 → 2×base, ... capped at backoffMaxMs */
  backoffDelay(attempt: number): number {
    const { backoffBaseMs, backoffMaxMs } = this.settings;
    return Math.min(backoffBaseMs * 2 ** Math.max(0, attempt), backoffMaxMs);
  }

  afterValidation(
    result: ValidationResult,
    redeliveryCount: number,
  ): StateOf<"Persisting"> | StateOf<"Rejected"> {
    if (result.valid) {
      return {
        stage: "Persisting",
        record: result.record,
        attempt: Math.max(0, redeliveryCount),
      };
    }
    const rejected: StateOf<"Rejected"> = {
      stage: "Rejected",
      reason: result.reason,
      detail: result.detail,
    };
    if (result.field !== undefined) rejected.field = result.field;
    return rejected;
  }

  /** Validation failures are never retried. */
  afterRejection(state: StateOf<"Rejected">): StateOf<"DeadLettered"> {
    const dead: StateOf<"DeadLettered"> = {
      stage: "DeadLettered",
      reason: state.reason,
      detail: state.detail,
      attempts: 0,
    };
    if (state.field !== undefined) dead.field = state.field;
    return dead;
  }

  afterPersist(
    state: StateOf<"Persisting">,
    result: PersistResult,
  ):
    | StateOf<"Acknowledged">
    | StateOf<"RetryScheduled">
    | StateOf<"DeadLettered"> {
    const attempts = state.attempt + 1;

    switch (result.kind) {
      case "ok":
        return { stage: "Acknowledged", applied: result.applied, attempts };
      case "fatal":
        return {
          stage: "DeadLettered",
          reason: result.reason,
          detail: result.cause,
          attempts,
        };
      case "retryable":
        if (state.attempt < this.settings.maxRetries) {
          return {
            stage: "RetryScheduled",
            record: state.record,
            attempt: state.attempt,
            delayMs: this.backoffDelay(state.attempt),
            reason: result.reason,
            cause: result.cause,
          };
        }
        return {
          stage: "DeadLettered",
          reason: result.reason,
          detail: `${result.cause} (gave up after ${attempts} attempts)`,
          attempts,
        };
    }
  }

  afterBackoff(state: StateOf<"RetryScheduled">): StateOf<"Persisting"> {
    return {
      stage: "Persisting",
      record: state.record,
      attempt: state.attempt + 1,
    };
  }
}
