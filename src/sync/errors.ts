import type { RunStage } from "@/sync/types";

/**
 * Base class for every error the sync engine raises on purpose.
 * `fatal` errors end the run; the rest are recovered where they occur.
 */
export class SyncEngineError extends Error {
  readonly stage: RunStage;
  readonly fatal: boolean;
  readonly context?: Record<string, unknown>;

  constructor(message: string, stage: RunStage, fatal: boolean, context?: Record<string, unknown>) {
    super(message);
    this.name = "SyncEngineError";
    this.stage = stage;
    this.fatal = fatal;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Source unreachable, connection lost past the reconnect budget, or query rejected. */
export class ExtractionError extends SyncEngineError {
  readonly code?: string;

  constructor(message: string, options?: { code?: string; context?: Record<string, unknown> }) {
    super(message, "EXTRACT", true, options?.context);
    this.name = "ExtractionError";
    this.code = options?.code;
  }
}

/** One source row could not be mapped; the row is skipped. */
export class MappingError extends SyncEngineError {
  readonly jobId: number | null;
  readonly issues: string[];

  constructor(jobId: number | null, issues: string[]) {
    super(
      `Record ${jobId ?? "(unknown job)"} failed validation: ${issues.join("; ")}`,
      "MAP",
      false,
      { jobId },
    );
    this.name = "MappingError";
    this.jobId = jobId;
    this.issues = issues;
  }
}

export type DispatchErrorClassification = "retryable" | "fatal";

/** A batch's dispatch ended the run: a 4xx, or retries exhausted under the halt policy. */
export class DispatchError extends SyncEngineError {
  readonly classification: DispatchErrorClassification;
  readonly statusCode?: number;
  readonly batch: { sequence: number; firstJobId: number; lastJobId: number };

  constructor(
    message: string,
    classification: DispatchErrorClassification,
    batch: { sequence: number; firstJobId: number; lastJobId: number },
    statusCode?: number,
  ) {
    super(message, "DISPATCH", true, { ...batch });
    this.name = "DispatchError";
    this.classification = classification;
    this.statusCode = statusCode;
    this.batch = batch;
  }
}

export class StateCommitError extends SyncEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "COMMIT", true, context);
    this.name = "StateCommitError";
  }
}

/** Another run holds the state lock. `acquiredAt` is when it last took or renewed it. */
export class RunLockError extends SyncEngineError {
  readonly holder: string;
  readonly acquiredAt: string;

  constructor(holder: string, acquiredAt: string) {
    super(`Sync state is locked by run ${holder} (last active ${acquiredAt})`, "INIT", true);
    this.name = "RunLockError";
    this.holder = holder;
    this.acquiredAt = acquiredAt;
  }
}

export class ConfigError extends SyncEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Sync environment validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}\n\nCopy .env.example to .env and fill in the values.`,
      "INIT",
      true,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Flatten an error into log metadata. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof DispatchError) {
    return {
      error: error.message,
      name: error.name,
      stage: error.stage,
      ...error.batch,
      classification: error.classification,
      statusCode: error.statusCode,
    };
  }
  if (error instanceof RunLockError) {
    return { error: error.message, name: error.name, stage: error.stage, holder: error.holder, acquiredAt: error.acquiredAt };
  }
  if (error instanceof SyncEngineError) {
    return { error: error.message, name: error.name, stage: error.stage, ...error.context };
  }
  if (error instanceof Error) {
    return { error: error.message, name: error.name };
  }
  return { error: String(error) };
}
