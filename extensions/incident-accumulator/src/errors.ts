/**
 * Error types raised by the accumulator. None of them is fatal to the
 * polling process; the poller degrades each to "try again next cycle".
 */

/** A raw feed record lacks a field required to build an Incident. */
export class MalformedRecordError extends Error {
  readonly field: string;
  readonly record: unknown;

  constructor(field: string, message: string, record: unknown) {
    super(`Malformed record (${field}): ${message}`);
    this.name = "MalformedRecordError";
    this.field = field;
    this.record = record;
  }
}

/** The feed could not be fetched or its response could not be read. */
export class FetchFailureError extends Error {
  readonly url?: string;
  readonly status?: number;

  constructor(message: string, options?: { url?: string; status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "FetchFailureError";
    this.url = options?.url;
    this.status = options?.status;
  }
}

export type PersistenceOperation = "load" | "save";

/** Durable storage could not be read or written. */
export class PersistenceFailureError extends Error {
  readonly operation: PersistenceOperation;

  constructor(operation: PersistenceOperation, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "PersistenceFailureError";
    this.operation = operation;
  }
}

/** Configuration failed schema validation. */
export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

/** A malformed record paired with its position in the batch. */
export type SkippedRecord = {
  index: number;
  error: MalformedRecordError;
};

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
