// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/errors`
 * Purpose: Typed errors shared by the collector core and the service.
 * Scope: Error classes and name-based guards. Does not log or retry.
 * Invariants:
 * - Only FatalQueryRejectionError and errors thrown out of collection abort an invocation.
 * - Guards match on `name` so they survive duplicated module instances.
 * Side-effects: none
 * Links: packages/reporting-core/src/index.ts
 * @public
 */

/**
 * Raised while validating configuration, before the collector is activated.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [message]
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * A time value could not be normalized into a storable epoch string.
 */
export class TimeFormatError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(
      `Invalid time format for checkpointing. ${field}="${String(value)}" type=${describeType(value)}`
    );
    this.name = "TimeFormatError";
  }
}

/**
 * Checkpoint write failed: unnormalizable value or persistence error.
 * Propagated to the caller, never retried.
 */
export class CheckpointStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CheckpointStoreError";
  }
}

/**
 * The vendor accepted the request but rejected the query (`status` not OK).
 * Terminates the whole invocation.
 */
export class FatalQueryRejectionError extends Error {
  constructor(
    public readonly status: string,
    public readonly window: { readonly from: string; readonly to: string }
  ) {
    super(
      `Reporting query rejected with status "${status}" for window ${window.from} -> ${window.to}`
    );
    this.name = "FatalQueryRejectionError";
  }
}

export function isConfigValidationError(
  error: unknown
): error is ConfigValidationError {
  return error instanceof Error && error.name === "ConfigValidationError";
}

export function isCheckpointStoreError(
  error: unknown
): error is CheckpointStoreError {
  return error instanceof Error && error.name === "CheckpointStoreError";
}

export function isFatalQueryRejection(
  error: unknown
): error is FatalQueryRejectionError {
  return error instanceof Error && error.name === "FatalQueryRejectionError";
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Date) return "Date";
  return typeof value;
}
