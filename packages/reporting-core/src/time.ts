// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/time`
 * Purpose: Classify time values of unknown shape and convert them to instants, wire strings and storage strings.
 * Scope: Pure conversions. Does not read the clock; callers pass `now`.
 * Invariants:
 * - Classification precedence: digit > native > float > formatted.
 * - toInstant / toBoundedInstant never throw; null means "absent", never "zero".
 * - Wire and formatted values are naive local time. No timezone conversion.
 * - Query bounds must lie within [now - 4 years, now].
 * Side-effects: none (toBoundedInstant logs through the injected logger)
 * Links: packages/reporting-core/src/window-planner.ts, packages/reporting-core/src/checkpoint.ts
 * @public
 */

import { TimeFormatError } from "./errors";
import type { CollectorLogger } from "./ports";

/** Oldest accepted query bound, in whole days before now. */
export const MAX_LOOKBACK_DAYS = 365 * 4;

export const DAY_MS = 86_400_000;

export type TimeValueKind =
  | { readonly kind: "digit"; readonly seconds: number }
  | { readonly kind: "native"; readonly date: Date }
  | { readonly kind: "float"; readonly seconds: number }
  | { readonly kind: "formatted"; readonly date: Date }
  | { readonly kind: "invalid" };

const DIGIT_RE = /^\s*[+-]?\d+\s*$/;
const FLOAT_RE = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
const FORMATTED_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

const INVALID: TimeValueKind = { kind: "invalid" };

/**
 * Classify a time value once; every conversion below dispatches on the result.
 */
export function classifyTimeValue(value: unknown): TimeValueKind {
  const digit = parseDigit(value);
  if (digit !== null) return { kind: "digit", seconds: digit };

  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? INVALID
      : { kind: "native", date: value };
  }

  const float = parseFloatValue(value);
  if (float !== null) return { kind: "float", seconds: float };

  if (typeof value === "string") {
    const date = parseFormatted(value);
    if (date) return { kind: "formatted", date };
  }

  return INVALID;
}

/**
 * Resolve a time value to an instant, or null when it cannot be resolved.
 * Digit and float values are epoch seconds.
 */
export function toInstant(value: unknown): Date | null {
  if (isAbsentValue(value)) return null;

  const classified = classifyTimeValue(value);
  switch (classified.kind) {
    case "digit":
      return fromEpochMillis(classified.seconds * 1000);
    case "float":
      return fromEpochMillis(Math.round(classified.seconds * 1000));
    case "native":
    case "formatted":
      return classified.date;
    case "invalid":
      return null;
  }
}

/**
 * `toInstant` plus the lookback bound. Out-of-range and unparseable values
 * log a warning and yield null.
 */
export function toBoundedInstant(
  value: unknown,
  opts: { readonly now: Date; readonly logger: CollectorLogger }
): Date | null {
  if (isAbsentValue(value)) return null;

  const instant = toInstant(value);
  if (!instant) {
    opts.logger.warn(
      { timeValue: String(value) },
      "Validating time format. Time conversion failed"
    );
    return null;
  }

  if (!isWithinLookback(instant, opts.now)) {
    opts.logger.warn(
      { timeValue: String(value), instant: instant.toISOString() },
      "Validating time format. Out of range"
    );
    return null;
  }

  return instant;
}

/**
 * True when `instant` is not in the future and at most MAX_LOOKBACK_DAYS
 * whole days before `now`.
 */
export function isWithinLookback(instant: Date, now: Date): boolean {
  const diffMs = now.getTime() - instant.getTime();
  if (diffMs < 0) return false;
  return Math.floor(diffMs / DAY_MS) <= MAX_LOOKBACK_DAYS;
}

/** Render `YYYY-MM-DD HH:MM:SS` in local time, dropping sub-seconds. */
export function toWireFormat(instant: Date): string {
  const date = [
    String(instant.getFullYear()).padStart(4, "0"),
    pad2(instant.getMonth() + 1),
    pad2(instant.getDate()),
  ].join("-");
  const time = [
    pad2(instant.getHours()),
    pad2(instant.getMinutes()),
    pad2(instant.getSeconds()),
  ].join(":");
  return `${date} ${time}`;
}

/**
 * Normalize a time value into the stored epoch-seconds string.
 *
 * @example
 * toStorageString("1704800000") // => "1704800000"
 * toStorageString(new Date(1704800000000)) // => "1704800000.0"
 * toStorageString("1704800000.250000") // => "1704800000.25"
 */
export function toStorageString(value: unknown, field = "time"): string {
  const classified = classifyTimeValue(value);
  switch (classified.kind) {
    case "digit":
      return String(classified.seconds);
    case "native":
      return formatEpochSeconds(classified.date.getTime() / 1000);
    case "float":
      return formatEpochSeconds(classified.seconds);
    case "formatted":
    case "invalid":
      throw new TimeFormatError(field, value);
  }
}

/**
 * Epoch seconds with six fractional digits, used as the timestamp of events
 * whose own `Time` field parsed.
 *
 * @example
 * toEventTimeString(new Date(1704800000250)) // => "1704800000.250000"
 */
export function toEventTimeString(instant: Date): string {
  const ms = instant.getTime();
  const seconds = Math.floor(ms / 1000);
  const micros = (ms - seconds * 1000) * 1000;
  return `${seconds}.${String(micros).padStart(6, "0")}`;
}

/** Epoch seconds as a float, used for ingestion-time stamps. */
export function toEpochSeconds(instant: Date): number {
  return instant.getTime() / 1000;
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function isAbsentValue(value: unknown): boolean {
  return value === null || value === undefined || value === "" || value === 0;
}

function parseDigit(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string" && DIGIT_RE.test(value)) {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

function parseFloatValue(value: unknown): number | null {
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && FLOAT_RE.test(value)) {
    parsed = Number.parseFloat(value.trim());
  } else {
    return null;
  }
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function parseFormatted(value: string): Date | null {
  const match = FORMATTED_RE.exec(value);
  if (!match) return null;

  const [year, month, day, hours, minutes, seconds] = match
    .slice(1)
    .map((part) => Number.parseInt(part, 10));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }
  date.setHours(hours, minutes, seconds, 0);
  return date;
}

function fromEpochMillis(ms: number): Date | null {
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}

function formatEpochSeconds(seconds: number): string {
  return Number.isInteger(seconds) ? `${seconds}.0` : String(seconds);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}
