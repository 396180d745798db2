// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/checkpoint`
 * Purpose: Checkpoint record model and the codec between it and the persisted state.
 * Scope: Pure decode/encode. Does not read or write storage (see services/collector/src/checkpoint/).
 * Invariants:
 * - decodeCheckpoint never throws: corruption is an explicit `absent` result.
 * - A record is trusted whole or not at all; one bad field discards it.
 * - A legacy bare-number checkpoint is upgraded in memory only.
 * - encodeCheckpoint normalizes all three fields or throws TimeFormatError.
 * Side-effects: none
 * Links: packages/reporting-core/src/time.ts
 * @public
 */

import { z } from "zod";

import type { StoredCheckpointState } from "./ports";
import { classifyTimeValue, toStorageString } from "./time";

/** Fixed slot holding this collector's checkpoint. */
export const CHECKPOINT_KEY = "LastPass_reporting";

export interface CheckpointRecord {
  /** Timestamp of the last emitted event; null for an upgraded legacy record. */
  readonly timeCurr: string | null;
  /** Effective start of the invocation that wrote the record. */
  readonly timeStart: string;
  /** "now" of the invocation that wrote the record; null for legacy. */
  readonly timeEnd: string | null;
  readonly legacy: boolean;
}

export type CheckpointAbsentReason = "missing" | "unreadable" | "malformed";

export type CheckpointLoadResult =
  | { readonly kind: "present"; readonly record: CheckpointRecord }
  | {
      readonly kind: "absent";
      readonly reason: CheckpointAbsentReason;
      readonly detail?: string;
    };

function storedTimeField(field: keyof StoredCheckpointState) {
  return z
    .union([z.string(), z.number()], {
      errorMap: () => ({ message: `valid ${field} field not found` }),
    })
    .refine((value) => value !== "" && value !== 0, {
      message: `valid ${field} field not found`,
    })
    .transform((value, ctx) => {
      try {
        return toStorageString(value, field);
      } catch (err) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: err instanceof Error ? err.message : String(err),
        });
        return z.NEVER;
      }
    });
}

const StoredCheckpointSchema = z.object({
  time_curr: storedTimeField("time_curr"),
  time_start: storedTimeField("time_start"),
  time_end: storedTimeField("time_end"),
});

/**
 * Decode whatever the persistence slot returned.
 *
 * @example
 * decodeCheckpoint(1704800000)
 * // => { kind: "present", record: { timeCurr: null, timeStart: "1704800000", timeEnd: null, legacy: true } }
 */
export function decodeCheckpoint(raw: unknown): CheckpointLoadResult {
  if (raw === null || raw === undefined) {
    return { kind: "absent", reason: "missing" };
  }

  const kind = classifyTimeValue(raw).kind;
  if (kind === "digit" || kind === "float") {
    return {
      kind: "present",
      record: {
        timeCurr: null,
        timeStart: toStorageString(raw, "time_start"),
        timeEnd: null,
        legacy: true,
      },
    };
  }

  const parsed = StoredCheckpointSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      kind: "absent",
      reason: "malformed",
      detail: parsed.error.errors
        .map((e) => `${e.path.join(".") || "state"}: ${e.message}`)
        .join("; "),
    };
  }

  return {
    kind: "present",
    record: {
      timeCurr: parsed.data.time_curr,
      timeStart: parsed.data.time_start,
      timeEnd: parsed.data.time_end,
      legacy: false,
    },
  };
}

/** Normalize the three instants into the persisted state shape. */
export function encodeCheckpoint(
  timeCurr: unknown,
  timeStart: unknown,
  timeEnd: unknown
): StoredCheckpointState {
  return {
    time_curr: toStorageString(timeCurr, "time_curr"),
    time_start: toStorageString(timeStart, "time_start"),
    time_end: toStorageString(timeEnd, "time_end"),
  };
}
