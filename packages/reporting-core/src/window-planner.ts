// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/window-planner`
 * Purpose: Derive the effective collection start and partition [start, now] into query windows.
 * Scope: Pure planning. Does not fetch, emit or checkpoint.
 * Invariants:
 * - Start resolution is a first-match decision table over (operator start, checkpoint).
 * - A checkpoint resumes from its stored start, never from its progress field.
 * - Spans under 7 whole days use 1-day windows, longer spans 3-day windows.
 * - Days are local calendar days, not fixed 24h steps.
 * - Every window's `to` is clamped to now; zero-length tail windows are dropped.
 * Side-effects: none (logs through the injected logger)
 * Links: services/collector/src/collector/collect-events.ts
 * @public
 */

import type { CheckpointRecord } from "./checkpoint";
import type { CollectorLogger } from "./ports";
import { DAY_MS, toBoundedInstant, toInstant } from "./time";

export const LARGE_RANGE_DAYS = 7;
export const SMALL_CHUNK_DAYS = 1;
export const LARGE_CHUNK_DAYS = 3;

export type StartRule =
  | "default"
  | "checkpoint"
  | "operator-start"
  | "checkpoint-newer"
  | "default-fallthrough"
  | "default-stale-checkpoint";

export interface EffectiveStart {
  readonly start: Date;
  readonly rule: StartRule;
}

export interface QueryWindow {
  readonly from: Date;
  readonly to: Date;
}

export interface WindowPlan {
  readonly effectiveStart: Date;
  readonly totalDays: number;
  readonly chunkDays: number;
  readonly windows: readonly QueryWindow[];
}

/** Same wall-clock time one local calendar day before now, truncated to whole seconds. */
export function defaultStart(now: Date): Date {
  const start = addLocalDays(now, -1);
  start.setMilliseconds(0);
  return start;
}

/**
 * Decision table, first match wins:
 * 1. no operator start, no checkpoint -> default
 * 2. no operator start, checkpoint -> checkpoint start
 * 3. operator start, no checkpoint -> operator start
 * 4. both, checkpoint start newer -> checkpoint start
 * 5. otherwise -> default
 *
 * Rule 5 drops a valid operator start whenever a checkpoint exists that is
 * not newer. That is the long-standing behavior and is kept as-is.
 */
export function resolveEffectiveStart(params: {
  readonly operatorStart: Date | null;
  readonly checkpoint: CheckpointRecord | null;
  readonly now: Date;
  readonly logger: CollectorLogger;
}): EffectiveStart {
  const { operatorStart, checkpoint, now, logger } = params;

  if (!operatorStart && !checkpoint) {
    return { start: defaultStart(now), rule: "default" };
  }

  if (!operatorStart && checkpoint) {
    return fromCheckpoint(checkpoint, "checkpoint", now, logger);
  }

  if (operatorStart && !checkpoint) {
    return { start: operatorStart, rule: "operator-start" };
  }

  if (operatorStart && checkpoint) {
    const checkpointStart = toInstant(checkpoint.timeStart);
    if (
      checkpointStart &&
      checkpointStart.getTime() > operatorStart.getTime()
    ) {
      return fromCheckpoint(checkpoint, "checkpoint-newer", now, logger);
    }
  }

  return { start: defaultStart(now), rule: "default-fallthrough" };
}

/**
 * Partition [effectiveStart, now] into query windows.
 *
 * @example
 * // 10 whole days -> 3-day chunks of length 3, 3, 3, 1
 * planWindows(new Date("2024-01-01T00:00:00Z"), new Date("2024-01-11T00:00:00Z")).windows.length // => 4
 */
export function planWindows(effectiveStart: Date, now: Date): WindowPlan {
  const nowMs = now.getTime();
  const totalDays = Math.floor(
    (wallClockMs(now) - wallClockMs(effectiveStart)) / DAY_MS
  );
  const chunkDays =
    totalDays < LARGE_RANGE_DAYS ? SMALL_CHUNK_DAYS : LARGE_CHUNK_DAYS;

  const windows: QueryWindow[] = [];
  for (let i = 0; i <= totalDays; i += chunkDays) {
    const from = addLocalDays(effectiveStart, i);
    if (from.getTime() >= nowMs) break;
    const chunkEndMs = addLocalDays(from, chunkDays).getTime() - 1000;
    windows.push({ from, to: new Date(Math.min(chunkEndMs, nowMs)) });
  }

  return { effectiveStart, totalDays, chunkDays, windows };
}

function fromCheckpoint(
  checkpoint: CheckpointRecord,
  rule: StartRule,
  now: Date,
  logger: CollectorLogger
): EffectiveStart {
  const start = toBoundedInstant(checkpoint.timeStart, { now, logger });
  if (start) return { start, rule };

  logger.warn(
    { checkpointStart: checkpoint.timeStart },
    "Checkpoint start unusable, falling back to default lookback"
  );
  return { start: defaultStart(now), rule: "default-stale-checkpoint" };
}

// Day arithmetic follows the local calendar so wire bounds keep their
// wall-clock time across DST changes.
function addLocalDays(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() + days);
  return shifted;
}

function wallClockMs(date: Date): number {
  return Date.UTC(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
}
