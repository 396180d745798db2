// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/scheduling/run-loop`
 * Purpose: Drive collection invocations, once or on a cron schedule.
 * Scope: Invocation lifecycle and exit codes. Does not plan windows or touch adapters.
 * Invariants:
 * - At most one invocation runs at a time.
 * - A failed invocation maps to exit code 1; a scheduled loop keeps going after one.
 * - Abort stops the loop between invocations and the collector between windows.
 * Side-effects: timers (sleep between scheduled runs)
 * Links: services/collector/src/main.ts, services/collector/src/scheduling/cron.ts
 * @public
 */

import {
  type CollectorLogger,
  isCheckpointStoreError,
  isFatalQueryRejection,
} from "@lp-reporting/reporting-core";

import type {
  CollectionSummary,
  Collector,
} from "../collector/collect-events.js";
import { computeNextCronTime } from "./cron.js";

export interface InvocationOutcome {
  readonly exitCode: 0 | 1;
  readonly summary?: CollectionSummary;
  readonly error?: unknown;
}

/** Run a single invocation and translate its outcome into an exit code. */
export async function runInvocation(
  collector: Collector,
  logger: CollectorLogger,
  signal?: AbortSignal
): Promise<InvocationOutcome> {
  try {
    const summary = await collector.collect({ signal });
    return { exitCode: 0, summary };
  } catch (error) {
    logger.error(
      { err: error, kind: classifyFailure(error) },
      "Collection invocation failed"
    );
    return { exitCode: 1, error };
  }
}

export interface ScheduleOptions {
  readonly cron: string;
  readonly timezone: string;
  readonly signal: AbortSignal;
  /** Injected for tests; defaults to an abortable timer. */
  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  readonly now?: () => Date;
}

/**
 * Run immediately, then at every cron fire time until the signal aborts.
 * Resolves with the exit code of the last invocation.
 */
export async function runOnSchedule(
  collector: Collector,
  logger: CollectorLogger,
  options: ScheduleOptions
): Promise<0 | 1> {
  const sleep = options.sleep ?? abortableSleep;
  const now = options.now ?? (() => new Date());
  let lastExitCode: 0 | 1 = 0;

  while (!options.signal.aborted) {
    const outcome = await runInvocation(collector, logger, options.signal);
    lastExitCode = outcome.exitCode;
    if (options.signal.aborted) break;

    const current = now();
    const next = computeNextCronTime(options.cron, options.timezone, current);
    logger.info(
      { nextRunAt: next.toISOString(), schedule: options.cron },
      "Next collection scheduled"
    );
    await sleep(Math.max(0, next.getTime() - current.getTime()), options.signal);
  }

  return lastExitCode;
}

function classifyFailure(error: unknown): string {
  if (isFatalQueryRejection(error)) return "query-rejected";
  if (isCheckpointStoreError(error)) return "checkpoint-write";
  return "unhandled";
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
