// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/scheduling/cron`
 * Purpose: Cron expression parsing utilities.
 * Scope: Computes the next fire time from cron+timezone. Does not sleep or run anything.
 * Invariants: Always returns a date after `from`.
 * Side-effects: none
 * Links: services/collector/src/scheduling/run-loop.ts
 * @internal
 */

import cronParser from "cron-parser";

/**
 * Computes the next run time from a cron expression and timezone.
 * Throws on an invalid expression or timezone.
 */
export function computeNextCronTime(
  cron: string,
  timezone: string,
  from: Date = new Date()
): Date {
  const interval = cronParser.parseExpression(cron, {
    currentDate: from,
    tz: timezone,
  });
  return interval.next().toDate();
}

/** Parse-only check used by env validation. */
export function describeCronError(
  cron: string,
  timezone: string
): string | null {
  try {
    computeNextCronTime(cron, timezone);
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}
