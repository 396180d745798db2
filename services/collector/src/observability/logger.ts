// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/observability/logger`
 * Purpose: Pino logger factory - JSON-only emission.
 * Scope: Create configured pino loggers. Does not decide where collected events go.
 * Invariants: Logs go to stderr (fd 2) because stdout carries the NDJSON event stream. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads LOG_LEVEL, SERVICE_NAME and NODE_ENV directly so a broken env still yields a boot logger. Formatting via external pipe (pino-pretty).
 * Links: services/collector/src/observability/redact.ts, services/collector/src/main.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const logLevel = process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "lastpass-collector";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  return pino(
    {
      level: logLevel,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, app: "lastpass-reporting-collector", service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/** Flush buffered log lines before the process exits. */
export function flushLogger(logger: Logger): void {
  logger.flush();
}
