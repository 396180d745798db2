// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/main`
 * Purpose: Service entry point with graceful shutdown. Runs the collector once or on a schedule.
 * Scope: Entry point that calls env() and wires the container. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - SIGTERM/SIGINT stop work between windows and between scheduled runs
 *   - Exit code reflects the outcome of the last invocation
 * Side-effects: IO (process signals, exit code)
 * Links: services/collector/src/bootstrap/container.ts, services/collector/src/scheduling/run-loop.ts
 * @public
 */

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { flushLogger, makeLogger } from "./observability/logger.js";
import { runInvocation, runOnSchedule } from "./scheduling/run-loop.js";

async function main(): Promise<number> {
  // Load and validate env
  const config = env();

  // Composition root owns logger creation
  const logger = makeLogger();
  const container = createContainer(config, logger);

  const controller = new AbortController();
  const stop = (signal: string): void => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    logger.info({ signal }, "Received signal, stopping after current window");
    controller.abort();
  };
  process.on("SIGTERM", () => stop("SIGTERM"));
  process.on("SIGINT", () => stop("SIGINT"));

  logger.info(
    {
      apiUrl: config.LASTPASS_API_URL,
      checkpointBackend: config.CHECKPOINT_BACKEND,
      schedule: config.COLLECT_SCHEDULE ?? null,
    },
    "Starting LastPass reporting collector"
  );

  try {
    if (config.COLLECT_SCHEDULE) {
      return await runOnSchedule(container.collector, logger, {
        cron: config.COLLECT_SCHEDULE,
        timezone: config.SCHEDULE_TIMEZONE,
        signal: controller.signal,
      });
    }
    const outcome = await runInvocation(
      container.collector,
      logger,
      controller.signal
    );
    return outcome.exitCode;
  } finally {
    await container.close();
    logger.info({}, "Collector stopped");
    flushLogger(logger);
  }
}

const bootLogger = makeLogger({ phase: "boot" });

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    bootLogger.fatal({ err }, "Fatal error during startup");
    flushLogger(bootLogger);
    process.exitCode = 1;
  }
);
