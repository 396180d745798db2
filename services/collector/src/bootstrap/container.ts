// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/bootstrap/container`
 * Purpose: Composition root, wires concrete adapters to port interfaces.
 * Scope: All adapter construction lives here. Returns a typed container against port interfaces.
 * Invariants:
 * - Only file that imports concrete adapters
 * - collector/ and checkpoint/ depend on port interfaces and core helpers, never on this module or adapters/
 * - close() releases whatever the chosen backend opened
 * Side-effects: Creates DB connection pool (postgres backend)
 * Links: services/collector/src/ports/index.ts
 * @internal
 */

import { systemClock } from "@lp-reporting/reporting-core";

import {
  createCheckpointDbClient,
  DrizzleCheckpointPersistence,
  FileCheckpointPersistence,
} from "../adapters/checkpoint/index.js";
import { FetchHttpClient } from "../adapters/http/fetch-http-client.js";
import { NdjsonEventSink } from "../adapters/sink/ndjson-event-sink.js";
import { PersistentCheckpointStore } from "../checkpoint/checkpoint-store.js";
import {
  type Collector,
  createCollector,
} from "../collector/collect-events.js";
import type { Logger } from "../observability/logger.js";
import type { CheckpointPersistence } from "../ports/index.js";
import type { Env } from "./env.js";

export interface ServiceContainer {
  collector: Collector;
  logger: Logger;
  close(): Promise<void>;
}

/**
 * Build the service container from validated env and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(config: Env, logger: Logger): ServiceContainer {
  let persistence: CheckpointPersistence;
  let close: () => Promise<void> = async () => {};

  if (config.CHECKPOINT_BACKEND === "postgres" && config.DATABASE_URL) {
    const drizzlePersistence = new DrizzleCheckpointPersistence(
      createCheckpointDbClient(config.DATABASE_URL)
    );
    persistence = drizzlePersistence;
    close = () => drizzlePersistence.close();
  } else {
    persistence = new FileCheckpointPersistence(config.CHECKPOINT_FILE);
  }

  const checkpoints = new PersistentCheckpointStore(
    persistence,
    config.CHECKPOINT_KEY,
    logger.child({ component: "checkpoint-store" })
  );

  const collector = createCollector({
    config: {
      apiUrl: config.LASTPASS_API_URL,
      credentials: {
        cid: config.LASTPASS_CID,
        provhash: config.LASTPASS_PROVHASH,
      },
      operatorStart: config.LASTPASS_TIME_START,
      metadata: {
        source: config.EVENT_SOURCE,
        sourcetype: config.EVENT_SOURCETYPE,
        index: config.EVENT_INDEX,
      },
    },
    http: new FetchHttpClient({ timeoutMs: config.HTTP_TIMEOUT_MS }),
    checkpoints,
    sink: new NdjsonEventSink(),
    clock: systemClock,
    logger: logger.child({ component: "collector" }),
  });

  return { collector, logger, close };
}
