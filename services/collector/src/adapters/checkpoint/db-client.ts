// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/adapters/checkpoint/db-client`
 * Purpose: Drizzle client constructor for the checkpoint table.
 * Scope: Connection setup only. Does not handle env resolution.
 * Invariants:
 *   - Connection string injected, never from process.env
 *   - Single small pool: one invocation touches one row at a time
 * Side-effects: IO (database connections)
 * @internal
 */

import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "./schema.js";

export function createCheckpointDbClient(connectionString: string) {
  const client = postgres(connectionString, {
    max: 2,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: "lastpass_collector",
    },
  });

  return drizzle(client, { schema });
}

/** Drizzle client including the postgres.js `$client` accessor for pool control. */
export type CheckpointDatabase = ReturnType<typeof createCheckpointDbClient>;
