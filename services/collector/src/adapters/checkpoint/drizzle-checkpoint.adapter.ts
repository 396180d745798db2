// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/adapters/checkpoint/drizzle-checkpoint`
 * Purpose: Drizzle ORM implementation of CheckpointPersistence.
 * Scope: Raw get/put of one keyed row. Does not validate or normalize state (CheckpointStore does).
 * Invariants:
 * - put is a single upsert on key, so a record is replaced whole.
 * - get returns the stored jsonb value as-is, or null when the key has no row.
 * Side-effects: IO (database operations)
 * Links: services/collector/src/adapters/checkpoint/schema.ts
 * @public
 */

import type {
  CheckpointPersistence,
  StoredCheckpointState,
} from "@lp-reporting/reporting-core";
import { eq } from "drizzle-orm";

import type { CheckpointDatabase } from "./db-client.js";
import { collectorCheckpoints } from "./schema.js";

export class DrizzleCheckpointPersistence implements CheckpointPersistence {
  constructor(private readonly db: CheckpointDatabase) {}

  async get(key: string): Promise<unknown> {
    const rows = await this.db
      .select({ state: collectorCheckpoints.state })
      .from(collectorCheckpoints)
      .where(eq(collectorCheckpoints.key, key))
      .limit(1);
    return rows[0]?.state ?? null;
  }

  async put(key: string, state: StoredCheckpointState): Promise<void> {
    await this.db
      .insert(collectorCheckpoints)
      .values({ key, state, updatedAt: new Date() })
      .onConflictDoUpdate({
        target: collectorCheckpoints.key,
        set: { state, updatedAt: new Date() },
      });
  }

  /** Release pooled connections. */
  async close(): Promise<void> {
    await this.db.$client.end();
  }
}
