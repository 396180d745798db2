// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/adapters/checkpoint/schema`
 * Purpose: Postgres table holding collector checkpoints.
 * Scope: Schema definitions only. Does not contain queries.
 * Invariants:
 * - One row per checkpoint key (PK on key).
 * - `state` is jsonb so a legacy bare number and the current object both round-trip.
 * Side-effects: none (schema definitions only)
 * Links: drizzle.config.ts
 * @public
 */

import { jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const collectorCheckpoints = pgTable("collector_checkpoints", {
  key: text("key").primaryKey(),
  state: jsonb("state").$type<unknown>().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
