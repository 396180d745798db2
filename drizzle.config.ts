// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `drizzle.config`
 * Purpose: drizzle-kit configuration for the checkpoint table.
 * Scope: Schema path and credentials for `db:push`. Does not handle runtime database connections.
 * Invariants: Schema path matches the checkpoint adapter schema.
 * Side-effects: IO (database DDL when drizzle-kit runs)
 * Links: services/collector/src/adapters/checkpoint/schema.ts
 * @public
 */

import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: "./services/collector/src/adapters/checkpoint/schema.ts",
  out: "./services/collector/drizzle",
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "postgres://localhost:5432/lastpass_collector",
  },
  verbose: true,
  strict: true,
});
