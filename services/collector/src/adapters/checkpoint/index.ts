// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/adapters/checkpoint`
 * Purpose: Barrel for checkpoint persistence adapters.
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * Links: services/collector/src/bootstrap/container.ts
 * @internal
 */

export { createCheckpointDbClient } from "./db-client.js";
export { DrizzleCheckpointPersistence } from "./drizzle-checkpoint.adapter.js";
export { FileCheckpointPersistence } from "./file-checkpoint.adapter.js";
