// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/ports`
 * Purpose: Port barrel, the import surface for every port interface this service uses.
 * Scope: Re-exports only. No implementations, no runtime objects.
 * Invariants: Named exports only, no concrete adapter types
 * Side-effects: none
 * Links: Consumed by bootstrap/; collector/ and checkpoint/ import the same interfaces from @lp-reporting/reporting-core directly
 * @public
 */

export type {
  CheckpointPersistence,
  Clock,
  CollectorLogger,
  EventSink,
  HttpClient,
  SourceMetadata,
} from "@lp-reporting/reporting-core";

export type { CheckpointStore } from "../checkpoint/checkpoint-store.js";
