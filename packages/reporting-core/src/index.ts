// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core`
 * Purpose: Pure domain for incremental, checkpointed collection of LastPass reporting events.
 * Scope: Time normalization, checkpoint codec, window planning, wire shapes, errors and port interfaces. Does not contain adapters or I/O.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: implementations live in services/collector.
 * - No imports from services/.
 * Side-effects: none
 * Links: services/collector/src/bootstrap/container.ts
 * @public
 */

export {
  CHECKPOINT_KEY,
  type CheckpointAbsentReason,
  type CheckpointLoadResult,
  type CheckpointRecord,
  decodeCheckpoint,
  encodeCheckpoint,
} from "./checkpoint";
export {
  CheckpointStoreError,
  ConfigValidationError,
  FatalQueryRejectionError,
  isCheckpointStoreError,
  isConfigValidationError,
  isFatalQueryRejection,
  TimeFormatError,
} from "./errors";
export {
  type CheckpointPersistence,
  type Clock,
  type CollectorLogger,
  type EventSink,
  type EventTime,
  type HttpClient,
  type HttpResponse,
  type SourceMetadata,
  type StoredCheckpointState,
  systemClock,
} from "./ports";
export {
  DEFAULT_API_URL,
  normalizeApiUrl,
  validateOperatorStart,
} from "./settings";
export {
  classifyTimeValue,
  DAY_MS,
  isWithinLookback,
  MAX_LOOKBACK_DAYS,
  type TimeValueKind,
  toBoundedInstant,
  toEpochSeconds,
  toEventTimeString,
  toInstant,
  toStorageString,
  toWireFormat,
} from "./time";
export {
  defaultStart,
  type EffectiveStart,
  LARGE_CHUNK_DAYS,
  LARGE_RANGE_DAYS,
  planWindows,
  type QueryWindow,
  resolveEffectiveStart,
  SMALL_CHUNK_DAYS,
  type StartRule,
  type WindowPlan,
} from "./window-planner";
export {
  AUTHORIZATION_ERROR_MARKER,
  buildReportingRequest,
  hasAuthorizationError,
  REPORTING_API_USER,
  REPORTING_CMD,
  REPORTING_USER,
  type ReportingRecord,
  ReportingRecordSchema,
  type ReportingRequestBody,
  type ReportingResponse,
  ReportingResponseSchema,
  STATUS_OK,
  type VendorCredentials,
} from "./wire";
