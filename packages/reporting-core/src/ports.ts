// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/ports`
 * Purpose: Port interfaces the collector consumes from its host.
 * Scope: Pure interfaces. Implementations live in services/collector/src/adapters/.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: no fetch, pg, fs or pino imports here.
 * - Every collaborator is passed explicitly; there is no process-wide helper object.
 * Side-effects: none
 * Links: services/collector/src/bootstrap/container.ts
 * @public
 */

// ---------------------------------------------------------------------------
// Logger (minimal; core does not depend on pino)
// ---------------------------------------------------------------------------

export interface CollectorLogger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

// ---------------------------------------------------------------------------
// Checkpoint persistence
// ---------------------------------------------------------------------------

/** Stored checkpoint state. Field names are the persisted wire names. */
export interface StoredCheckpointState {
  readonly time_curr: string;
  readonly time_start: string;
  readonly time_end: string;
}

/**
 * Raw key/value slot for the checkpoint record.
 * `get` returns whatever was stored (possibly a legacy bare number), or
 * null/undefined when the key was never written.
 */
export interface CheckpointPersistence {
  get(key: string): Promise<unknown>;
  put(key: string, state: StoredCheckpointState): Promise<void>;
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

export interface HttpResponse {
  readonly statusCode: number;
  readonly text: string;
  /** Parses `text` as JSON. Throws on a non-JSON body. */
  json(): unknown;
}

export interface HttpClient {
  post(
    url: string,
    headers: Readonly<Record<string, string>>,
    body: unknown
  ): Promise<HttpResponse>;
}

// ---------------------------------------------------------------------------
// Event sink
// ---------------------------------------------------------------------------

/**
 * Event timestamp as handed to the sink.
 * Parsed record times arrive as `"<seconds>.<micros>"` strings; the
 * ingestion fallback arrives as numeric epoch seconds.
 */
export type EventTime = string | number;

export interface SourceMetadata {
  readonly source: string;
  readonly sourcetype: string;
  readonly index?: string;
}

export interface EventSink {
  emit(data: string, time: EventTime, metadata: SourceMetadata): Promise<void>;
}

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
