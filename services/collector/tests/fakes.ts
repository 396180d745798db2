// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/tests/fakes`
 * Purpose: In-process stand-ins for the collector ports.
 * Scope: Test-only. Does not contain production code.
 * Invariants: No network, no database, no file system.
 * Side-effects: none
 * Links: packages/reporting-core/src/ports.ts
 * @internal
 */

import type {
  CheckpointPersistence,
  Clock,
  EventSink,
  EventTime,
  HttpClient,
  HttpResponse,
  SourceMetadata,
  StoredCheckpointState,
} from "@lp-reporting/reporting-core";
import { vi } from "vitest";

export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export class InMemoryCheckpointPersistence implements CheckpointPersistence {
  readonly slots = new Map<string, unknown>();
  readonly writes: Array<{ key: string; state: StoredCheckpointState }> = [];
  failGet: Error | null = null;
  failPut: Error | null = null;

  async get(key: string): Promise<unknown> {
    if (this.failGet) throw this.failGet;
    return this.slots.get(key) ?? null;
  }

  async put(key: string, state: StoredCheckpointState): Promise<void> {
    if (this.failPut) throw this.failPut;
    this.writes.push({ key, state });
    this.slots.set(key, state);
  }
}

export interface EmittedEvent {
  readonly data: string;
  readonly time: EventTime;
  readonly metadata: SourceMetadata;
}

export class RecordingEventSink implements EventSink {
  readonly events: EmittedEvent[] = [];

  async emit(
    data: string,
    time: EventTime,
    metadata: SourceMetadata
  ): Promise<void> {
    this.events.push({ data, time, metadata });
  }

  parsed(): Array<Record<string, unknown>> {
    return this.events.map((e) => {
      const value: unknown = JSON.parse(e.data);
      if (typeof value !== "object" || value === null) {
        throw new Error("emitted event is not an object");
      }
      return { ...value };
    });
  }
}

export interface RecordedRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
}

/** Replays scripted responses in order; the last one repeats. */
export class ScriptedHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly responses: Array<HttpResponse | Error>;

  constructor(responses: Array<HttpResponse | Error>) {
    this.responses = [...responses];
  }

  async post(
    url: string,
    headers: Readonly<Record<string, string>>,
    body: unknown
  ): Promise<HttpResponse> {
    this.requests.push({ url, headers, body });
    const next =
      this.responses.length > 1 ? this.responses.shift() : this.responses[0];
    if (next === undefined) throw new Error("no scripted response");
    if (next instanceof Error) throw next;
    return next;
  }
}

export function jsonResponse(payload: unknown, statusCode = 200): HttpResponse {
  const text = JSON.stringify(payload);
  return { statusCode, text, json: (): unknown => JSON.parse(text) };
}

export function okResponse(
  data: Record<string, Record<string, unknown>> | unknown[]
): HttpResponse {
  return jsonResponse({ status: "OK", data });
}

/** Builds `count` records keyed Event1..EventN with a fixed Time. */
export function makeRecords(
  count: number,
  time = "2024-01-09 12:00:00"
): Record<string, Record<string, unknown>> {
  const data: Record<string, Record<string, unknown>> = {};
  for (let i = 1; i <= count; i += 1) {
    data[`Event${i}`] = {
      Time: time,
      Username: `user${i}@example.com`,
      IP_Address: "192.0.2.10",
      Action: "Log in",
      Data: "",
    };
  }
  return data;
}

export class FixedClock implements Clock {
  constructor(private readonly current: Date) {}

  now(): Date {
    return this.current;
  }
}
