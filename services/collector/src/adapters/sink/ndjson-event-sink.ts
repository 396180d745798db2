// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/adapters/sink/ndjson-event-sink`
 * Purpose: EventSink that writes one JSON line per event to a writable stream.
 * Scope: Serialization and backpressure only. Does not batch or retry.
 * Invariants:
 * - Lines are written in emit order.
 * - `event` carries the serialized record unchanged.
 * - A write waits for "drain" when the stream buffer is full.
 * Side-effects: IO (writes to the given stream, stdout by default)
 * Links: packages/reporting-core/src/ports.ts
 * @internal
 */

import { once } from "node:events";
import type { Writable } from "node:stream";

import type {
  EventSink,
  EventTime,
  SourceMetadata,
} from "@lp-reporting/reporting-core";

export interface NdjsonEventLine {
  readonly time: EventTime;
  readonly source: string;
  readonly sourcetype: string;
  readonly index?: string;
  readonly event: string;
}

export class NdjsonEventSink implements EventSink {
  constructor(private readonly stream: Writable = process.stdout) {}

  async emit(
    data: string,
    time: EventTime,
    metadata: SourceMetadata
  ): Promise<void> {
    const line: NdjsonEventLine = {
      time,
      source: metadata.source,
      sourcetype: metadata.sourcetype,
      ...(metadata.index !== undefined && { index: metadata.index }),
      event: data,
    };

    if (!this.stream.write(`${JSON.stringify(line)}\n`)) {
      await once(this.stream, "drain");
    }
  }
}
