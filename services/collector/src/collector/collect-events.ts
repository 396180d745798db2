// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/collector/collect-events`
 * Purpose: One collection invocation: plan windows, query each, emit events, checkpoint progress.
 * Scope: Orchestration over injected ports. Does not construct clients or read env.
 * Invariants:
 * - Windows are processed strictly in order, one request each.
 * - A non-OK vendor status aborts before any record of that response is emitted.
 * - Checkpoint after every CHECKPOINT_EVERY records in a window and once after its last record.
 * - A window with no records writes no checkpoint.
 * - The abort signal is observed between windows only.
 * - No internal retry; unhandled errors are logged with window context and rethrown.
 * Side-effects: IO (HTTP, event sink, checkpoint persistence via ports)
 * Links: packages/reporting-core/src/window-planner.ts, services/collector/src/checkpoint/checkpoint-store.ts
 * @public
 */

import {
  buildReportingRequest,
  type Clock,
  type CollectorLogger,
  type EventSink,
  type EventTime,
  FatalQueryRejectionError,
  hasAuthorizationError,
  type HttpClient,
  isFatalQueryRejection,
  planWindows,
  type QueryWindow,
  type ReportingRecord,
  ReportingResponseSchema,
  resolveEffectiveStart,
  type SourceMetadata,
  type StartRule,
  STATUS_OK,
  toBoundedInstant,
  toEpochSeconds,
  toEventTimeString,
  toInstant,
  toWireFormat,
  type VendorCredentials,
} from "@lp-reporting/reporting-core";

import type { CheckpointStore } from "../checkpoint/checkpoint-store.js";

/** Records emitted between intermediate checkpoints. */
export const CHECKPOINT_EVERY = 1000;

export interface CollectorConfig {
  readonly apiUrl: string;
  readonly credentials: VendorCredentials;
  /** Raw operator start; resolved per invocation against the current clock. */
  readonly operatorStart?: string;
  readonly metadata: SourceMetadata;
}

export interface CollectorDeps {
  readonly config: CollectorConfig;
  readonly http: HttpClient;
  readonly checkpoints: CheckpointStore;
  readonly sink: EventSink;
  readonly clock: Clock;
  readonly logger: CollectorLogger;
}

export interface CollectOptions {
  readonly signal?: AbortSignal;
}

export interface CollectionSummary {
  readonly effectiveStart: Date;
  readonly rule: StartRule;
  readonly now: Date;
  readonly windowsPlanned: number;
  readonly windowsCompleted: number;
  readonly eventsEmitted: number;
  readonly checkpointsWritten: number;
  readonly stopped: boolean;
}

export interface Collector {
  collect(options?: CollectOptions): Promise<CollectionSummary>;
}

interface WindowResult {
  readonly emitted: number;
  readonly checkpoints: number;
}

export function createCollector(deps: CollectorDeps): Collector {
  const { config, http, checkpoints, sink, clock, logger } = deps;

  async function fetchWindow(
    window: QueryWindow
  ): Promise<[string, ReportingRecord][]> {
    const body = buildReportingRequest(config.credentials, window);
    const response = await http.post(config.apiUrl, {}, body);

    if (response.statusCode !== 200 || hasAuthorizationError(response.text)) {
      logger.error(
        {
          statusCode: response.statusCode,
          from: body.data.from,
          to: body.data.to,
          responseText: response.text,
        },
        "Reporting request failed"
      );
    }

    const parsed = ReportingResponseSchema.parse(response.json());
    if (parsed.status !== STATUS_OK) {
      logger.error(
        { status: parsed.status, from: body.data.from, to: body.data.to },
        "Reporting query rejected"
      );
      throw new FatalQueryRejectionError(parsed.status, body.data);
    }

    return Object.entries(parsed.data);
  }

  async function collectWindow(
    window: QueryWindow,
    effectiveStart: Date,
    now: Date
  ): Promise<WindowResult> {
    const records = await fetchWindow(window);

    let emitted = 0;
    let saved = 0;
    let lastEventTime: EventTime | null = null;

    for (const [eventId, record] of records) {
      const collectedAt = clock.now();
      const recordTime = toInstant(record.Time);
      const eventTime: EventTime = recordTime
        ? toEventTimeString(recordTime)
        : toEpochSeconds(collectedAt);

      const event = {
        ...record,
        event_id: eventId,
        time_collected: toEpochSeconds(collectedAt),
      };
      await sink.emit(JSON.stringify(event), eventTime, config.metadata);
      emitted += 1;
      lastEventTime = eventTime;

      if (emitted % CHECKPOINT_EVERY === 0) {
        await checkpoints.save(eventTime, effectiveStart, now);
        saved += 1;
      }
    }

    if (lastEventTime !== null) {
      await checkpoints.save(lastEventTime, effectiveStart, now);
      saved += 1;
    }

    return { emitted, checkpoints: saved };
  }

  return {
    async collect(options: CollectOptions = {}): Promise<CollectionSummary> {
      const now = clock.now();
      const loaded = await checkpoints.load();
      const checkpoint = loaded.kind === "present" ? loaded.record : null;

      const operatorStart = config.operatorStart
        ? toBoundedInstant(config.operatorStart, { now, logger })
        : null;

      const { start, rule } = resolveEffectiveStart({
        operatorStart,
        checkpoint,
        now,
        logger,
      });
      const plan = planWindows(start, now);

      logger.info(
        {
          effectiveStart: toWireFormat(start),
          now: toWireFormat(now),
          rule,
          totalDays: plan.totalDays,
          chunkDays: plan.chunkDays,
          windows: plan.windows.length,
        },
        "Collection planned"
      );

      let windowsCompleted = 0;
      let eventsEmitted = 0;
      let checkpointsWritten = 0;
      let stopped = false;

      for (const window of plan.windows) {
        if (options.signal?.aborted) {
          stopped = true;
          logger.info(
            { windowsCompleted, windowsPlanned: plan.windows.length },
            "Collection stopped before next window"
          );
          break;
        }

        try {
          const result = await collectWindow(window, start, now);
          windowsCompleted += 1;
          eventsEmitted += result.emitted;
          checkpointsWritten += result.checkpoints;
          logger.debug(
            {
              from: toWireFormat(window.from),
              to: toWireFormat(window.to),
              events: result.emitted,
            },
            "Window collected"
          );
        } catch (err) {
          if (!isFatalQueryRejection(err)) {
            logger.error(
              {
                from: toWireFormat(window.from),
                to: toWireFormat(window.to),
                err,
              },
              "Error collecting reporting events"
            );
          }
          throw err;
        }
      }

      const summary: CollectionSummary = {
        effectiveStart: start,
        rule,
        now,
        windowsPlanned: plan.windows.length,
        windowsCompleted,
        eventsEmitted,
        checkpointsWritten,
        stopped,
      };
      logger.info(
        {
          windowsCompleted,
          eventsEmitted,
          checkpointsWritten,
          stopped,
        },
        "Collection finished"
      );
      return summary;
    },
  };
}
