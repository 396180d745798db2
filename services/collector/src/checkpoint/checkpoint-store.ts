// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/checkpoint/checkpoint-store`
 * Purpose: Load and save the collector checkpoint through a CheckpointPersistence slot.
 * Scope: Wraps the core codec with I/O and logging. Does not decide where collection starts.
 * Invariants:
 * - load never throws: read failures and corrupt records become `absent`.
 * - save writes the whole record with one put, or throws CheckpointStoreError.
 * - No retries in either direction.
 * Side-effects: IO (via the injected persistence)
 * Links: packages/reporting-core/src/checkpoint.ts
 * @public
 */

import {
  type CheckpointLoadResult,
  type CheckpointPersistence,
  type CollectorLogger,
  CheckpointStoreError,
  decodeCheckpoint,
  encodeCheckpoint,
  type StoredCheckpointState,
} from "@lp-reporting/reporting-core";

export interface CheckpointStore {
  load(): Promise<CheckpointLoadResult>;
  save(
    timeCurr: unknown,
    timeStart: unknown,
    timeEnd: unknown
  ): Promise<StoredCheckpointState>;
}

export class PersistentCheckpointStore implements CheckpointStore {
  constructor(
    private readonly persistence: CheckpointPersistence,
    private readonly key: string,
    private readonly logger: CollectorLogger
  ) {}

  async load(): Promise<CheckpointLoadResult> {
    let raw: unknown;
    try {
      raw = await this.persistence.get(this.key);
    } catch (err) {
      this.logger.warn(
        { key: this.key, err },
        "Loading checkpoint. Unable to load checkpoint"
      );
      return {
        kind: "absent",
        reason: "unreadable",
        detail: err instanceof Error ? err.message : String(err),
      };
    }

    const result = decodeCheckpoint(raw);
    if (result.kind === "present" && result.record.legacy) {
      this.logger.warn(
        { key: this.key, timeStart: result.record.timeStart },
        "Loading checkpoint. Upgrading legacy checkpoint to current format"
      );
    } else if (result.kind === "absent" && result.reason === "malformed") {
      this.logger.warn(
        { key: this.key, detail: result.detail },
        "Loading checkpoint. Checkpoint is corrupt, ignoring it"
      );
    }
    return result;
  }

  async save(
    timeCurr: unknown,
    timeStart: unknown,
    timeEnd: unknown
  ): Promise<StoredCheckpointState> {
    let state: StoredCheckpointState;
    try {
      state = encodeCheckpoint(timeCurr, timeStart, timeEnd);
    } catch (err) {
      throw new CheckpointStoreError(
        `Cannot encode checkpoint "${this.key}"`,
        { cause: err }
      );
    }

    try {
      await this.persistence.put(this.key, state);
    } catch (err) {
      throw new CheckpointStoreError(
        `Cannot write checkpoint "${this.key}"`,
        { cause: err }
      );
    }

    this.logger.debug({ key: this.key, state }, "Checkpoint saved");
    return state;
  }
}
