// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/adapters/checkpoint/file-checkpoint`
 * Purpose: CheckpointPersistence backed by a JSON file holding a key -> state map.
 * Scope: Raw get/put. Does not validate state (CheckpointStore does).
 * Invariants:
 * - put writes a temp file and renames it over the target, so readers never see a partial record.
 * - A missing file reads as "no checkpoint"; an unparseable file is a read error.
 * - put over an unparseable file starts from an empty map and replaces it.
 * Side-effects: IO (file system)
 * Links: services/collector/src/checkpoint/checkpoint-store.ts
 * @public
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import type {
  CheckpointPersistence,
  StoredCheckpointState,
} from "@lp-reporting/reporting-core";

export class FileCheckpointPersistence implements CheckpointPersistence {
  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<unknown> {
    const slots = await this.readSlots();
    return slots[key] ?? null;
  }

  async put(key: string, state: StoredCheckpointState): Promise<void> {
    const slots: Record<string, unknown> = await this.readSlots().catch(
      (err: unknown) => {
        if (err instanceof CorruptCheckpointFileError) return {};
        throw err;
      }
    );
    slots[key] = state;

    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, `${JSON.stringify(slots, null, 2)}\n`, "utf-8");
    await rename(tmpPath, this.filePath);
  }

  private async readSlots(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new CorruptCheckpointFileError(this.filePath, "is not valid JSON", {
        cause: err,
      });
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new CorruptCheckpointFileError(this.filePath, "is not a JSON object");
    }
    return { ...parsed };
  }
}

export class CorruptCheckpointFileError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Checkpoint file ${filePath} ${reason}`, options);
    this.name = "CorruptCheckpointFileError";
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
