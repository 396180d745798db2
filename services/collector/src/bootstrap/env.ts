// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction; reads process.env and nothing else.
 * Invariants:
 * - LASTPASS_CID and LASTPASS_PROVHASH required (treat provhash as secret - never log)
 * - LASTPASS_API_URL must be HTTPS; a bare domain is prefixed
 * - LASTPASS_TIME_START, when set, must resolve inside the 4-year lookback
 * - DATABASE_URL required only for CHECKPOINT_BACKEND=postgres
 * - Fails fast with every issue listed
 * Side-effects: Reads process.env
 * Links: packages/reporting-core/src/settings.ts
 * @internal
 */

import {
  CHECKPOINT_KEY,
  ConfigValidationError,
  DEFAULT_API_URL,
  normalizeApiUrl,
  validateOperatorStart,
} from "@lp-reporting/reporting-core";
import { z } from "zod";

import { describeCronError } from "../scheduling/cron.js";

const optionalString = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

function buildEnvSchema(now: Date) {
  return z
    .object({
      /** Enterprise API endpoint (default: LastPass US data center) */
      LASTPASS_API_URL: z
        .string()
        .default(DEFAULT_API_URL)
        .transform((raw, ctx) => {
          try {
            return normalizeApiUrl(raw);
          } catch (err) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: err instanceof Error ? err.message : String(err),
            });
            return z.NEVER;
          }
        }),

      /** Enterprise account number (required) */
      LASTPASS_CID: z.string().min(1, "LASTPASS_CID is required"),

      /** Provisioning hash (required, treat as secret - never log) */
      LASTPASS_PROVHASH: z.string().min(1, "LASTPASS_PROVHASH is required"),

      /** Operator start: epoch seconds or "YYYY-MM-DD HH:MM:SS" (optional) */
      LASTPASS_TIME_START: optionalString.superRefine((value, ctx) => {
        if (value === undefined) return;
        try {
          validateOperatorStart(value, now);
        } catch (err) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: err instanceof Error ? err.message : String(err),
          });
        }
      }),

      /** Where the checkpoint record lives (default: file) */
      CHECKPOINT_BACKEND: z.enum(["file", "postgres"]).default("file"),

      /** Checkpoint file for the file backend */
      CHECKPOINT_FILE: z
        .string()
        .min(1)
        .default(".checkpoints/lastpass-reporting.json"),

      /** Checkpoint slot name */
      CHECKPOINT_KEY: z.string().min(1).default(CHECKPOINT_KEY),

      /** PostgreSQL connection string (required for the postgres backend) */
      DATABASE_URL: optionalString,

      /** Cron expression; unset means run once and exit */
      COLLECT_SCHEDULE: optionalString,

      /** Timezone the cron expression is evaluated in */
      SCHEDULE_TIMEZONE: z.string().min(1).default("UTC"),

      /** Sink metadata attached to every event */
      EVENT_SOURCE: z.string().min(1).default("lastpass_event_reporting"),
      EVENT_SOURCETYPE: z.string().min(1).default("lastpass:activity"),
      EVENT_INDEX: optionalString,

      /** Per-request timeout for the reporting API */
      HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

      /** Log level (default: info) */
      LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

      /** Service name for logging */
      SERVICE_NAME: z.string().default("lastpass-collector"),
    })
    .superRefine((env, ctx) => {
      if (env.CHECKPOINT_BACKEND === "postgres" && !env.DATABASE_URL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["DATABASE_URL"],
          message: "DATABASE_URL is required when CHECKPOINT_BACKEND=postgres",
        });
      }
      if (env.COLLECT_SCHEDULE) {
        const cronError = describeCronError(
          env.COLLECT_SCHEDULE,
          env.SCHEDULE_TIMEZONE
        );
        if (cronError) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["COLLECT_SCHEDULE"],
            message: `Invalid schedule: ${cronError}`,
          });
        }
      }
    });
}

export type Env = z.infer<ReturnType<typeof buildEnvSchema>>;

/**
 * Parse and validate an environment map.
 * Throws ConfigValidationError listing every issue.
 */
export function parseEnv(
  source: Record<string, string | undefined>,
  now: Date = new Date()
): Env {
  const result = buildEnvSchema(now).safeParse(source);
  if (!result.success) {
    const issues = result.error.errors.map(
      (e) => `  ${e.path.join(".")}: ${e.message}`
    );
    throw new ConfigValidationError(
      `Invalid environment configuration:\n${issues.join("\n")}`,
      issues
    );
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
