// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module; defines sensitive path patterns.
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  // Vendor credentials
  "cid",
  "provhash",
  "credentials.cid",
  "credentials.provhash",
  "body.cid",
  "body.provhash",
  "LASTPASS_CID",
  "LASTPASS_PROVHASH",
  // Connection strings
  "DATABASE_URL",
  "databaseUrl",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
];
