// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/settings`
 * Purpose: Configuration-time validation of the API URL and the operator start time.
 * Scope: Pure checks that throw ConfigValidationError. Does not read process.env.
 * Invariants:
 * - Only HTTPS endpoints are accepted; a bare domain is prefixed with https://.
 * - An operator start must resolve to an instant inside the lookback window.
 * Side-effects: none
 * Links: services/collector/src/bootstrap/env.ts
 * @public
 */

import { ConfigValidationError } from "./errors";
import { isWithinLookback, MAX_LOOKBACK_DAYS, toInstant } from "./time";

export const DEFAULT_API_URL = "https://lastpass.com/enterpriseapi.php";

/**
 * @example
 * normalizeApiUrl("lastpass.com/enterpriseapi.php")
 * // => "https://lastpass.com/enterpriseapi.php"
 */
export function normalizeApiUrl(raw: string): string {
  const url = raw.trim();
  if (url.includes("https://")) return url;
  if (url.includes("http://")) {
    throw new ConfigValidationError(
      '"HTTP" protocol not allowed. Please update for HTTPS.'
    );
  }
  if (!url.includes(".")) {
    throw new ConfigValidationError(
      "URL submission invalid. Please validate domain."
    );
  }
  return `https://${url}`;
}

/**
 * Validate an operator-supplied start time at configuration time.
 * Unlike toBoundedInstant this fails loudly: a bad value blocks activation.
 */
export function validateOperatorStart(value: string, now: Date): Date {
  const instant = toInstant(value);
  if (!instant) {
    throw new ConfigValidationError(
      `Start time "${value}" is not an epoch value or a "YYYY-MM-DD HH:MM:SS" timestamp.`
    );
  }
  if (!isWithinLookback(instant, now)) {
    throw new ConfigValidationError(
      `Start time "${value}" is out of range: it must not be in the future or more than ${MAX_LOOKBACK_DAYS} days ago.`
    );
  }
  return instant;
}
