// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/wire`
 * Purpose: LastPass Enterprise API reporting request body and response schema.
 * Scope: Pure shapes and builders. Does not perform HTTP.
 * Invariants:
 * - Request fields and literal values are fixed by the vendor protocol.
 * - `from`/`to` are wire-format local timestamps.
 * - Record iteration follows the response body's key order.
 * Side-effects: none
 * Links: services/collector/src/collector/collect-events.ts
 * @public
 */

import { z } from "zod";

import type { QueryWindow } from "./window-planner";
import { toWireFormat } from "./time";

export const REPORTING_CMD = "reporting";
export const REPORTING_API_USER = "splunk.collector";
export const REPORTING_USER = "allusers";
export const STATUS_OK = "OK";
export const AUTHORIZATION_ERROR_MARKER = "Authorization Error";

export interface VendorCredentials {
  readonly cid: string;
  readonly provhash: string;
}

export interface ReportingRequestBody {
  readonly cid: string;
  readonly provhash: string;
  readonly cmd: typeof REPORTING_CMD;
  readonly apiuser: typeof REPORTING_API_USER;
  readonly user: typeof REPORTING_USER;
  readonly data: { readonly from: string; readonly to: string };
}

export function buildReportingRequest(
  credentials: VendorCredentials,
  window: QueryWindow
): ReportingRequestBody {
  return {
    cid: credentials.cid,
    provhash: credentials.provhash,
    cmd: REPORTING_CMD,
    apiuser: REPORTING_API_USER,
    user: REPORTING_USER,
    data: {
      from: toWireFormat(window.from),
      to: toWireFormat(window.to),
    },
  };
}

export const ReportingRecordSchema = z.record(z.string(), z.unknown());

export type ReportingRecord = z.infer<typeof ReportingRecordSchema>;

/**
 * `data` is an id -> record map; the API sends an empty array when a window
 * has no events.
 */
export const ReportingResponseSchema = z.object({
  status: z.string(),
  data: z
    .union([
      z.record(z.string(), ReportingRecordSchema),
      z.array(z.unknown()).max(0),
    ])
    .nullish()
    .transform((data) => (data && !Array.isArray(data) ? data : {})),
});

export type ReportingResponse = z.infer<typeof ReportingResponseSchema>;

export function hasAuthorizationError(body: string): boolean {
  return body.includes(AUTHORIZATION_ERROR_MARKER);
}
