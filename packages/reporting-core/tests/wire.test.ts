// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/tests/wire`
 * Purpose: Unit tests for the reporting request body and response schema.
 * Scope: Test-only. Does not contain production code.
 * Side-effects: none
 * Links: packages/reporting-core/src/wire.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  buildReportingRequest,
  hasAuthorizationError,
  ReportingResponseSchema,
} from "../src/wire";

describe("buildReportingRequest", () => {
  it("builds the fixed reporting body with wire-format bounds", () => {
    const body = buildReportingRequest(
      { cid: "8771312", provhash: "test-provhash" },
      { from: new Date(2024, 0, 9), to: new Date(2024, 0, 9, 23, 59, 59) }
    );

    expect(body).toEqual({
      cid: "8771312",
      provhash: "test-provhash",
      cmd: "reporting",
      apiuser: "splunk.collector",
      user: "allusers",
      data: { from: "2024-01-09 00:00:00", to: "2024-01-09 23:59:59" },
    });
  });
});

describe("ReportingResponseSchema", () => {
  it("keeps records in response order", () => {
    const parsed = ReportingResponseSchema.parse({
      status: "OK",
      next: null,
      data: {
        Event2: { Time: "2024-01-09 10:00:00", Action: "Log in" },
        Event1: { Time: "2024-01-09 09:00:00", Action: "Log out" },
      },
    });

    expect(parsed.status).toBe("OK");
    expect(Object.keys(parsed.data)).toEqual(["Event2", "Event1"]);
  });

  it("treats an empty array or missing data as no records", () => {
    expect(ReportingResponseSchema.parse({ status: "OK", data: [] }).data).toEqual(
      {}
    );
    expect(ReportingResponseSchema.parse({ status: "OK" }).data).toEqual({});
  });

  it("rejects bodies without a status", () => {
    expect(ReportingResponseSchema.safeParse({ data: {} }).success).toBe(false);
  });
});

describe("hasAuthorizationError", () => {
  it("detects the vendor authorization marker", () => {
    expect(hasAuthorizationError("Authorization Error: bad provhash")).toBe(
      true
    );
    expect(hasAuthorizationError('{"status":"OK"}')).toBe(false);
  });
});
