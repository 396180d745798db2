// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/reporting-core/tests/time`
 * Purpose: Unit tests for time value classification and conversions.
 * Scope: Test-only. Does not contain production code.
 * Invariants: Wire-format assertions build their inputs from local date parts.
 * Side-effects: none
 * Links: packages/reporting-core/src/time.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import { TimeFormatError } from "../src/errors";
import {
  classifyTimeValue,
  DAY_MS,
  isWithinLookback,
  toBoundedInstant,
  toEventTimeString,
  toInstant,
  toStorageString,
  toWireFormat,
} from "../src/time";

// 2024-01-10T00:00:00Z
const NOW = new Date(1704844800000);

function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("classifyTimeValue", () => {
  it("classifies integer epoch strings and numbers as digit", () => {
    expect(classifyTimeValue("1704800000")).toEqual({
      kind: "digit",
      seconds: 1704800000,
    });
    expect(classifyTimeValue(" 42 ")).toEqual({ kind: "digit", seconds: 42 });
    expect(classifyTimeValue(1704800000)).toEqual({
      kind: "digit",
      seconds: 1704800000,
    });
  });

  it("classifies positive float epochs as float", () => {
    expect(classifyTimeValue("1704800000.5")).toEqual({
      kind: "float",
      seconds: 1704800000.5,
    });
    expect(classifyTimeValue(1704800000.25)).toEqual({
      kind: "float",
      seconds: 1704800000.25,
    });
  });

  it("rejects non-positive floats", () => {
    expect(classifyTimeValue("-1.5")).toEqual({ kind: "invalid" });
    expect(classifyTimeValue("0.0")).toEqual({ kind: "invalid" });
  });

  it("classifies valid Date objects as native", () => {
    const date = new Date(1704800000000);
    expect(classifyTimeValue(date)).toEqual({ kind: "native", date });
    expect(classifyTimeValue(new Date(Number.NaN))).toEqual({
      kind: "invalid",
    });
  });

  it("classifies exact YYYY-MM-DD HH:MM:SS strings as formatted", () => {
    expect(classifyTimeValue("2024-01-09 12:30:00")).toEqual({
      kind: "formatted",
      date: new Date(2024, 0, 9, 12, 30, 0),
    });
  });

  it("rejects impossible calendar dates and other layouts", () => {
    expect(classifyTimeValue("2024-02-30 00:00:00").kind).toBe("invalid");
    expect(classifyTimeValue("2024-01-09 24:00:00").kind).toBe("invalid");
    expect(classifyTimeValue("2024-01-09T12:30:00").kind).toBe("invalid");
    expect(classifyTimeValue("yesterday").kind).toBe("invalid");
    expect(classifyTimeValue({}).kind).toBe("invalid");
  });

  it("prefers digit over float for integral strings", () => {
    expect(classifyTimeValue("1704800000").kind).toBe("digit");
  });
});

describe("toInstant", () => {
  it("treats digits and floats as epoch seconds", () => {
    expect(toInstant("1704800000")?.getTime()).toBe(1704800000000);
    expect(toInstant("1704800000.25")?.getTime()).toBe(1704800000250);
  });

  it("parses formatted strings as local time", () => {
    expect(toInstant("2024-01-09 12:30:00")).toEqual(
      new Date(2024, 0, 9, 12, 30, 0)
    );
  });

  it("passes Date values through", () => {
    const date = new Date(1704800000000);
    expect(toInstant(date)).toBe(date);
  });

  it("returns null for absent or unparseable values", () => {
    expect(toInstant(null)).toBeNull();
    expect(toInstant(undefined)).toBeNull();
    expect(toInstant("")).toBeNull();
    expect(toInstant(0)).toBeNull();
    expect(toInstant("garbage")).toBeNull();
  });
});

describe("toBoundedInstant", () => {
  it("accepts instants inside the lookback window", () => {
    const logger = makeLogger();
    expect(
      toBoundedInstant("1704800000", { now: NOW, logger })?.getTime()
    ).toBe(1704800000000);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("rejects future instants with a warning", () => {
    const logger = makeLogger();
    expect(toBoundedInstant("1704931200", { now: NOW, logger })).toBeNull();
    expect(logger.warn).toHaveBeenCalledOnce();
  });

  it("rejects instants older than four years with a warning", () => {
    const logger = makeLogger();
    const fiveYearsAgo = String((NOW.getTime() - 5 * 365 * DAY_MS) / 1000);
    expect(toBoundedInstant(fiveYearsAgo, { now: NOW, logger })).toBeNull();
    expect(logger.warn).toHaveBeenCalledOnce();
  });

  it("warns on unparseable values", () => {
    const logger = makeLogger();
    expect(toBoundedInstant("soon", { now: NOW, logger })).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      { timeValue: "soon" },
      "Validating time format. Time conversion failed"
    );
  });

  it("returns null silently for absent values", () => {
    const logger = makeLogger();
    expect(toBoundedInstant(undefined, { now: NOW, logger })).toBeNull();
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("isWithinLookback", () => {
  it("accepts exactly 1460 whole days and rejects 1461", () => {
    expect(isWithinLookback(new Date(NOW.getTime() - 1460 * DAY_MS), NOW)).toBe(
      true
    );
    expect(isWithinLookback(new Date(NOW.getTime() - 1461 * DAY_MS), NOW)).toBe(
      false
    );
  });

  it("rejects instants even a millisecond in the future", () => {
    expect(isWithinLookback(new Date(NOW.getTime() + 1), NOW)).toBe(false);
    expect(isWithinLookback(NOW, NOW)).toBe(true);
  });
});

describe("toWireFormat", () => {
  it("renders local time and drops milliseconds", () => {
    expect(toWireFormat(new Date(2024, 0, 9, 5, 4, 3, 999))).toBe(
      "2024-01-09 05:04:03"
    );
  });
});

describe("toStorageString", () => {
  it("normalizes digits, floats and dates", () => {
    expect(toStorageString("1704800000")).toBe("1704800000");
    expect(toStorageString("1704800000.250000")).toBe("1704800000.25");
    expect(toStorageString(new Date(1704800000000))).toBe("1704800000.0");
    expect(toStorageString(new Date(1704800000250))).toBe("1704800000.25");
  });

  it("throws TimeFormatError for formatted and invalid values", () => {
    expect(() => toStorageString("2024-01-09 12:30:00", "time_curr")).toThrow(
      TimeFormatError
    );
    expect(() => toStorageString("abc", "time_start")).toThrow(
      'Invalid time format for checkpointing. time_start="abc" type=string'
    );
  });

  it("round-trips instants through toInstant", () => {
    const instants = [
      new Date(1704800000000),
      new Date(1704800000250),
      new Date(1704800000123),
      new Date(NOW.getTime() - 1000 * DAY_MS),
    ];
    for (const instant of instants) {
      expect(toInstant(toStorageString(instant))?.getTime()).toBe(
        instant.getTime()
      );
    }
  });
});

describe("toEventTimeString", () => {
  it("renders seconds with six fractional digits", () => {
    expect(toEventTimeString(new Date(1704800000000))).toBe(
      "1704800000.000000"
    );
    expect(toEventTimeString(new Date(1704800000250))).toBe(
      "1704800000.250000"
    );
  });
});
