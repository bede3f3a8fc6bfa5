/**
 * Tests for numeric parsing and bar-time helpers
 */

import { describe, it, expect } from "vitest";
import { safeParseFloat, safeParseInt } from "../../src/util/numbers";
import { currentBarCloseMs, utcNowStr } from "../../src/util/time";

describe("safeParseFloat", () => {
  it("parses numeric strings and finite numbers", () => {
    expect(safeParseFloat("1.5")).toBe(1.5);
    expect(safeParseFloat("-0.000125")).toBe(-0.000125);
    expect(safeParseFloat(42)).toBe(42);
  });

  it("falls back on anything unparseable", () => {
    expect(safeParseFloat("")).toBe(0);
    expect(safeParseFloat("abc", 7)).toBe(7);
    expect(safeParseFloat(undefined)).toBe(0);
    expect(safeParseFloat(null)).toBe(0);
    expect(safeParseFloat(Number.NaN)).toBe(0);
    expect(safeParseFloat(Infinity)).toBe(0);
    expect(safeParseFloat({})).toBe(0);
  });
});

describe("safeParseInt", () => {
  it("truncates toward zero", () => {
    expect(safeParseInt("1700000000000")).toBe(1_700_000_000_000);
    expect(safeParseInt("42.9")).toBe(42);
    expect(safeParseInt("-3.7")).toBe(-3);
    expect(safeParseInt("x")).toBe(0);
  });
});

describe("currentBarCloseMs", () => {
  it("floors to the timeframe boundary", () => {
    expect(currentBarCloseMs("15", 2_000_000)).toBe(1_800_000);
    expect(currentBarCloseMs("15", 1_800_000)).toBe(1_800_000);
    expect(currentBarCloseMs("1", 119_999)).toBe(60_000);
    expect(currentBarCloseMs("D", 129_600_000)).toBe(86_400_000);
  });
});

describe("utcNowStr", () => {
  it("formats as UTC without milliseconds", () => {
    expect(utcNowStr(0)).toBe("1970-01-01 00:00:00");
    expect(utcNowStr(1_700_000_000_123)).toBe("2023-11-14 22:13:20");
  });
});
