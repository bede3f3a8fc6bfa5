/**
 * Tests for the funding guard
 */

import { describe, it, expect } from "vitest";
import { expectedFundingPnl, remainingProfitToTp, shouldExitForFunding } from "../../src/risk/funding-guard";

const trade = { tp: 1, qty: 1, notional: 20 };
const guard = { enabled: true, ratio: 1 };

describe("remainingProfitToTp", () => {
  it("is the distance to TP times quantity", () => {
    expect(remainingProfitToTp({ tp: 1, qty: 4 }, 1.5)).toBe(2);
  });

  it("is zero at or below TP", () => {
    expect(remainingProfitToTp(trade, 1)).toBe(0);
    expect(remainingProfitToTp(trade, 0.5)).toBe(0);
  });
});

describe("expectedFundingPnl", () => {
  it("is negative when shorts pay", () => {
    expect(expectedFundingPnl(20, -0.01)).toBeCloseTo(-0.2, 12);
    expect(expectedFundingPnl(20, 0.01)).toBeCloseTo(0.2, 12);
  });
});

describe("shouldExitForFunding", () => {
  it("exits when the funding cost covers what is left to TP", () => {
    // remaining 0.125 <= cost 0.2
    expect(shouldExitForFunding(trade, -0.01, 1.125, guard)).toBe(true);
  });

  it("holds when enough profit is left", () => {
    // remaining 0.5 > cost 0.2
    expect(shouldExitForFunding(trade, -0.01, 1.5, guard)).toBe(false);
  });

  it("scales the remaining profit by the ratio", () => {
    // 0.125 * 2 = 0.25 > 0.2
    expect(shouldExitForFunding(trade, -0.01, 1.125, { enabled: true, ratio: 2 })).toBe(false);
  });

  it("never fires when shorts receive funding or it is flat", () => {
    expect(shouldExitForFunding(trade, 0.01, 1.125, guard)).toBe(false);
    expect(shouldExitForFunding(trade, 0, 1.125, guard)).toBe(false);
  });

  it("leaves trades at or through TP to the TP check", () => {
    expect(shouldExitForFunding(trade, -0.5, 1, guard)).toBe(false);
  });

  it("does nothing when disabled", () => {
    expect(shouldExitForFunding(trade, -0.01, 1.125, { enabled: false, ratio: 1 })).toBe(false);
  });
});
