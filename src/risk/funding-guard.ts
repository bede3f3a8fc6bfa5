// Funding guard: close a short early when the next funding payment would cost
// at least as much as the profit still left before TP.
//
//   remaining = max(0, (mark - tp) * qty)
//   expected  = notional * rate            (rate < 0 => short pays => negative)
//   exit      = |expected| >= remaining * ratio
//
// Only the profit side is considered; the stop distance never enters the check.

import type { FundingGuardSettings } from "../config";
import type { Trade } from "../types";

export function remainingProfitToTp(trade: Pick<Trade, "tp" | "qty">, mark: number): number {
  if (mark <= trade.tp) return 0;
  return (mark - trade.tp) * trade.qty;
}

export function expectedFundingPnl(notional: number, rate: number): number {
  return notional * rate;
}

export function shouldExitForFunding(
  trade: Pick<Trade, "tp" | "qty" | "notional">,
  fundingRate: number,
  mark: number,
  guard: FundingGuardSettings
): boolean {
  if (!guard.enabled) return false;
  if (fundingRate >= 0) return false; // shorts receive or neutral

  const remaining = remainingProfitToTp(trade, mark);
  if (remaining <= 0) return false; // at/through TP: the TP check closes it

  const expected = expectedFundingPnl(trade.notional, fundingRate);
  return Math.abs(expected) >= remaining * guard.ratio;
}
