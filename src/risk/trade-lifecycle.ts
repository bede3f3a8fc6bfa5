// Paper short lifecycle: open → evaluate each bar → close once
//
// EXIT PRIORITY (evaluated in this exact order):
//   1. FUNDING GUARD — next funding costs more than what is left to TP → close at mark
//   2. STOP LOSS     — candle high >= SL → close at SL
//   3. TAKE PROFIT   — candle low <= TP → close at TP
//
// When one candle touches both TP and SL we cannot know which came first,
// so the loss wins (worst case). Do not try to infer order from the candle shape.

import type { FundingGuardSettings, TradeSettings } from "../config";
import type { Candle, ClosedTrade, OpenTrade, TickerSnapshot, Trade, TradeUpdate } from "../types";
import { shouldExitForFunding } from "./funding-guard";

const HOLD: TradeUpdate = { shouldClose: false };

export function openTrade(
  symbol: string,
  entry: number,
  localHigh: number,
  ticker: TickerSnapshot | undefined,
  nowMs: number,
  settings: TradeSettings
): OpenTrade {
  if (!(entry > 0)) {
    throw new RangeError(`Cannot open ${symbol}: entry must be > 0 (got ${entry})`);
  }

  const notional = settings.notionalUsdt;
  return {
    id: `${symbol}:${nowMs}`,
    symbol,
    status: "OPEN",
    side: "SHORT",
    openTs: nowMs,
    notional,
    qty: notional / entry,
    entry,
    tp: localHigh * (1 - settings.tpFromHighPct), // TP from the high, not from entry
    sl: entry * settings.slMult,
    localHigh,
    fundingRateAtOpen: ticker?.fundingRate ?? 0,
    nextFundingTimeAtOpen: ticker?.nextFundingTime ?? 0,
  };
}

/**
 * Decide whether an open trade closes on this candle.
 * Closed trades are never touched. A candle that finished before the open can still
 * trip the funding guard (live mark and rate), but never TP or SL.
 */
export function evaluateTrade(
  trade: Trade,
  candle: Candle,
  ticker: TickerSnapshot | undefined,
  guard: FundingGuardSettings
): TradeUpdate {
  if (trade.status !== "OPEN") return HOLD;

  const mark = ticker && ticker.lastPrice > 0 ? ticker.lastPrice : candle.close;
  const fundingRate = ticker?.fundingRate ?? 0;

  if (shouldExitForFunding(trade, fundingRate, mark, guard)) {
    return { shouldClose: true, reason: "FUNDING_GUARD", exitPrice: mark };
  }

  // The range of a bar that finished before the open says nothing about this trade
  if (candle.closeTs <= trade.openTs) return HOLD;

  const hitTp = candle.low <= trade.tp;
  const hitSl = candle.high >= trade.sl;

  if (hitSl) {
    // also covers hitTp && hitSl: worst case
    return { shouldClose: true, reason: "SL", exitPrice: trade.sl };
  }
  if (hitTp) {
    return { shouldClose: true, reason: "TP", exitPrice: trade.tp };
  }
  return HOLD;
}

/** Apply an update. Already-closed trades come back untouched. */
export function closeTrade(trade: Trade, update: TradeUpdate, nowMs: number): Trade {
  if (trade.status !== "OPEN" || !update.shouldClose) return trade;

  const closed: ClosedTrade = {
    ...trade,
    status: "CLOSED",
    closeTs: nowMs,
    closeReason: update.reason,
    closePrice: update.exitPrice,
  };
  return Object.freeze(closed);
}

/** Short convention: profit when price falls. Null while the trade is open. */
export function tradePnl(trade: Trade): number | null {
  if (trade.status !== "CLOSED") return null;
  return (trade.entry - trade.closePrice) * trade.qty;
}

export function isOpen(trade: Trade): trade is OpenTrade {
  return trade.status === "OPEN";
}
