// Shared data model. All timestamps are epoch milliseconds.

import type { Timeframe } from "./config";

// ═══════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════

export interface TickerSnapshot {
  symbol: string;
  lastPrice: number;
  highPrice24h: number;
  lowPrice24h: number;
  turnover24h: number;
  fundingRate: number;       // signed fraction; < 0 means shorts pay
  nextFundingTime: number;
}

export interface Candle {
  openTs: number;
  closeTs: number;
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface Candidate extends TickerSnapshot {
  pumpFromLow24Pct: number;
  nearHighRatio: number;
}

export interface MarketDataSource {
  /** Full-market snapshot. Throws DataSourceError when the exchange reports failure. */
  listAllTickers(category: string): Promise<TickerSnapshot[]>;
  /** Most recent fully closed candle, or null when none is available. */
  lastClosedCandle(category: string, symbol: string, timeframe: Timeframe): Promise<Candle | null>;
}

// ═══════════════════════════════════════════════════════════════════════
// WATCHLIST
// ═══════════════════════════════════════════════════════════════════════

export interface WatchEntry {
  localHigh: number;
  stallCount: number;
  blocked: boolean;          // stalled but already at/below TP; waits for a new high
  createdTs: number;
  updatedTs: number;
  lastCandleTs: number;      // openTs of the last candle folded into this entry
}

export type WatchPhase = "RISING" | "STALLING" | "BLOCKED";

// ═══════════════════════════════════════════════════════════════════════
// TRADES
// ═══════════════════════════════════════════════════════════════════════

export type CloseReason = "TP" | "SL" | "FUNDING_GUARD";

interface TradeFields {
  id: string;
  symbol: string;
  side: "SHORT";
  openTs: number;
  notional: number;
  qty: number;
  entry: number;
  tp: number;
  sl: number;
  localHigh: number;
  fundingRateAtOpen: number;
  nextFundingTimeAtOpen: number;
}

export interface OpenTrade extends TradeFields {
  status: "OPEN";
}

export interface ClosedTrade extends Readonly<TradeFields> {
  readonly status: "CLOSED";
  readonly closeTs: number;
  readonly closeReason: CloseReason;
  readonly closePrice: number;
}

export type Trade = OpenTrade | ClosedTrade;

export type TradeUpdate =
  | { shouldClose: false }
  | { shouldClose: true; reason: CloseReason; exitPrice: number };

// ═══════════════════════════════════════════════════════════════════════
// ENGINE STATE
// ═══════════════════════════════════════════════════════════════════════

export type DecisionEvent =
  | {
      type: "SKIP_BELOW_TP";
      ts: number;
      symbol: string;
      entry: number;
      tp: number;
      localHigh: number;
    }
  | {
      type: "TRIGGER";
      ts: number;
      symbol: string;
      entry: number;
      tp: number;
      sl: number;
      localHigh: number;
      fundingRate: number;
    };

export interface EngineState {
  lastBarCloseMs: number | null;
  cooldowns: Map<string, number>;     // symbol -> last trade open
  watch: Map<string, WatchEntry>;
  lastEvents: DecisionEvent[];
}
