// Pump candidate filter
//
// A symbol qualifies when ALL of these hold on its 24h ticker:
//   1. quote suffix matches (USDT perps only)
//   2. last / high24 / low24 all > 0
//   3. turnover24h >= minTurnoverUsdt
//   4. (last - low24) / low24 * 100 >= minPumpFromLow24Pct
//   5. last / high24 >= nearHighRatio

import type { FilterSettings } from "../config";
import type { Candidate, TickerSnapshot } from "../types";

export function classifyTicker(ticker: TickerSnapshot, filter: FilterSettings): Candidate | null {
  if (!ticker.symbol.endsWith(filter.quote)) return null;

  const last = ticker.lastPrice;
  const high24 = ticker.highPrice24h;
  const low24 = ticker.lowPrice24h;
  if (last <= 0 || high24 <= 0 || low24 <= 0) return null;

  const pumpFromLow24Pct = ((last - low24) / low24) * 100;
  const nearHighRatio = last / high24;

  if (ticker.turnover24h < filter.minTurnoverUsdt) return null;
  if (pumpFromLow24Pct < filter.minPumpFromLow24Pct) return null;
  if (nearHighRatio < filter.nearHighRatio) return null;

  return { ...ticker, pumpFromLow24Pct, nearHighRatio };
}

export function selectCandidates(tickers: TickerSnapshot[], filter: FilterSettings): Candidate[] {
  const out: Candidate[] = [];
  for (const t of tickers) {
    const c = classifyTicker(t, filter);
    if (c) out.push(c);
  }
  return out;
}
