// Closed-trade summary for the [STATS] line and /status.

import { tradePnl } from "../risk/trade-lifecycle";
import type { Trade } from "../types";

export interface TradeStats {
  closed: number;
  wins: number;
  losses: number;
  winRate: number;        // percent of closed trades with pnl > 0
  totalPnl: number;
  avgPnl: number;
  profitFactor: number;   // Infinity when there are wins and no losses
}

export function summarizeTrades(trades: readonly Trade[]): TradeStats {
  const pnls: number[] = [];
  for (const t of trades) {
    const pnl = tradePnl(t);
    if (pnl !== null) pnls.push(pnl);
  }

  if (pnls.length === 0) {
    return { closed: 0, wins: 0, losses: 0, winRate: 0, totalPnl: 0, avgPnl: 0, profitFactor: 0 };
  }

  let winSum = 0;
  let lossSum = 0;
  let wins = 0;
  for (const p of pnls) {
    if (p > 0) {
      wins++;
      winSum += p;
    } else {
      lossSum += p;
    }
  }

  const totalPnl = winSum + lossSum;
  const grossLoss = Math.abs(lossSum);
  let profitFactor = 0;
  if (grossLoss > 0) profitFactor = winSum / grossLoss;
  else if (winSum > 0) profitFactor = Infinity;

  return {
    closed: pnls.length,
    wins,
    losses: pnls.length - wins,
    winRate: (wins / pnls.length) * 100,
    totalPnl,
    avgPnl: totalPnl / pnls.length,
    profitFactor,
  };
}

export function formatStats(stats: TradeStats): string {
  if (stats.closed === 0) return "[STATS] closed=0";
  const pf = Number.isFinite(stats.profitFactor) ? stats.profitFactor.toFixed(2) : "inf";
  return (
    `[STATS] closed=${stats.closed} winrate=${stats.winRate.toFixed(1)}%` +
    ` totalPnL=${stats.totalPnl.toFixed(2)} avgPnL=${stats.avgPnl.toFixed(2)} PF=${pf}`
  );
}
