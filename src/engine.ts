// Scan engine — one full pass per bar
//
// CYCLE ORDER:
//   1. Tickers → ticker map + pump candidates
//   2. Evaluate every OPEN trade on its last closed candle → save trades (checkpoint)
//   3. Drop watch entries past TTL
//   4. Admit new candidates (not watched, not cooling down, no open trade)
//   5. Advance each watch entry; SKIP_BELOW_TP blocks, TRIGGER opens a paper short
//   6. Save state + trades (checkpoint)
//
// Nothing here sleeps or loops; server.ts decides when to call runCycle().

import type { BotConfig } from "./config";
import { errorMessage } from "./errors";
import type { Ledger } from "./ledger";
import { error, log } from "./logger";
import { TradeStats, formatStats, summarizeTrades } from "./reporting/stats";
import { closeTrade, evaluateTrade, isOpen, openTrade, tradePnl } from "./risk/trade-lifecycle";
import { defaultState, inCooldown, recordEvent, setCooldown } from "./state";
import { selectCandidates } from "./strategy/pump-filter";
import { Watchlist } from "./strategy/watchlist";
import type { Candle, DecisionEvent, EngineState, MarketDataSource, OpenTrade, TickerSnapshot, Trade } from "./types";
import { currentBarCloseMs, utcNowStr } from "./util/time";

export interface CycleSummary {
  barCloseMs: number;
  candidates: number;
  watchSize: number;
  open: number;
  closed: number;
  closedThisCycle: number;
  added: number;
  removedByTtl: number;
  skippedBelowTp: number;
  triggered: number;
  stats: TradeStats;
}

export interface EngineSnapshot {
  cycles: number;
  lastSummary: CycleSummary | null;
  watchSize: number;
  openTrades: number;
  stats: TradeStats;
  recentEvents: DecisionEvent[];
}

export class ScanEngine {
  private state: EngineState = defaultState();
  private trades: Trade[] = [];
  private watchlist: Watchlist;
  private cycles = 0;
  private lastSummary: CycleSummary | null = null;

  constructor(
    private readonly config: BotConfig,
    private readonly market: MarketDataSource,
    private readonly ledger: Ledger
  ) {
    this.watchlist = new Watchlist(config.watch, this.state.watch);
  }

  async load(): Promise<void> {
    this.state = await this.ledger.loadState();
    this.trades = await this.ledger.loadTrades();
    this.watchlist = new Watchlist(this.config.watch, this.state.watch);
  }

  get openTradeCount(): number {
    return this.trades.filter(isOpen).length;
  }

  get watchSize(): number {
    return this.watchlist.size;
  }

  getTrades(): readonly Trade[] {
    return this.trades;
  }

  getState(): Readonly<EngineState> {
    return this.state;
  }

  /** Bar-close stamp for this moment; in continuous mode every wake is its own "bar". */
  barCloseFor(nowMs: number): number {
    return this.config.scan.onlyOnBarClose ? currentBarCloseMs(this.config.scan.timeframe, nowMs) : nowMs;
  }

  isNewBar(nowMs: number): boolean {
    if (!this.config.scan.onlyOnBarClose) return true;
    return this.state.lastBarCloseMs !== this.barCloseFor(nowMs);
  }

  snapshot(recent: number = 20): EngineSnapshot {
    return {
      cycles: this.cycles,
      lastSummary: this.lastSummary,
      watchSize: this.watchlist.size,
      openTrades: this.openTradeCount,
      stats: summarizeTrades(this.trades),
      recentEvents: this.state.lastEvents.slice(-recent),
    };
  }

  async runCycle(nowMs: number): Promise<CycleSummary> {
    const { category } = this.config.exchange;
    const { timeframe } = this.config.scan;
    const barCloseMs = this.barCloseFor(nowMs);

    const tickers = await this.market.listAllTickers(category);
    const tickMap = new Map<string, TickerSnapshot>();
    for (const t of tickers) tickMap.set(t.symbol, t);
    const candidates = selectCandidates(tickers, this.config.filter);

    // One kline call per symbol per cycle, even when a symbol is admitted and advanced.
    // A missing candle stays missing for the rest of the cycle.
    const candleCache = new Map<string, Candle | null>();
    const candleFor = async (symbol: string): Promise<Candle | null> => {
      const cached = candleCache.get(symbol);
      if (cached !== undefined) return cached;
      const candle = await this.market.lastClosedCandle(category, symbol, timeframe);
      candleCache.set(symbol, candle);
      return candle;
    };

    // 1) Open trades
    let closedThisCycle = 0;
    for (let i = 0; i < this.trades.length; i++) {
      const trade = this.trades[i];
      if (!isOpen(trade)) continue;

      const candle = await candleFor(trade.symbol);
      if (!candle) continue;

      const update = evaluateTrade(trade, candle, tickMap.get(trade.symbol), this.config.fundingGuard);
      if (!update.shouldClose) continue;

      const closed = closeTrade(trade, update, nowMs);
      this.trades[i] = closed;
      closedThisCycle++;
      const pnl = tradePnl(closed) ?? 0;
      log(
        `🏁 CLOSED ${trade.symbol} ${update.reason} @ ${update.exitPrice.toFixed(6)}` +
          ` | entry ${trade.entry.toFixed(6)} | PnL ${pnl >= 0 ? "+" : ""}${pnl.toFixed(4)} USDT`
      );
    }
    await this.ledger.saveTrades(this.trades);

    // 2) TTL
    const expired = this.watchlist.expire(nowMs);
    if (expired.length) log(`[WATCH] removed_by_ttl=${expired.length}`);

    // 3) Admission
    let added = 0;
    for (const c of candidates) {
      if (this.watchlist.has(c.symbol)) continue;
      if (inCooldown(this.state, c.symbol, nowMs, this.config.trade.cooldownMinutes)) continue;
      if (this.hasOpenTrade(c.symbol)) continue;

      const candle = await candleFor(c.symbol);
      if (!candle) continue;

      this.watchlist.admit(c.symbol, candle, nowMs);
      added++;
      log(
        `👀 WATCH ${c.symbol} pump=${c.pumpFromLow24Pct.toFixed(1)}% nearHigh=${c.nearHighRatio.toFixed(3)}` +
          ` localHigh=${candle.high}`
      );
    }

    // 4) Stall logic / triggers
    let triggered = 0;
    let skippedBelowTp = 0;
    for (const symbol of this.watchlist.symbols()) {
      const candle = await candleFor(symbol);
      if (!candle) continue;

      const ticker = tickMap.get(symbol);
      const decision = this.watchlist.advance(symbol, candle, ticker?.lastPrice, nowMs);
      if (!decision || decision.action === "HOLD") continue;

      if (decision.action === "SKIP_BELOW_TP") {
        skippedBelowTp++;
        this.record({
          type: "SKIP_BELOW_TP",
          ts: nowMs,
          symbol,
          entry: decision.entryPrice,
          tp: decision.tp,
          localHigh: decision.localHigh,
        });
        log(
          `⏭️ SKIP ${symbol} entry=${decision.entryPrice.toFixed(6)} <= TP(fromHigh)=${decision.tp.toFixed(6)}` +
            " — blocked until new high"
        );
        continue;
      }

      // TRIGGER: the watch entry is already gone, whatever happens below
      let trade: OpenTrade;
      try {
        trade = openTrade(symbol, decision.entryPrice, decision.localHigh, ticker, nowMs, this.config.trade);
      } catch (err) {
        error(`❌ Open ${symbol} failed: ${errorMessage(err)}`);
        continue;
      }
      this.trades.push(trade);
      setCooldown(this.state, symbol, nowMs);
      triggered++;
      this.record({
        type: "TRIGGER",
        ts: nowMs,
        symbol,
        entry: trade.entry,
        tp: trade.tp,
        sl: trade.sl,
        localHigh: trade.localHigh,
        fundingRate: trade.fundingRateAtOpen,
      });
      log(
        `📉 TRIGGER SHORT ${symbol} entry(MKT)=${trade.entry.toFixed(6)} TP(fromHigh)=${trade.tp.toFixed(6)}` +
          ` SL=${trade.sl.toFixed(6)} localHigh=${trade.localHigh.toFixed(6)} funding=${trade.fundingRateAtOpen.toFixed(6)}`
      );
    }

    // 5) Checkpoint
    const previousBar = this.state.lastBarCloseMs;
    this.state.lastBarCloseMs = barCloseMs;
    try {
      await this.ledger.saveState(this.state);
      await this.ledger.saveTrades(this.trades);
    } catch (err) {
      this.state.lastBarCloseMs = previousBar;
      throw err;
    }

    const stats = summarizeTrades(this.trades);
    const open = this.openTradeCount;
    const summary: CycleSummary = {
      barCloseMs,
      candidates: candidates.length,
      watchSize: this.watchlist.size,
      open,
      closed: this.trades.length - open,
      closedThisCycle,
      added,
      removedByTtl: expired.length,
      skippedBelowTp,
      triggered,
      stats,
    };
    this.cycles++;
    this.lastSummary = summary;

    log(
      `[SCAN] ${utcNowStr(nowMs)} cand=${summary.candidates} watch=${summary.watchSize}` +
        ` open=${summary.open} closed=${summary.closed}`
    );
    log(formatStats(stats));
    if (added) log(`[WATCH] added=${added}`);
    if (skippedBelowTp) log(`[WATCH] skipped_below_tp=${skippedBelowTp}`);
    if (triggered === 0) log("[INFO] no triggers this bar");

    return summary;
  }

  private hasOpenTrade(symbol: string): boolean {
    return this.trades.some((t) => t.symbol === symbol && t.status === "OPEN");
  }

  private record(event: DecisionEvent): void {
    recordEvent(this.state, event, this.config.storage.maxEvents);
  }
}
