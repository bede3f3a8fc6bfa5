// Watchlist state machine
//
// Each watched symbol tracks its local high from closed candles:
//
//   RISING   ── candle high <= localHigh (stallCount reaches threshold) ──▶ STALLING
//   STALLING ── live price > TP-from-high ──▶ TRIGGER (entry removed)
//   STALLING ── live price <= TP-from-high ──▶ BLOCKED (SKIP_BELOW_TP, keep watching)
//   any      ── candle high > localHigh ──▶ RISING (stallCount = 0, unblocked)
//
// Entries older than the TTL are dropped before any of the above runs.
// Every processed cycle counts, the admission cycle included; in continuous
// mode a bar already folded in is not counted again.
// Phase is never stored; it is derived from (stallCount, blocked).

import type { WatchSettings } from "../config";
import type { Candle, WatchEntry, WatchPhase } from "../types";

export type WatchDecision =
  | { action: "HOLD"; phase: WatchPhase; entry: WatchEntry }
  | { action: "SKIP_BELOW_TP"; entryPrice: number; tp: number; localHigh: number; entry: WatchEntry }
  | { action: "TRIGGER"; entryPrice: number; localHigh: number };

export function watchPhase(entry: WatchEntry, stallCandles: number): WatchPhase {
  if (entry.blocked) return "BLOCKED";
  return entry.stallCount >= stallCandles ? "STALLING" : "RISING";
}

export function tpFromHigh(localHigh: number, tpFromHighPct: number): number {
  return localHigh * (1 - tpFromHighPct);
}

export class Watchlist {
  constructor(
    private readonly settings: WatchSettings,
    private readonly entries: Map<string, WatchEntry>
  ) {}

  get size(): number {
    return this.entries.size;
  }

  has(symbol: string): boolean {
    return this.entries.has(symbol);
  }

  get(symbol: string): WatchEntry | undefined {
    return this.entries.get(symbol);
  }

  symbols(): string[] {
    return [...this.entries.keys()];
  }

  phaseOf(symbol: string): WatchPhase | null {
    const entry = this.entries.get(symbol);
    return entry ? watchPhase(entry, this.settings.stallCandles) : null;
  }

  remove(symbol: string): boolean {
    return this.entries.delete(symbol);
  }

  /** Drop entries whose age since creation reached the TTL. Returns removed symbols. */
  expire(nowMs: number): string[] {
    const ttlMs = this.settings.ttlSeconds * 1000;
    const removed: string[] = [];
    for (const [symbol, entry] of this.entries) {
      if (nowMs - entry.createdTs >= ttlMs) removed.push(symbol);
    }
    for (const symbol of removed) this.entries.delete(symbol);
    return removed;
  }

  /**
   * Start watching with the last closed candle's high as the local high.
   * Eligibility (cooldown, open trade) is the caller's call.
   */
  admit(symbol: string, candle: Candle, nowMs: number): WatchEntry {
    const existing = this.entries.get(symbol);
    if (existing) return existing;

    const entry: WatchEntry = {
      localHigh: candle.high,
      stallCount: 0,
      blocked: false,
      createdTs: nowMs,
      updatedTs: nowMs,
      lastCandleTs: candle.openTs,
    };
    this.entries.set(symbol, entry);
    return entry;
  }

  /**
   * Fold one closed candle into the entry and decide.
   * `livePrice` is the ticker's last price; the candle close stands in when it is missing.
   * Returns null when the symbol is not watched.
   */
  advance(symbol: string, candle: Candle, livePrice: number | undefined, nowMs: number): WatchDecision | null {
    const current = this.entries.get(symbol);
    if (!current) return null;

    // Continuous mode: the same bar seen again on a later wake counts nothing
    if (this.settings.skipRepeatedCandles && candle.openTs <= current.lastCandleTs) {
      return { action: "HOLD", phase: watchPhase(current, this.settings.stallCandles), entry: current };
    }

    const entry: WatchEntry =
      candle.high > current.localHigh
        ? { ...current, localHigh: candle.high, stallCount: 0, blocked: false }
        : { ...current, stallCount: current.stallCount + 1 };
    entry.updatedTs = nowMs;
    entry.lastCandleTs = candle.openTs;
    this.entries.set(symbol, entry);

    if (entry.blocked || entry.stallCount < this.settings.stallCandles) {
      return { action: "HOLD", phase: watchPhase(entry, this.settings.stallCandles), entry };
    }

    const entryPrice = livePrice !== undefined && livePrice > 0 ? livePrice : candle.close;
    const tp = tpFromHigh(entry.localHigh, this.settings.tpFromHighPct);

    // Already at/through the target: no edge left. Wait for a fresh high.
    if (entryPrice <= tp) {
      entry.blocked = true;
      return { action: "SKIP_BELOW_TP", entryPrice, tp, localHigh: entry.localHigh, entry };
    }

    this.entries.delete(symbol);
    return { action: "TRIGGER", entryPrice, localHigh: entry.localHigh };
  }
}
