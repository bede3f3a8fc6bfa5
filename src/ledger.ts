// Ledger — JSON persistence for engine state and paper trades
//
// Writes are atomic: serialize to <file>.tmp, then rename over <file>.
// A crash mid-write leaves the previous file intact.
// Missing/empty/garbled files load as defaults; a garbled file is copied to
// <file>.corrupt first so the next save does not erase the evidence.

import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { PersistenceError, errorMessage } from "./errors";
import { log, warn } from "./logger";
import { MAX_EVENTS, defaultState } from "./state";
import type { DecisionEvent, EngineState, Trade, WatchEntry } from "./types";

const finite = z.number().finite();

const watchEntrySchema = z
  .object({
    localHigh: finite,
    stallCount: z.number().int().nonnegative(),
    blocked: z.boolean().default(false),
    createdTs: finite.optional(),
    updatedTs: finite,
    lastCandleTs: finite.default(0),
  })
  .transform(
    (w): WatchEntry => ({
      localHigh: w.localHigh,
      stallCount: w.stallCount,
      blocked: w.blocked,
      createdTs: w.createdTs ?? w.updatedTs,
      updatedTs: w.updatedTs,
      lastCandleTs: w.lastCandleTs,
    })
  );

const eventSchema: z.ZodType<DecisionEvent> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("SKIP_BELOW_TP"),
    ts: finite,
    symbol: z.string(),
    entry: finite,
    tp: finite,
    localHigh: finite,
  }),
  z.object({
    type: z.literal("TRIGGER"),
    ts: finite,
    symbol: z.string(),
    entry: finite,
    tp: finite,
    sl: finite,
    localHigh: finite,
    fundingRate: finite,
  }),
]);

const stateSchema = z.object({
  lastBarCloseMs: finite.nullable().default(null),
  cooldowns: z.record(finite).default({}),
  watch: z.record(watchEntrySchema).default({}),
  lastEvents: z.array(eventSchema).default([]),
});

const tradeFields = {
  id: z.string(),
  symbol: z.string(),
  side: z.literal("SHORT"),
  openTs: finite,
  notional: finite,
  qty: finite,
  entry: finite,
  tp: finite,
  sl: finite,
  localHigh: finite,
  fundingRateAtOpen: finite,
  nextFundingTimeAtOpen: finite,
};

const tradeSchema: z.ZodType<Trade> = z.discriminatedUnion("status", [
  z.object({ ...tradeFields, status: z.literal("OPEN") }),
  z.object({
    ...tradeFields,
    status: z.literal("CLOSED"),
    closeTs: finite,
    closeReason: z.enum(["TP", "SL", "FUNDING_GUARD"]),
    closePrice: finite,
  }),
]);

type PersistedState = z.input<typeof stateSchema>;

export class Ledger {
  constructor(
    private readonly stateFile: string,
    private readonly tradesFile: string
  ) {}

  async loadState(): Promise<EngineState> {
    const raw = await this.readJson(this.stateFile);
    if (raw === undefined) return defaultState();

    const parsed = stateSchema.safeParse(raw);
    if (!parsed.success) {
      warn(`⚠️ ${this.stateFile} failed validation — starting with empty state`, {
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      await this.quarantine(this.stateFile);
      return defaultState();
    }

    const s = parsed.data;
    return {
      lastBarCloseMs: s.lastBarCloseMs,
      cooldowns: new Map(Object.entries(s.cooldowns)),
      watch: new Map(Object.entries(s.watch)),
      lastEvents: s.lastEvents.slice(-MAX_EVENTS),
    };
  }

  async saveState(state: EngineState): Promise<void> {
    const out: PersistedState = {
      lastBarCloseMs: state.lastBarCloseMs,
      cooldowns: Object.fromEntries(state.cooldowns),
      watch: Object.fromEntries(state.watch),
      lastEvents: state.lastEvents,
    };
    await this.writeAtomic(this.stateFile, out);
  }

  /** Invalid rows are dropped individually so one bad record cannot wipe the history. */
  async loadTrades(): Promise<Trade[]> {
    const raw = await this.readJson(this.tradesFile);
    if (raw === undefined) return [];
    if (!Array.isArray(raw)) {
      warn(`⚠️ ${this.tradesFile} is not a list — starting with no trades`);
      await this.quarantine(this.tradesFile);
      return [];
    }

    const trades: Trade[] = [];
    let dropped = 0;
    for (const row of raw) {
      const parsed = tradeSchema.safeParse(row);
      if (parsed.success) trades.push(parsed.data);
      else dropped++;
    }
    if (dropped > 0) {
      warn(`⚠️ Dropped ${dropped} malformed trade record(s) from ${this.tradesFile}`);
    }
    return trades;
  }

  async saveTrades(trades: readonly Trade[]): Promise<void> {
    await this.writeAtomic(this.tradesFile, trades);
  }

  // ===== Helpers =====

  private async readJson(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isMissing(err)) return undefined;
      warn(`⚠️ Could not read ${file}: ${errorMessage(err)} — using defaults`);
      return undefined;
    }

    if (!text.trim()) return undefined;
    try {
      return JSON.parse(text);
    } catch (err) {
      warn(`⚠️ ${file} is not valid JSON (${errorMessage(err)}) — using defaults`);
      await this.quarantine(file);
      return undefined;
    }
  }

  private async quarantine(file: string): Promise<void> {
    const target = file + ".corrupt";
    try {
      await fs.copyFile(file, target);
      log(`📦 Kept unreadable ${path.basename(file)} as ${path.basename(target)}`);
    } catch (err) {
      warn(`⚠️ Could not copy ${file} aside: ${errorMessage(err)}`);
    }
  }

  private async writeAtomic(file: string, data: unknown): Promise<void> {
    const tmp = file + ".tmp";
    try {
      await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(data, null, 2), "utf-8");
      await fs.rename(tmp, file);
    } catch (err) {
      throw new PersistenceError(`Failed to write ${file}: ${errorMessage(err)}`, file);
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
