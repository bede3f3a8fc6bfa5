/**
 * Tests for JSON persistence of engine state and trades
 */

import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../../src/errors";
import { Ledger } from "../../src/ledger";
import { closeTrade } from "../../src/risk/trade-lifecycle";
import { defaultState } from "../../src/state";
import { makeOpenTrade } from "../helpers";

describe("Ledger", () => {
  let dir: string;
  let stateFile: string;
  let tradesFile: string;
  let ledger: Ledger;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "pumpfade-ledger-"));
    stateFile = path.join(dir, "data", "state.json");
    tradesFile = path.join(dir, "data", "trades.json");
    ledger = new Ledger(stateFile, tradesFile);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function exists(file: string): Promise<boolean> {
    return fs.access(file).then(
      () => true,
      () => false
    );
  }

  it("starts empty when nothing was saved yet", async () => {
    expect(await ledger.loadState()).toEqual(defaultState());
    expect(await ledger.loadTrades()).toEqual([]);
  });

  it("round-trips state and trades, creating the directory", async () => {
    const state = defaultState();
    state.lastBarCloseMs = 9_000_000;
    state.cooldowns.set("PUMPUSDT", 1234);
    state.watch.set("MOONUSDT", {
      localHigh: 2.5,
      stallCount: 1,
      blocked: true,
      createdTs: 100,
      updatedTs: 200,
      lastCandleTs: 50,
    });
    state.lastEvents.push({ type: "SKIP_BELOW_TP", ts: 200, symbol: "MOONUSDT", entry: 1, tp: 1.25, localHigh: 2.5 });

    const open = makeOpenTrade({ symbol: "PUMPUSDT", id: "PUMPUSDT:1234", openTs: 1234 });
    const closed = closeTrade(makeOpenTrade(), { shouldClose: true, reason: "SL", exitPrice: 11 }, 5000);

    await ledger.saveState(state);
    await ledger.saveTrades([open, closed]);

    expect(await ledger.loadState()).toEqual(state);
    expect(await ledger.loadTrades()).toEqual([open, closed]);
    expect(await exists(stateFile + ".tmp")).toBe(false);
  });

  it("writes cooldowns and watch entries as plain JSON objects", async () => {
    const state = defaultState();
    state.cooldowns.set("PUMPUSDT", 1234);
    await ledger.saveState(state);

    const raw: unknown = JSON.parse(await fs.readFile(stateFile, "utf-8"));
    expect(raw).toEqual({ lastBarCloseMs: null, cooldowns: { PUMPUSDT: 1234 }, watch: {}, lastEvents: [] });
  });

  it("fills in fields missing from older watch entries", async () => {
    await fs.mkdir(path.dirname(stateFile), { recursive: true });
    await fs.writeFile(stateFile, JSON.stringify({ watch: { OLDUSDT: { localHigh: 3, stallCount: 1, updatedTs: 77 } } }));

    const state = await ledger.loadState();
    expect(state.watch.get("OLDUSDT")).toEqual({
      localHigh: 3,
      stallCount: 1,
      blocked: false,
      createdTs: 77,
      updatedTs: 77,
      lastCandleTs: 0,
    });
    expect(state.lastBarCloseMs).toBeNull();
  });

  it("treats an empty file as no state", async () => {
    await fs.mkdir(path.dirname(stateFile), { recursive: true });
    await fs.writeFile(stateFile, "  \n");
    expect(await ledger.loadState()).toEqual(defaultState());
    expect(await exists(stateFile + ".corrupt")).toBe(false);
  });

  it("keeps a copy of an unparsable state file and starts over", async () => {
    await fs.mkdir(path.dirname(stateFile), { recursive: true });
    await fs.writeFile(stateFile, "{not json");

    expect(await ledger.loadState()).toEqual(defaultState());
    expect(await fs.readFile(stateFile + ".corrupt", "utf-8")).toBe("{not json");
  });

  it("keeps a copy of a state file that fails validation", async () => {
    await fs.mkdir(path.dirname(stateFile), { recursive: true });
    await fs.writeFile(stateFile, JSON.stringify({ lastBarCloseMs: "yesterday" }));

    expect(await ledger.loadState()).toEqual(defaultState());
    expect(await exists(stateFile + ".corrupt")).toBe(true);
  });

  it("drops only the malformed trade rows", async () => {
    const good = makeOpenTrade();
    await fs.mkdir(path.dirname(tradesFile), { recursive: true });
    await fs.writeFile(tradesFile, JSON.stringify([good, { id: 1, status: "OPEN" }, { ...good, status: "PENDING" }]));

    expect(await ledger.loadTrades()).toEqual([good]);
  });

  it("starts with no trades when the file is not a list", async () => {
    await fs.mkdir(path.dirname(tradesFile), { recursive: true });
    await fs.writeFile(tradesFile, JSON.stringify({ trades: [] }));

    expect(await ledger.loadTrades()).toEqual([]);
    expect(await exists(tradesFile + ".corrupt")).toBe(true);
  });

  it("raises PersistenceError when the file cannot be written", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "");
    const broken = new Ledger(path.join(blocker, "state.json"), path.join(blocker, "trades.json"));

    await expect(broken.saveTrades([])).rejects.toBeInstanceOf(PersistenceError);
    await expect(broken.saveState(defaultState())).rejects.toThrow(/^Failed to write /);
  });
});
