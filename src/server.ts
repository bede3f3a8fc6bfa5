// Pump-Fade Short Scanner — continuous scan loop
//
// Startup:
//   - .env → config (missing/invalid settings are fatal)
//   - signed API key check (a rejected key is fatal; an unreachable exchange is not)
//   - state + trades loaded from disk, health server started
//
// Loop:
//   - bar-gated: run once per closed bar, otherwise sleep WAKE_SECONDS
//   - any cycle error is logged and followed by ERROR_BACKOFF_SECONDS, never exits
//   - SIGINT/SIGTERM: finish the in-flight cycle, then shut down cleanly

import "dotenv/config";
import type { Server } from "http";
import { setTimeout as sleep } from "timers/promises";
import { BotConfig, loadConfig } from "./config";
import { ScanEngine } from "./engine";
import { errorMessage, isFatal } from "./errors";
import { BybitClient } from "./exchange/bybit";
import { createHealthServer } from "./health";
import { Ledger } from "./ledger";
import { error, log, warn } from "./logger";

let isRunning = true;
const stopSignal = new AbortController();

function requestStop(signal: NodeJS.Signals): void {
  if (!isRunning) {
    warn(`[EXIT] ${signal} again — exiting now`);
    process.exit(130);
  }
  log(`[EXIT] ${signal} received — finishing current cycle`);
  isRunning = false;
  stopSignal.abort();
}

/** Sleep that returns early once a stop was requested. */
async function pause(ms: number): Promise<void> {
  if (!isRunning) return;
  try {
    await sleep(ms, undefined, { signal: stopSignal.signal });
  } catch (err) {
    if (!(err instanceof Error && err.name === "AbortError")) throw err;
  }
}

function banner(config: BotConfig): void {
  const { filter, watch, trade, fundingGuard, scan, exchange } = config;
  log("═══════════════════════════════════════════════════");
  log("  PUMP-FADE SHORT SCANNER — PAPER MODE");
  log(`  Exchange: Bybit ${exchange.category} | TF: ${scan.timeframe} | ` +
      (scan.onlyOnBarClose ? "bar-close gated" : "continuous") + ` | wake ${scan.wakeSeconds}s`);
  log(`  Pump: +${filter.minPumpFromLow24Pct}% from low24, >= ${filter.nearHighRatio} of high24, ` +
      `turnover >= ${filter.minTurnoverUsdt} ${filter.quote}`);
  log(`  Stall: ${watch.stallCandles} candles | Watch TTL: ${watch.ttlSeconds}s`);
  log(`  Trade: ${trade.notionalUsdt} USDT notional | TP: high × ${(1 - trade.tpFromHighPct).toFixed(2)} | ` +
      `SL: entry × ${trade.slMult} | cooldown ${trade.cooldownMinutes}m`);
  log(`  Funding guard: ${fundingGuard.enabled ? "ON (ratio " + fundingGuard.ratio + ")" : "OFF"}`);
  log("═══════════════════════════════════════════════════");
}

async function main(): Promise<void> {
  const config = loadConfig();
  banner(config);

  const client = new BybitClient(
    {
      apiKey: config.exchange.apiKey,
      apiSecret: config.exchange.apiSecret,
      recvWindow: config.exchange.recvWindow,
    },
    config.exchange.baseUrl,
    config.exchange.requestTimeoutMs
  );

  try {
    const info = await client.verifyCredentials();
    log(`🔑 API key OK${info.note ? " (" + info.note + ")" : ""}`);
    if (!info.readOnly) {
      warn("⚠️ API key has write permissions — a read-only key is enough for paper trading");
    }
  } catch (err) {
    if (isFatal(err)) throw err;
    warn("⚠️ Could not verify API key (continuing): " + errorMessage(err));
  }

  const ledger = new Ledger(config.storage.stateFile, config.storage.tradesFile);
  const engine = new ScanEngine(config, client, ledger);
  await engine.load();
  log(
    `Loaded trades=${engine.getTrades().length} open=${engine.openTradeCount} watch=${engine.watchSize}`
  );

  let health: Server | null = null;
  if (config.health.enabled) {
    health = createHealthServer(() => engine.snapshot());
    health.on("error", (err) => error("Health server error: " + errorMessage(err)));
    health.listen(config.health.port, () => log(`Health check listening on port ${config.health.port}`));
  }

  process.on("SIGINT", () => requestStop("SIGINT"));
  process.on("SIGTERM", () => requestStop("SIGTERM"));

  const wakeMs = config.scan.wakeSeconds * 1000;
  const backoffMs = config.scan.errorBackoffSeconds * 1000;

  while (isRunning) {
    const now = Date.now();
    if (!engine.isNewBar(now)) {
      await pause(wakeMs);
      continue;
    }

    try {
      await engine.runCycle(now);
      await pause(wakeMs);
    } catch (err) {
      if (isFatal(err)) throw err;
      error("[ERROR] " + errorMessage(err));
      await pause(backoffMs);
    }
  }

  if (health) {
    const server = health;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
  log("[EXIT] stopped");
}

main().catch((err) => {
  error("Fatal error: " + errorMessage(err));
  process.exit(1);
});
