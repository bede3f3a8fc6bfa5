// PUMP-FADE SHORT SCANNER — configuration
//
// STRATEGY: fade pumped USDT perps once their local high stalls
//   - Candidate: +35% from 24h low, trading within 12% of 24h high, $5M+ turnover
//   - Entry: market short after 2 closed candles without a new local high
//   - TP: 30% below the local high (not below entry!)
//   - SL: 2x entry
//   - Early exit when the next funding payment outweighs what is left to TP
//
// Everything comes from the environment (see .env.example). loadConfig() validates
// once at startup and returns a frozen object that is handed to each component.

import { z } from "zod";
import { ConfigurationError } from "./errors";

export const TIMEFRAMES = ["1", "3", "5", "15", "30", "60", "120", "240", "360", "720", "D"] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

const bool = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(fallback ? "true" : "false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

const num = (fallback: number) => z.coerce.number().finite().default(fallback);

const envSchema = z.object({
  BYBIT_API_KEY: z.string().trim().min(1, "BYBIT_API_KEY is required"),
  BYBIT_API_SECRET: z.string().trim().min(1, "BYBIT_API_SECRET is required"),
  BYBIT_BASE_URL: z.string().url().default("https://api.bybit.com"),
  BYBIT_CATEGORY: z.enum(["linear", "inverse", "spot"]).default("linear"),
  BYBIT_RECV_WINDOW: num(5000).pipe(z.number().int().positive()),
  REQUEST_TIMEOUT_MS: num(10_000).pipe(z.number().int().positive()),

  SCAN_TIMEFRAME: z.enum(TIMEFRAMES).default("15"),
  WAKE_SECONDS: num(5).pipe(z.number().positive()),
  ONLY_ON_BAR_CLOSE: bool(true),
  ERROR_BACKOFF_SECONDS: num(3).pipe(z.number().nonnegative()),

  QUOTE_SUFFIX: z.string().trim().min(1).default("USDT"),
  MIN_PUMP_FROM_LOW24_PCT: num(35),
  NEAR_HIGH_RATIO: num(0.88).pipe(z.number().positive()),
  MIN_TURNOVER_USDT: num(5_000_000).pipe(z.number().nonnegative()),

  STALL_CANDLES: num(2).pipe(z.number().int().min(1)),
  WATCH_TTL_SECONDS: num(24 * 60 * 60).pipe(z.number().positive()),

  NOTIONAL_USDT: num(20).pipe(z.number().positive()),
  TP_FROM_HIGH_PCT: num(0.3).pipe(z.number().gt(0).lt(1)),
  SL_MULT: num(2.0).pipe(z.number().gt(1)),
  SYMBOL_COOLDOWN_MINUTES: num(60).pipe(z.number().nonnegative()),

  FUNDING_GUARD_ENABLED: bool(true),
  FUNDING_GUARD_RATIO: num(1.0).pipe(z.number().nonnegative()),

  STATE_FILE: z.string().min(1).default("./data/state.json"),
  TRADES_FILE: z.string().min(1).default("./data/trades.json"),

  HEALTH_ENABLED: bool(true),
  PORT: num(3000).pipe(z.number().int().min(0).max(65535)),
});

function buildConfig(env: z.infer<typeof envSchema>) {
  return {
    exchange: {
      baseUrl: env.BYBIT_BASE_URL.replace(/\/+$/, ""),
      category: env.BYBIT_CATEGORY,
      apiKey: env.BYBIT_API_KEY,
      apiSecret: env.BYBIT_API_SECRET,
      recvWindow: env.BYBIT_RECV_WINDOW,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    },

    scan: {
      timeframe: env.SCAN_TIMEFRAME,
      wakeSeconds: env.WAKE_SECONDS,
      onlyOnBarClose: env.ONLY_ON_BAR_CLOSE,
      errorBackoffSeconds: env.ERROR_BACKOFF_SECONDS,
    },

    // Pump filter (ticker level)
    filter: {
      quote: env.QUOTE_SUFFIX,
      minPumpFromLow24Pct: env.MIN_PUMP_FROM_LOW24_PCT,
      nearHighRatio: env.NEAR_HIGH_RATIO,
      minTurnoverUsdt: env.MIN_TURNOVER_USDT,
    },

    // Stall logic
    watch: {
      stallCandles: env.STALL_CANDLES,
      ttlSeconds: env.WATCH_TTL_SECONDS,
      tpFromHighPct: env.TP_FROM_HIGH_PCT,
      skipRepeatedCandles: !env.ONLY_ON_BAR_CLOSE, // continuous mode: one stall per bar, not per wake
    },

    // Paper trade rules
    trade: {
      notionalUsdt: env.NOTIONAL_USDT,
      tpFromHighPct: env.TP_FROM_HIGH_PCT,   // TP = localHigh * (1 - 0.30)
      slMult: env.SL_MULT,                   // SL = entry * 2
      cooldownMinutes: env.SYMBOL_COOLDOWN_MINUTES,
    },

    // Exit if expected funding loss >= remaining profit to TP * ratio
    fundingGuard: {
      enabled: env.FUNDING_GUARD_ENABLED,
      ratio: env.FUNDING_GUARD_RATIO,
    },

    storage: {
      stateFile: env.STATE_FILE,
      tradesFile: env.TRADES_FILE,
      maxEvents: 500,
    },

    health: {
      enabled: env.HEALTH_ENABLED,
      port: env.PORT,
    },
  };
}

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

export type BotConfig = DeepReadonly<ReturnType<typeof buildConfig>>;
export type FilterSettings = BotConfig["filter"];
export type WatchSettings = BotConfig["watch"];
export type TradeSettings = BotConfig["trade"];
export type FundingGuardSettings = BotConfig["fundingGuard"];

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Parse and validate settings from an environment map.
 * Empty strings count as unset so `KEY=` in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") raw[key] = value.trim();
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new ConfigurationError("Invalid configuration: " + issues.join("; "), issues);
  }

  return deepFreeze(buildConfig(parsed.data));
}

/** Length of one bar in milliseconds. */
export function timeframeMs(tf: Timeframe): number {
  if (tf === "D") return 24 * 60 * 60 * 1000;
  return Number(tf) * 60 * 1000;
}
