import { BotConfig, Timeframe, loadConfig } from "../src/config";
import type { Candle, MarketDataSource, OpenTrade, TickerSnapshot } from "../src/types";

export const BAR_MS = 15 * 60 * 1000;

export function testConfig(overrides: Record<string, string> = {}): BotConfig {
  return loadConfig({
    BYBIT_API_KEY: "test-key",
    BYBIT_API_SECRET: "test-secret",
    TP_FROM_HIGH_PCT: "0.5",
    SL_MULT: "2",
    NOTIONAL_USDT: "20",
    STALL_CANDLES: "2",
    MIN_TURNOVER_USDT: "1000",
    HEALTH_ENABLED: "false",
    ...overrides,
  });
}

export function makeCandle(openTs: number, high: number, low: number, close: number, open: number = close): Candle {
  return { openTs, closeTs: openTs + BAR_MS, open, high, low, close };
}

export function makeTicker(symbol: string, fields: Partial<TickerSnapshot> = {}): TickerSnapshot {
  return {
    symbol,
    lastPrice: 1.9,
    highPrice24h: 2.0,
    lowPrice24h: 1.0,
    turnover24h: 5000,
    fundingRate: 0.0001,
    nextFundingTime: 0,
    ...fields,
  };
}

export function makeOpenTrade(fields: Partial<OpenTrade> = {}): OpenTrade {
  return {
    id: "TESTUSDT:0",
    symbol: "TESTUSDT",
    status: "OPEN",
    side: "SHORT",
    openTs: 0,
    notional: 10,
    qty: 1,
    entry: 10,
    tp: 9,
    sl: 11,
    localHigh: 12,
    fundingRateAtOpen: 0,
    nextFundingTimeAtOpen: 0,
    ...fields,
  };
}

/** In-process market: tickers and per-symbol candles are set by the test between cycles. */
export class FakeMarket implements MarketDataSource {
  tickers: TickerSnapshot[] = [];
  candles = new Map<string, Candle | null>();
  tickerError: Error | null = null;
  candleCalls: string[] = [];

  async listAllTickers(_category: string): Promise<TickerSnapshot[]> {
    if (this.tickerError) throw this.tickerError;
    return this.tickers;
  }

  async lastClosedCandle(_category: string, symbol: string, _timeframe: Timeframe): Promise<Candle | null> {
    this.candleCalls.push(symbol);
    return this.candles.get(symbol) ?? null;
  }
}
