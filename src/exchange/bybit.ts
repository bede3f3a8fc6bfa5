// Bybit V5 Market Data Client
// Handles: full-market tickers, last closed kline, API key check
//
// Everything Bybit returns is wrapped as { retCode, retMsg, result }.
// retCode != 0 on tickers aborts the cycle (DataSourceError);
// retCode != 0 on klines just means "no candle this cycle" (null).
//
// Kline list comes newest-first and its first row is the bar still forming,
// so we pick the newest row whose close time has already passed.

import { z } from "zod";
import { Timeframe, timeframeMs } from "../config";
import { ConfigurationError, DataSourceError, errorMessage } from "../errors";
import { debug } from "../logger";
import type { Candle, MarketDataSource, TickerSnapshot } from "../types";
import { safeParseFloat, safeParseInt } from "../util/numbers";
import { BybitAuthConfig, getAuthHeaders } from "./bybit-auth";

const KLINE_LIMIT = 5;

const envelopeSchema = z.object({
  retCode: z.number(),
  retMsg: z.string().default(""),
  result: z.unknown(),
});

type Envelope = z.infer<typeof envelopeSchema>;

const tickerListSchema = z.object({
  list: z.array(z.object({ symbol: z.string() }).passthrough()),
});

const klineListSchema = z.object({
  list: z.array(z.array(z.union([z.string(), z.number()]))).nullable().default([]),
});

const apiKeyInfoSchema = z
  .object({
    readOnly: z.union([z.number(), z.boolean()]).optional(),
    note: z.string().optional(),
  })
  .passthrough();

export interface ApiKeyInfo {
  readOnly: boolean;
  note: string;
}

export class BybitClient implements MarketDataSource {
  private auth: BybitAuthConfig;
  private baseUrl: string;
  private timeoutMs: number;
  private now: () => number;

  constructor(
    auth: BybitAuthConfig,
    baseUrl: string = "https://api.bybit.com",
    timeoutMs: number = 10_000,
    now: () => number = Date.now
  ) {
    this.auth = auth;
    this.baseUrl = baseUrl;
    this.timeoutMs = timeoutMs;
    this.now = now;
  }

  private async request(path: string, params: Record<string, string>, signed = false): Promise<Envelope> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.baseUrl}${path}${query ? "?" + query : ""}`;
    const headers: Record<string, string> = signed ? getAuthHeaders(this.auth, query, this.now()) : {};

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new DataSourceError(`Bybit GET ${path} failed: ${errorMessage(err)}`, path);
    }

    if (!response.ok) {
      const errText = await response.text().catch(() => "");
      throw new DataSourceError(
        `Bybit GET ${path} → ${response.status}: ${errText.substring(0, 200)}`,
        path,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new DataSourceError(`Bybit GET ${path} returned invalid JSON: ${errorMessage(err)}`, path, response.status);
    }

    const parsed = envelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new DataSourceError(`Bybit GET ${path} returned an unexpected payload`, path, response.status);
    }
    return parsed.data;
  }

  async listAllTickers(category: string): Promise<TickerSnapshot[]> {
    const path = "/v5/market/tickers";
    const data = await this.request(path, { category });
    if (data.retCode !== 0) {
      throw new DataSourceError(`tickers error: ${data.retMsg} (retCode ${data.retCode})`, path, undefined, {
        retCode: data.retCode,
      });
    }

    const result = tickerListSchema.safeParse(data.result);
    if (!result.success) {
      throw new DataSourceError("tickers error: result.list missing", path);
    }

    return result.data.list.map((row) => ({
      symbol: row.symbol,
      lastPrice: safeParseFloat(row.lastPrice),
      highPrice24h: safeParseFloat(row.highPrice24h),
      lowPrice24h: safeParseFloat(row.lowPrice24h),
      turnover24h: safeParseFloat(row.turnover24h),
      fundingRate: safeParseFloat(row.fundingRate),
      nextFundingTime: safeParseInt(row.nextFundingTime),
    }));
  }

  async lastClosedCandle(category: string, symbol: string, timeframe: Timeframe): Promise<Candle | null> {
    const data = await this.request("/v5/market/kline", {
      category,
      symbol,
      interval: timeframe,
      limit: String(KLINE_LIMIT),
    });
    if (data.retCode !== 0) {
      debug(`kline ${symbol}: ${data.retMsg} (retCode ${data.retCode})`);
      return null;
    }

    const result = klineListSchema.safeParse(data.result);
    if (!result.success || !result.data.list) return null;

    const len = timeframeMs(timeframe);
    const now = this.now();
    let best: Candle | null = null;
    for (const row of result.data.list) {
      // [startTime, open, high, low, close, volume, turnover]
      const openTs = safeParseInt(row[0]);
      const closeTs = openTs + len;
      if (openTs <= 0 || closeTs > now) continue;
      if (best && best.openTs >= openTs) continue;
      best = {
        openTs,
        closeTs,
        open: safeParseFloat(row[1]),
        high: safeParseFloat(row[2]),
        low: safeParseFloat(row[3]),
        close: safeParseFloat(row[4]),
      };
    }
    return best;
  }

  /** Signed call that fails fast when the key/secret pair is wrong. */
  async verifyCredentials(): Promise<ApiKeyInfo> {
    const path = "/v5/user/query-api";
    const data = await this.request(path, {}, true);
    if (data.retCode !== 0) {
      throw new ConfigurationError(`Bybit rejected API credentials: ${data.retMsg} (retCode ${data.retCode})`);
    }
    const info = apiKeyInfoSchema.safeParse(data.result);
    const readOnly = info.success ? info.data.readOnly : undefined;
    return {
      readOnly: readOnly === 1 || readOnly === true,
      note: info.success ? info.data.note ?? "" : "",
    };
  }
}
