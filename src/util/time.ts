import { Timeframe, timeframeMs } from "../config";

/** Close time of the most recently completed bar (bar boundaries are aligned to UTC epoch). */
export function currentBarCloseMs(tf: Timeframe, nowMs: number): number {
  const len = timeframeMs(tf);
  return Math.floor(nowMs / len) * len;
}

export function utcNowStr(nowMs: number = Date.now()): string {
  return new Date(nowMs).toISOString().replace("T", " ").slice(0, 19);
}
