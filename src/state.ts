// Engine state helpers: cooldowns and the recent-decision ring.

import type { DecisionEvent, EngineState } from "./types";

export const MAX_EVENTS = 500;

export function defaultState(): EngineState {
  return {
    lastBarCloseMs: null,
    cooldowns: new Map(),
    watch: new Map(),
    lastEvents: [],
  };
}

export function inCooldown(
  state: EngineState,
  symbol: string,
  nowMs: number,
  cooldownMinutes: number
): boolean {
  const last = state.cooldowns.get(symbol);
  if (last === undefined) return false;
  return nowMs - last < cooldownMinutes * 60_000;
}

export function setCooldown(state: EngineState, symbol: string, nowMs: number): void {
  state.cooldowns.set(symbol, nowMs);
}

/** Append and drop the oldest entries beyond `max`. */
export function recordEvent(state: EngineState, event: DecisionEvent, max: number = MAX_EVENTS): void {
  state.lastEvents.push(event);
  if (state.lastEvents.length > max) {
    state.lastEvents.splice(0, state.lastEvents.length - max);
  }
}
