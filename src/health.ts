// Health check / status endpoint
//   GET /health → liveness + cycle count
//   GET /status → last cycle summary, stats, watch size, recent decisions

import http from "http";
import type { EngineSnapshot } from "./engine";
import type { TradeStats } from "./reporting/stats";

export interface StatusPayload extends Omit<EngineSnapshot, "stats"> {
  stats: Omit<TradeStats, "profitFactor"> & { profitFactor: number | null };
  uptime: number;
}

/** JSON has no Infinity; an unbounded profit factor is reported as null. */
export function buildStatusPayload(snapshot: EngineSnapshot, uptimeSeconds: number): StatusPayload {
  const pf = snapshot.stats.profitFactor;
  return {
    ...snapshot,
    stats: { ...snapshot.stats, profitFactor: Number.isFinite(pf) ? pf : null },
    uptime: uptimeSeconds,
  };
}

export function createHealthServer(getSnapshot: () => EngineSnapshot): http.Server {
  return http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const send = (status: number, body: unknown) => {
      res.writeHead(status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(body));
    };

    if (req.method !== "GET") return send(405, { error: "method not allowed" });

    if (url.pathname === "/health") {
      return send(200, { status: "ok", uptime: process.uptime(), cycles: getSnapshot().cycles });
    }
    if (url.pathname === "/status") {
      return send(200, buildStatusPayload(getSnapshot(), process.uptime()));
    }
    return send(404, { error: "not found" });
  });
}
