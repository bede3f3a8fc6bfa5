// Bybit V5 HMAC-SHA256 request signing
// sign = HMAC_SHA256(secret, timestamp + apiKey + recvWindow + (queryString | jsonBody)), hex
// Headers: X-BAPI-API-KEY / X-BAPI-TIMESTAMP / X-BAPI-RECV-WINDOW / X-BAPI-SIGN

import { createHmac } from "crypto";

export interface BybitAuthConfig {
  apiKey: string;
  apiSecret: string;
  recvWindow: number;
}

export function signPayload(
  auth: BybitAuthConfig,
  timestamp: number,
  payload: string
): string {
  return createHmac("sha256", auth.apiSecret)
    .update(`${timestamp}${auth.apiKey}${auth.recvWindow}${payload}`)
    .digest("hex");
}

/**
 * Auth headers for a request. `payload` is the raw query string for GET
 * (without the leading "?") or the JSON body for POST.
 */
export function getAuthHeaders(
  auth: BybitAuthConfig,
  payload: string,
  timestamp: number = Date.now()
): Record<string, string> {
  return {
    "X-BAPI-API-KEY": auth.apiKey,
    "X-BAPI-TIMESTAMP": String(timestamp),
    "X-BAPI-RECV-WINDOW": String(auth.recvWindow),
    "X-BAPI-SIGN": signPayload(auth, timestamp, payload),
  };
}
