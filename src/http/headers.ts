import type { IncomingMessage } from "node:http";
import { Buffer } from "node:buffer";
import { randomUUID } from "node:crypto";

import type { HttpTransportResponse } from "../httpServer.js";

/** Security headers applied to every HTTP response. */
export function applySecurityHeaders(res: HttpTransportResponse): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
}

/**
 * Guarantees that the request/response pair carries a stable correlation id.
 * Identifiers provided by reverse proxies are preserved, otherwise a fresh UUID
 * is minted.
 */
export function ensureRequestId(req: IncomingMessage, res: HttpTransportResponse): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}

/** Serialises `payload` as the JSON body of the response. Returns the bytes written. */
export function writeJson(res: HttpTransportResponse, status: number, payload: unknown): number {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(body, "utf8");
  return Buffer.byteLength(body, "utf8");
}
