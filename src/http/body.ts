import type { IncomingMessage } from "node:http";
import { Buffer } from "node:buffer";

import { JsonRpcError } from "../rpc/errors.js";

/** Structured JSON payload returned by {@link readJsonBody}. */
export interface JsonBody {
  /** Parsed JSON value. */
  readonly parsed: unknown;
  /** Raw UTF-8 string received over the wire. */
  readonly raw: string;
  /** Number of bytes read from the underlying socket. */
  readonly bytes: number;
}

/**
 * Reads and parses a JSON payload from an {@link IncomingMessage} stream while
 * enforcing an upper bound on the number of bytes accepted. Oversized bodies
 * raise an `INVALID_REQUEST` error carrying HTTP status 413; unparsable ones a
 * `PARSE_ERROR`.
 */
export async function readJsonBody(req: IncomingMessage, maxBytes = 1 << 20): Promise<JsonBody> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    // Normalise the chunk into a buffer regardless of the transport encoding.
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    totalBytes += buffer.length;

    if (totalBytes > maxBytes) {
      throw new JsonRpcError("INVALID_REQUEST", "Payload Too Large", { status: 413 });
    }

    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new JsonRpcError("PARSE_ERROR", undefined, { cause: error });
  }
  return { parsed, raw, bytes: totalBytes };
}
