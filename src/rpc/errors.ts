import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

import { getSessionContext } from "../infra/sessionContext.js";
import type { JsonRpcId, JsonRpcResponse } from "./types.js";

/**
 * Canonical taxonomy describing the JSON-RPC error categories surfaced by the
 * relay. Each entry provides the JSON-RPC error code, the default
 * human-readable message and the HTTP status used by the HTTP front.
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  PARSE_ERROR: { code: ErrorCode.ParseError, message: "Parse error", status: 400 },
  INVALID_REQUEST: { code: ErrorCode.InvalidRequest, message: "Invalid Request", status: 400 },
  METHOD_NOT_FOUND: { code: ErrorCode.MethodNotFound, message: "Method not found", status: 404 },
  VALIDATION_ERROR: { code: ErrorCode.InvalidParams, message: "Invalid params", status: 200 },
  MISSING_CREDENTIAL: { code: -32010, message: "Missing session cookie", status: 400 },
  UNKNOWN_SESSION: { code: -32011, message: "Unknown session", status: 400 },
  UPSTREAM_FAILURE: { code: -32020, message: "Upstream failure", status: 502 },
  INTERNAL: { code: ErrorCode.InternalError, message: "Internal error", status: 500 },
} as const;

/** Union type describing the supported JSON-RPC error categories. */
export type JsonRpcErrorCategory = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/** Additional metadata propagated alongside JSON-RPC error responses. */
export interface JsonRpcErrorData {
  category: JsonRpcErrorCategory;
  request_id?: string | null;
  session_id?: string | null;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
}

/**
 * Optional knobs allowing callers to enrich {@link JsonRpcErrorData}. The
 * `code` property lets transports override the JSON-RPC code when a category
 * re-uses multiple protocol codes.
 */
export interface JsonRpcErrorOptions {
  code?: number;
  status?: number;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Returns the data payload included with JSON-RPC error responses. Request and
 * session identifiers come from the active session context so clients can
 * quote them when reporting a failure.
 */
function createJsonRpcErrorData(category: JsonRpcErrorCategory, options: JsonRpcErrorOptions): JsonRpcErrorData {
  const snapshot: JsonRpcErrorData = { category };
  const context = getSessionContext();
  if (context?.requestId) {
    snapshot.request_id = context.requestId;
  }
  if (context?.sessionId) {
    snapshot.session_id = context.sessionId;
  }
  if (options.hint !== undefined) {
    snapshot.hint = options.hint;
  }
  if (options.issues !== undefined) {
    snapshot.issues = options.issues;
  }
  if (options.meta !== undefined) {
    snapshot.meta = options.meta;
  }
  return snapshot;
}

/**
 * Base class for all typed JSON-RPC errors thrown by the relay. Concrete
 * subclasses fix the error category while preserving the options bag to attach
 * hints and metadata.
 */
export class JsonRpcError extends Error {
  readonly category: JsonRpcErrorCategory;
  readonly code: number;
  readonly status: number;
  readonly data: JsonRpcErrorData;

  constructor(category: JsonRpcErrorCategory, message?: string, options: JsonRpcErrorOptions = {}) {
    const taxonomy = JSON_RPC_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.category = category;
    this.code = options.code ?? taxonomy.code;
    this.status = options.status ?? taxonomy.status;
    this.data = createJsonRpcErrorData(category, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Typed error surface dedicated to payload validation failures. */
export class ValidationError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
  }
}

/** Raised when an inbound request carries no session cookie. */
export class MissingCredentialError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("MISSING_CREDENTIAL", message, options);
  }
}

/**
 * Raised when a request references a session that was never initialised with
 * a tool set. Not retried: the operator has to define tools first.
 */
export class UnknownSessionError extends JsonRpcError {
  readonly sessionId: string;

  constructor(sessionId: string, options: JsonRpcErrorOptions = {}) {
    super("UNKNOWN_SESSION", `Unknown session: ${sessionId}`, {
      hint: "define a tool set over the live connection first",
      ...options,
    });
    this.sessionId = sessionId;
  }
}

/** Raised when the chat completion endpoint fails or answers garbage. */
export class UpstreamError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("UPSTREAM_FAILURE", message, options);
  }
}

/** Catch-all internal failure propagated to clients. */
export class InternalError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("INTERNAL", message, options);
  }
}

/** Maps arbitrary failures onto a {@link JsonRpcError}, keeping typed errors as they are. */
export function normaliseJsonRpcError(error: unknown): JsonRpcError {
  if (error instanceof JsonRpcError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, { cause: error });
}

/**
 * Formats a {@link JsonRpcError} into a JSON-RPC error response object so all
 * transports include the same diagnostic data.
 */
export function toJsonRpc(id: JsonRpcId, error: JsonRpcError): JsonRpcResponse {
  return {
    jsonrpc: "2.0",
    id,
    error: {
      code: error.code,
      message: error.message,
      data: error.data,
    },
  };
}
