import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server as NodeHttpServer,
  type ServerResponse,
} from "node:http";
import process from "node:process";
import { finished } from "node:stream/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { CHAT_PROPS, CHAT_SLOTS, type ChatForwarder } from "./chat/chatForwarder.js";
import { readJsonBody } from "./http/body.js";
import { readSessionCookie } from "./http/cookies.js";
import { applySecurityHeaders, ensureRequestId, writeJson } from "./http/headers.js";
import { runWithSessionContext } from "./infra/sessionContext.js";
import type { StructuredLogger } from "./logger.js";
import { createSessionServer } from "./mcp/sessionServer.js";
import { JsonRpcError, MissingCredentialError, normaliseJsonRpcError, toJsonRpc } from "./rpc/errors.js";
import type { HttpRuntimeOptions } from "./serverOptions.js";
import type { Session, SessionStore } from "./session/sessionStore.js";

export type HttpTransportRequest = IncomingMessage;
export type HttpTransportResponse = ServerResponse;

/** Maximum payload size accepted by the JSON handlers (1 MiB). */
const MAX_JSON_BYTES = 1 * 1024 * 1024;
/** Event-loop delay budget considered healthy by `/healthz`. */
const HEALTH_EVENT_LOOP_DELAY_BUDGET_MS = 100;
const CHAT_PREFIX = "/chat/";

export interface RelayHttpDependencies {
  readonly store: SessionStore;
  readonly chat: ChatForwarder;
  readonly logger: StructuredLogger;
  /** Path accepting MCP calls; the same path with a trailing slash is accepted too. */
  readonly mcpPath: string;
}

export interface HttpServerHandle {
  readonly server: NodeHttpServer;
  close: () => Promise<void>;
  /** Actual port bound by the HTTP server (useful when `0` was requested). */
  port: number;
}

/**
 * Builds the request handler serving the MCP endpoint, the chat routes and the
 * health check. Every request runs inside a session log context so downstream
 * entries carry the request and session identifiers.
 */
export function createRequestHandler(
  deps: RelayHttpDependencies,
): (req: HttpTransportRequest, res: HttpTransportResponse) => Promise<void> {
  return async (req, res) => {
    applySecurityHeaders(res);
    const startedAt = process.hrtime.bigint();
    const requestId = ensureRequestId(req, res);
    const sessionId = readSessionCookie(req.headers);
    const method = req.method ?? "UNKNOWN";
    const route = new URL(req.url ?? "/", "http://localhost").pathname;

    await runWithSessionContext({ requestId, sessionId, transport: "http" }, async () => {
      try {
        await routeRequest(deps, req, res, route, method);
      } catch (error) {
        const failure = normaliseJsonRpcError(error);
        if (failure.status >= 500) {
          deps.logger.error("http_request_failed", { route, message: failure.message, category: failure.category });
        }
        if (!res.headersSent) {
          writeJson(res, failure.status, toJsonRpc(null, failure));
        } else {
          res.end();
        }
      }
      deps.logger.info("http_request_completed", {
        method,
        route,
        status: res.statusCode,
        duration_ms: computeDurationMs(startedAt),
      });
    });
  };
}

async function routeRequest(
  deps: RelayHttpDependencies,
  req: HttpTransportRequest,
  res: HttpTransportResponse,
  route: string,
  method: string,
): Promise<void> {
  if (route === "/healthz") {
    await handleHealthCheck(deps.store, res);
    return;
  }
  if (route === deps.mcpPath || route === `${deps.mcpPath}/`) {
    await handleMcpRequest(deps, req, res, method);
    return;
  }
  if (route === `${CHAT_PREFIX}props`) {
    writeJson(res, 200, CHAT_PROPS);
    return;
  }
  if (route === `${CHAT_PREFIX}slots`) {
    writeJson(res, 200, CHAT_SLOTS);
    return;
  }
  if (route.startsWith(CHAT_PREFIX) && method === "POST") {
    await handleChatRequest(deps, req, res, route.slice(CHAT_PREFIX.length));
    return;
  }
  throw new JsonRpcError("METHOD_NOT_FOUND", `No route for ${method} ${route}`);
}

/** Resolves the session named by the cookie; it must already have a tool set. */
function requireSession(store: SessionStore, req: HttpTransportRequest): Session {
  const sessionId = readSessionCookie(req.headers);
  if (!sessionId) {
    throw new MissingCredentialError();
  }
  return store.require(sessionId);
}

async function handleMcpRequest(
  deps: RelayHttpDependencies,
  req: HttpTransportRequest,
  res: HttpTransportResponse,
  method: string,
): Promise<void> {
  if (method !== "POST") {
    throw new JsonRpcError("INVALID_REQUEST", "MCP requests must use POST", { status: 405 });
  }
  const session = requireSession(deps.store, req);
  const body = await readJsonBody(req, MAX_JSON_BYTES);

  // Stateless: one server and transport per request, bound to the session.
  const server = createSessionServer(session, deps.logger);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined, enableJsonResponse: true });
  transport.onerror = (error) => {
    deps.logger.error("mcp_transport_error", { message: error.message });
  };
  await server.connect(transport);
  try {
    await transport.handleRequest(req, res, body.parsed);
    // Responses are written once the handlers settle, after handleRequest returns.
    await finished(res);
  } finally {
    await server.close();
  }
}

async function handleChatRequest(
  deps: RelayHttpDependencies,
  req: HttpTransportRequest,
  res: HttpTransportResponse,
  path: string,
): Promise<void> {
  const session = requireSession(deps.store, req);
  const body = await readJsonBody(req, MAX_JSON_BYTES);
  const completion = await deps.chat.complete(session.client, path, body.parsed);
  writeJson(res, 200, completion);
}

/** Handles `/healthz` by measuring event loop responsiveness. */
async function handleHealthCheck(store: SessionStore, res: HttpTransportResponse): Promise<void> {
  const before = Date.now();
  await new Promise((resolve) => setImmediate(resolve));
  const delayMs = Date.now() - before;
  const healthy = delayMs <= HEALTH_EVENT_LOOP_DELAY_BUDGET_MS;
  writeJson(res, healthy ? 200 : 503, { ok: healthy, event_loop_delay_ms: delayMs, sessions: store.size });
}

/**
 * Starts the HTTP listener. Errors raised by the server socket are logged, not
 * thrown, as they would crash the process.
 */
export async function startHttpServer(
  options: Pick<HttpRuntimeOptions, "host" | "port">,
  deps: RelayHttpDependencies,
): Promise<HttpServerHandle> {
  const { logger } = deps;
  const handler = createRequestHandler(deps);
  const httpServer = createHttpServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error("http_handler_crashed", { message: error instanceof Error ? error.message : String(error) });
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  });

  httpServer.on("error", (error) => {
    logger.error("http_server_error", { message: error instanceof Error ? error.message : String(error) });
  });

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: error instanceof Error ? error.message : String(error) });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve) => {
    httpServer.listen(options.port, options.host, () => {
      logger.info("http_listening", {
        host: options.host,
        port: extractListeningPort(httpServer),
        requested_port: options.port,
        mcp_path: deps.mcpPath,
      });
      resolve();
    });
  });

  return {
    server: httpServer,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
    port: extractListeningPort(httpServer),
  };
}

function computeDurationMs(startedAt: bigint): number {
  const elapsed = process.hrtime.bigint() - startedAt;
  return Number(elapsed / 1_000_000n);
}

/** Safely retrieves the bound port once the HTTP server is listening. */
function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  if (typeof address === "object" && address && typeof address.port === "number") {
    return address.port;
  }
  return 0;
}
