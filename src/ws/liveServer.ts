import { Buffer } from "node:buffer";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, Server as NodeHttpServer } from "node:http";
import type { Duplex } from "node:stream";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { WebSocketServer, type RawData } from "ws";

import type { StructuredLogger } from "../logger.js";
import type { SessionLifecycleManager } from "../session/lifecycle.js";
import { WsLiveConnection } from "./wsConnection.js";

export interface LiveServerOptions {
  /** Upgrade path accepted by the server; other upgrades are refused. */
  readonly path: string;
  readonly lifecycle: SessionLifecycleManager;
  readonly logger: StructuredLogger;
  readonly createConnectionId?: () => string;
}

export interface LiveServerHandle {
  /** Number of open live connections. */
  readonly connectionCount: () => number;
  close: () => Promise<void>;
}

function decodeFrame(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

/**
 * Attaches the live-connection endpoint to an existing HTTP server. Each text
 * frame is handed to the lifecycle manager in arrival order; closing the
 * socket cancels the relay calls waiting on it.
 */
export function attachLiveServer(httpServer: NodeHttpServer, options: LiveServerOptions): LiveServerHandle {
  const { lifecycle, logger } = options;
  const createConnectionId = options.createConnectionId ?? randomUUID;
  const wss = new WebSocketServer({ noServer: true });

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    if (pathname !== options.path) {
      logger.warn("live_upgrade_refused", { path: pathname });
      socket.end("HTTP/1.1 404 Not Found\r\n\r\n");
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  };
  httpServer.on("upgrade", onUpgrade);

  wss.on("connection", (ws) => {
    const connection = new WsLiveConnection(createConnectionId(), ws);
    logger.info("live_connection_opened", { connection_id: connection.id });

    // Frames are processed one after the other so a startMcp is installed
    // before the answers that follow it are routed.
    let chain: Promise<void> = Promise.resolve();
    ws.on("message", (data, isBinary) => {
      if (isBinary) {
        logger.warn("live_message_malformed", { connection_id: connection.id, reason: "binary_frame" });
        return;
      }
      const raw = decodeFrame(data);
      chain = chain
        .then(() => lifecycle.handleMessage(connection, raw))
        .catch((error: unknown) => {
          logger.error("live_message_failed", {
            connection_id: connection.id,
            message: error instanceof Error ? error.message : String(error),
          });
        });
    });

    ws.on("error", (error) => {
      logger.warn("live_connection_error", { connection_id: connection.id, message: error.message });
    });

    ws.on("close", (code) => {
      logger.debug("live_socket_closed", { connection_id: connection.id, code });
      lifecycle.onConnectionClosed(connection);
    });
  });

  return {
    connectionCount: () => wss.clients.size,
    close: async () => {
      httpServer.off("upgrade", onUpgrade);
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
  };
}
