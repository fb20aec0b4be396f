import { ChatForwarder } from "./chat/chatForwarder.js";
import { startHttpServer, type HttpServerHandle } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { RelayEngine } from "./relay/relayEngine.js";
import type { RelayRuntimeOptions } from "./serverOptions.js";
import { SessionLifecycleManager } from "./session/lifecycle.js";
import { SessionStore } from "./session/sessionStore.js";
import { loadGlossary, type Glossary } from "./tools/builtin/glossary.js";
import { BuiltinCatalog } from "./tools/catalog.js";
import { attachLiveServer, type LiveServerHandle } from "./ws/liveServer.js";

/** Components shared by the HTTP and live transports. */
export interface RelayRuntime {
  readonly logger: StructuredLogger;
  readonly engine: RelayEngine;
  readonly store: SessionStore;
  readonly catalog: BuiltinCatalog;
  readonly lifecycle: SessionLifecycleManager;
  readonly chat: ChatForwarder;
}

export interface RelayRuntimeDependencies {
  readonly logger?: StructuredLogger;
  readonly glossary?: Glossary | null;
  readonly fetchImpl?: typeof fetch;
}

/** The relay answers empty at its own deadline; internal calls wait a little longer. */
const INTERNAL_CALL_SLACK_MS = 5_000;

/**
 * Wires the relay components together. Session clients reach their tools
 * through an MCP server built the same way as the one serving `/mcp`.
 */
export function createRelayRuntime(
  options: RelayRuntimeOptions,
  dependencies: RelayRuntimeDependencies = {},
): RelayRuntime {
  const logger = dependencies.logger ?? new StructuredLogger({ logFile: options.logFile });
  const engine = new RelayEngine({
    logger,
    deadlineMs: options.relay.timeoutMs,
    pollIntervalMs: options.relay.pollIntervalMs,
  });
  const store = new SessionStore({
    logger,
    toolCallTimeoutMs: options.relay.timeoutMs + options.relay.pollIntervalMs + INTERNAL_CALL_SLACK_MS,
  });
  const catalog = new BuiltinCatalog({
    projectAccess: { projectDir: options.tools.projectDir, projectFilter: options.tools.projectFilter },
    glossary: dependencies.glossary ?? null,
    glossaryDescription: options.tools.glossaryDescription ?? undefined,
    logger,
  });
  const lifecycle = new SessionLifecycleManager({ store, engine, catalog, logger });
  const chat = new ChatForwarder({
    llmUrl: options.chat.llmUrl,
    maxRounds: options.chat.maxRounds,
    requestTimeoutMs: options.chat.requestTimeoutMs,
    logger,
    fetchImpl: dependencies.fetchImpl,
  });
  return { logger, engine, store, catalog, lifecycle, chat };
}

export interface RunningRelay {
  readonly runtime: RelayRuntime;
  readonly http: HttpServerHandle;
  readonly live: LiveServerHandle;
  close: () => Promise<void>;
}

/**
 * Loads the glossary when configured, then starts the HTTP listener with the
 * live endpoint attached to it.
 */
export async function startRelay(options: RelayRuntimeOptions, logger?: StructuredLogger): Promise<RunningRelay> {
  const log = logger ?? new StructuredLogger({ logFile: options.logFile });
  const glossary = options.tools.glossaryFile ? await loadGlossary(options.tools.glossaryFile, log) : null;
  const runtime = createRelayRuntime(options, { logger: log, glossary });

  const http = await startHttpServer(options.http, {
    store: runtime.store,
    chat: runtime.chat,
    logger: log,
    mcpPath: options.http.mcpPath,
  });
  const live = attachLiveServer(http.server, { path: options.http.wsPath, lifecycle: runtime.lifecycle, logger: log });

  let sweep: NodeJS.Timeout | null = null;
  const idleMs = options.relay.sessionIdleMs;
  if (idleMs !== null) {
    sweep = setInterval(() => runtime.store.evictIdle(idleMs), Math.min(idleMs, 60_000));
    sweep.unref();
  }

  log.info("relay_started", {
    host: options.http.host,
    port: http.port,
    mcp_path: options.http.mcpPath,
    ws_path: options.http.wsPath,
    internal_tools: runtime.catalog.internalToolsEnabled,
    glossary: runtime.catalog.glossaryEnabled,
    chat: runtime.chat.enabled,
  });

  return {
    runtime,
    http,
    live,
    close: async () => {
      if (sweep) {
        clearInterval(sweep);
      }
      await live.close();
      await http.close();
      await log.flush();
    },
  };
}
