import type { Client } from "@modelcontextprotocol/sdk/client/index.js";

import type { StructuredLogger } from "../logger.js";
import { connectSessionClient } from "../mcp/sessionServer.js";
import type { LiveConnection } from "../relay/liveConnection.js";
import { UnknownSessionError } from "../rpc/errors.js";
import { ToolRegistry } from "../tools/registry.js";
import type { ToolDescriptor, ToolImplementation } from "../tools/types.js";
import { SessionToolClient } from "./toolClient.js";

/** Default bound of an internal `tools/call`, above the relay's 60 s wait. */
const DEFAULT_TOOL_CALL_TIMEOUT_MS = 65_000;

/** Per-user aggregate: tool set, bound live connection and internal client. */
export class Session {
  readonly registry = new ToolRegistry();
  private boundConnection: LiveConnection | null = null;
  private toolClient: SessionToolClient;
  private internalClient: Promise<Client> | null = null;
  lastSeenAt: number;

  constructor(
    readonly id: string,
    private readonly logger: StructuredLogger,
    private readonly toolCallTimeoutMs: number,
    now: number,
  ) {
    this.toolClient = this.buildToolClient([]);
    this.lastSeenAt = now;
  }

  get connection(): LiveConnection | null {
    return this.boundConnection;
  }

  get client(): SessionToolClient {
    return this.toolClient;
  }

  /** `true` once a tool set was installed. */
  get defined(): boolean {
    return this.registry.version > 0;
  }

  /**
   * Replaces the tool set and rebuilds the client from the same list in one
   * synchronous step, so the two never disagree.
   */
  install(tools: readonly ToolImplementation[], connection: LiveConnection): void {
    this.registry.replaceAll(tools);
    this.toolClient = this.buildToolClient(this.registry.listAll());
    this.boundConnection = connection;
  }

  /** Disconnects the internal client, if one was opened. */
  async close(): Promise<void> {
    const pending = this.internalClient;
    this.internalClient = null;
    if (pending) {
      const client = await pending;
      await client.close();
    }
  }

  private buildToolClient(descriptors: readonly ToolDescriptor[]): SessionToolClient {
    return new SessionToolClient(
      { sessionId: this.id, connect: () => this.connectInternalClient(), requestTimeoutMs: this.toolCallTimeoutMs },
      descriptors,
    );
  }

  /** One SDK client per session, opened on first use and shared across tool sets. */
  private connectInternalClient(): Promise<Client> {
    if (!this.internalClient) {
      this.internalClient = connectSessionClient(this, this.logger).catch((error: unknown) => {
        this.internalClient = null;
        throw error;
      });
    }
    return this.internalClient;
  }
}

export interface SessionStoreOptions {
  readonly logger: StructuredLogger;
  /** Bound of one `tools/call` made by the internal client. */
  readonly toolCallTimeoutMs?: number;
  readonly now?: () => number;
}

/** Session aggregates keyed by their opaque identifier. */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly logger: StructuredLogger;
  private readonly toolCallTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.logger = options.logger;
    this.toolCallTimeoutMs = options.toolCallTimeoutMs ?? DEFAULT_TOOL_CALL_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Get-or-create. */
  resolve(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastSeenAt = this.now();
      return existing;
    }
    const session = new Session(sessionId, this.logger, this.toolCallTimeoutMs, this.now());
    this.sessions.set(sessionId, session);
    this.logger.info("session_created", { session_id: sessionId });
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /** Returns a session that has a tool set, or throws {@link UnknownSessionError}. */
  require(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session || !session.defined) {
      throw new UnknownSessionError(sessionId);
    }
    session.lastSeenAt = this.now();
    return session;
  }

  installTools(sessionId: string, tools: readonly ToolImplementation[], connection: LiveConnection): Session {
    const session = this.resolve(sessionId);
    session.install(tools, connection);
    this.logger.info("session_tools_installed", {
      session_id: sessionId,
      tools: tools.map((tool) => tool.descriptor.name),
      version: session.registry.version,
      connection_id: connection.id,
    });
    return session;
  }

  /** Sessions currently bound to `connection`. */
  boundTo(connection: LiveConnection): Session[] {
    return [...this.sessions.values()].filter((session) => session.connection === connection);
  }

  /**
   * Removes sessions idle for longer than `maxIdleMs` whose connection is gone.
   * Returns the evicted identifiers.
   */
  evictIdle(maxIdleMs: number, now: number = this.now()): string[] {
    const evicted: string[] = [];
    for (const [id, session] of this.sessions) {
      const connection = session.connection;
      const detached = connection === null || connection.isClosed();
      if (detached && now - session.lastSeenAt > maxIdleMs) {
        this.sessions.delete(id);
        evicted.push(id);
        session.close().catch((error: unknown) => {
          this.logger.warn("session_client_close_failed", {
            session_id: id,
            message: error instanceof Error ? error.message : String(error),
          });
        });
      }
    }
    if (evicted.length > 0) {
      this.logger.info("session_idle_evicted", { sessions: evicted, remaining: this.sessions.size });
    }
    return evicted;
  }
}
