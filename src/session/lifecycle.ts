import { runWithSessionContext } from "../infra/sessionContext.js";
import type { StructuredLogger } from "../logger.js";
import { type LiveConnection, sendJson } from "../relay/liveConnection.js";
import type { RelayEngine } from "../relay/relayEngine.js";
import { createSessionId } from "../serverOptions.js";
import { GLOSSARY_DEMO_TITLE, INTERNAL_TOOLS_TITLE, type BuiltinCatalog } from "../tools/catalog.js";
import { buildToolDescriptor, type ToolDefinition } from "../tools/descriptor.js";
import { observeTool } from "../tools/observedTool.js";
import { createRelayTool } from "../tools/relayTool.js";
import type { ToolImplementation } from "../tools/types.js";
import {
  buildCatalogDefinitionMessage,
  buildToolDefinitionMessage,
  INBOUND_ACTIONS,
  InboundLiveMessageSchema,
  type InitUserMessage,
  type InitUserReply,
  type OutboundLiveMessage,
  type StartMcpMessage,
  type ToolResponseMessage,
} from "./messages.js";
import type { Session, SessionStore } from "./sessionStore.js";

export interface SessionLifecycleOptions {
  readonly store: SessionStore;
  readonly engine: RelayEngine;
  readonly catalog: BuiltinCatalog;
  readonly logger: StructuredLogger;
  /** Generates identifiers for `initUser` requests without a user name. */
  readonly createSessionId?: () => string;
  /** Chat UI location announced once a tool set is active. */
  readonly chatUrl?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Handles operator traffic on live connections: session initialisation, tool
 * set (re)definition, operator answers and connection teardown.
 */
export class SessionLifecycleManager {
  private readonly store: SessionStore;
  private readonly engine: RelayEngine;
  private readonly catalog: BuiltinCatalog;
  private readonly logger: StructuredLogger;
  private readonly createSessionId: () => string;
  private readonly chatUrl: string;

  constructor(options: SessionLifecycleOptions) {
    this.store = options.store;
    this.engine = options.engine;
    this.catalog = options.catalog;
    this.logger = options.logger;
    this.createSessionId = options.createSessionId ?? createSessionId;
    this.chatUrl = options.chatUrl ?? "/chat/";
  }

  /**
   * Parses and routes one inbound text frame. Malformed frames are logged and
   * dropped; the connection stays open.
   */
  async handleMessage(connection: LiveConnection, raw: string): Promise<void> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("live_message_malformed", {
        connection_id: connection.id,
        reason: "invalid_json",
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (!isRecord(decoded) || typeof decoded.action !== "string") {
      this.logger.warn("live_message_malformed", { connection_id: connection.id, reason: "missing_action" });
      return;
    }
    const action = decoded.action;
    if (!INBOUND_ACTIONS.has(action)) {
      this.logger.debug("live_message_ignored", { connection_id: connection.id, action });
      return;
    }

    const parsed = InboundLiveMessageSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn("live_message_malformed", {
        connection_id: connection.id,
        reason: "invalid_fields",
        action,
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
      await this.notify(connection, { action: "message", message: `Ignored malformed ${action} message` });
      return;
    }

    const message = parsed.data;
    const sessionId = typeof message.userName === "string" && message.userName.length > 0 ? message.userName : null;
    await runWithSessionContext({ sessionId, transport: "ws" }, async () => {
      switch (message.action) {
        case "initUser":
          await this.initUser(connection, message);
          break;
        case "startMcp":
          await this.startMcp(connection, message);
          break;
        case "toolResponse":
          this.acceptAnswer(connection, message);
          break;
      }
    });
  }

  /** Assigns an identifier when the UI has none yet; known users are only touched. */
  async initUser(connection: LiveConnection, message: InitUserMessage): Promise<void> {
    const requested = message.userName?.trim();
    if (requested) {
      this.store.resolve(requested);
      return;
    }
    const userId = this.createSessionId();
    this.store.resolve(userId);
    const reply: InitUserReply = {
      action: "initUser",
      message: `Initial user: ${userId}`,
      userId,
      ...(this.catalog.glossaryEnabled ? { glossaryToolEnabled: true as const } : {}),
      ...(this.catalog.internalToolsEnabled ? { internalToolsEnabled: true as const } : {}),
    };
    await this.notify(connection, reply);
  }

  async startMcp(connection: LiveConnection, message: StartMcpMessage): Promise<void> {
    const definitions = message.tools ?? (message.tool ? [message.tool] : []);
    await this.defineTools(message.userName, definitions, connection);
    await this.notify(connection, {
      action: "uiServerStarted",
      message: `Hi ${message.userName}! MCP-server has been started.`,
      url: this.chatUrl,
    });
  }

  /**
   * Installs the tool set described by `definitions` on the session, bound to
   * `connection`, then describes the active tool to the UI. Reserved titles
   * select built-in tools instead of operator-answered ones.
   */
  async defineTools(
    sessionId: string,
    definitions: readonly ToolDefinition[],
    connection: LiveConnection,
  ): Promise<Session> {
    const [first] = definitions;
    const glossaryTool = this.catalog.glossary();
    let tools: ToolImplementation[];
    let hint: OutboundLiveMessage | null;

    if (first?.title === INTERNAL_TOOLS_TITLE) {
      tools = this.catalog
        .internalTools()
        .map((tool) => observeTool(tool, { connection, logger: this.logger }));
      hint = buildCatalogDefinitionMessage();
    } else if (first?.title === GLOSSARY_DEMO_TITLE && glossaryTool) {
      tools = [observeTool(glossaryTool, { connection, logger: this.logger, responseField: "text" })];
      hint = buildToolDefinitionMessage(glossaryTool.descriptor, glossaryTool.descriptor.name);
    } else {
      tools = definitions.map((definition) =>
        createRelayTool(buildToolDescriptor(definition), connection, this.engine),
      );
      const [firstTool] = tools;
      hint = firstTool ? buildToolDefinitionMessage(firstTool.descriptor) : null;
    }

    const session = this.store.installTools(sessionId, tools, connection);
    if (hint) {
      await this.notify(connection, hint);
    }
    return session;
  }

  /** Feeds an operator answer to the pending call it belongs to. */
  acceptAnswer(connection: LiveConnection, message: ToolResponseMessage): boolean {
    const delivered = this.engine.deliverAnswer(connection, message.toolResponse, message.callId);
    if (delivered) {
      this.logger.debug("live_answer_accepted", { connection_id: connection.id, call_id: message.callId ?? null });
    }
    return delivered;
  }

  /** Cancels every relay call waiting on `connection`. Sessions are kept. */
  onConnectionClosed(connection: LiveConnection): number {
    const cancelled = this.engine.cancelConnection(connection);
    this.logger.info("live_connection_closed", {
      connection_id: connection.id,
      cancelled_calls: cancelled,
      sessions: this.store.boundTo(connection).map((session) => session.id),
    });
    return cancelled;
  }

  private async notify(connection: LiveConnection, message: OutboundLiveMessage): Promise<void> {
    try {
      await sendJson(connection, message);
    } catch (error) {
      this.logger.warn("live_send_failed", {
        connection_id: connection.id,
        action: message.action,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
