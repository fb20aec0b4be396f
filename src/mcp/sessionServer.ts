import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ContentBlockSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ContentBlock,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import type { StructuredLogger } from "../logger.js";
import { ValidationError } from "../rpc/errors.js";
import { toolErrorResult } from "../server/toolErrors.js";
import type { Session } from "../session/sessionStore.js";
import type { ToolDescriptor, ToolResult } from "../tools/types.js";

/** Name and version advertised during `initialize`. */
const SERVER_INFO = Object.freeze({ name: "operator-relay", version: "0.1.0" });

/** Identity of the in-process client each session uses for chat tool calls. */
const INTERNAL_CLIENT_INFO = Object.freeze({ name: "operator-relay-internal", version: "0.1.0" });

function toSdkTool(descriptor: ToolDescriptor): Tool {
  return {
    name: descriptor.name,
    title: descriptor.title,
    description: descriptor.description,
    inputSchema: {
      type: "object",
      properties: { ...descriptor.inputSchema.properties },
      required: [...descriptor.inputSchema.required],
    },
  };
}

/**
 * Operator content is forwarded as is when it is a valid MCP content block.
 * Anything else travels as its JSON text.
 */
function toContentBlocks(content: ToolResult): ContentBlock[] {
  return content.map((item): ContentBlock => {
    const parsed = ContentBlockSchema.safeParse(item);
    return parsed.success ? parsed.data : { type: "text", text: JSON.stringify(item) };
  });
}

function toCallToolResult(content: ToolResult, isError = false): CallToolResult {
  return { content: toContentBlocks(content), ...(isError ? { isError: true } : {}) };
}

/**
 * Builds the MCP server of a session. The handlers read the session registry
 * on every request, so a redefined tool set is visible without reconnecting.
 */
export function createSessionServer(session: Session, logger: StructuredLogger): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: { listChanged: false } } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: session.registry.listAll().map(toSdkTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const name = request.params.name;
    // Resolve once: a redefinition during the call does not affect it.
    const tool = session.registry.get(name);
    if (!tool) {
      throw new ValidationError(`Unknown tool: ${name}`, { meta: { tool: name } });
    }
    try {
      const content = await tool.call({ name, arguments: request.params.arguments ?? {} });
      logger.debug("mcp_tool_called", { tool: name, kind: tool.kind, items: content.length });
      return toCallToolResult(content);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      const failure = toolErrorResult(logger, name, error, { kind: tool.kind });
      return toCallToolResult(failure.content, true);
    }
  });

  server.onerror = (error) => {
    logger.warn("mcp_server_error", { message: error.message });
  };

  return server;
}

/**
 * Connects an SDK client to a dedicated server of the session over an
 * in-memory transport pair.
 */
export async function connectSessionClient(session: Session, logger: StructuredLogger): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const server = createSessionServer(session, logger);
  await server.connect(serverTransport);
  const client = new Client(INTERNAL_CLIENT_INFO);
  await client.connect(clientTransport);
  logger.debug("session_client_connected", { session_id: session.id });
  return client;
}
