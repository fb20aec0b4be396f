import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { runWithSessionContext } from "../infra/sessionContext.js";
import { UpstreamError } from "../rpc/errors.js";
import type { ToolDescriptor, ToolResult } from "../tools/types.js";

/** Resolves the SDK client connected to the session's MCP server. */
export type ToolClientConnector = () => Promise<Client>;

export interface SessionToolClientOptions {
  readonly sessionId: string;
  readonly connect: ToolClientConnector;
  /** Upper bound of one `tools/call` round trip. */
  readonly requestTimeoutMs: number;
}

/** Function tool in the OpenAI chat-completions format. */
export interface ChatFunctionTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: {
      type: "object";
      properties: Record<string, { type: string; description: string; items?: { type: string } }>;
      required: string[];
    };
  };
}

const CallToolResultSchema = z
  .object({
    content: z.array(z.object({ type: z.string() }).passthrough()).default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

export interface ToolClientCallResult {
  readonly content: ToolResult;
  readonly isError: boolean;
}

/**
 * Internal MCP client of a session. It knows the session's tool descriptors
 * and reaches them through `tools/call` requests sent by an SDK client to the
 * session's own MCP server, like an external model client would.
 */
export class SessionToolClient {
  private readonly tools: ReadonlyMap<string, ToolDescriptor>;

  constructor(
    private readonly options: SessionToolClientOptions,
    descriptors: Iterable<ToolDescriptor>,
  ) {
    const tools = new Map<string, ToolDescriptor>();
    for (const descriptor of descriptors) {
      tools.set(descriptor.name, descriptor);
    }
    this.tools = tools;
  }

  listTools(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  toChatTools(): ChatFunctionTool[] {
    return this.listTools().map((descriptor) => ({
      type: "function",
      function: {
        name: descriptor.name,
        description: descriptor.description,
        parameters: {
          type: "object",
          properties: Object.fromEntries(
            Object.entries(descriptor.inputSchema.properties).map(([name, property]) => [
              name,
              {
                type: property.type,
                description: property.description,
                ...(property.items ? { items: { type: property.items.type } } : {}),
              },
            ]),
          ),
          required: [...descriptor.inputSchema.required],
        },
      },
    }));
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolClientCallResult> {
    const { sessionId, connect, requestTimeoutMs } = this.options;
    return runWithSessionContext({ sessionId, transport: "internal" }, async () => {
      let raw: unknown;
      try {
        const client = await connect();
        raw = await client.callTool({ name, arguments: args }, undefined, { timeout: requestTimeoutMs });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new UpstreamError(message, {
          cause: error,
          meta: { tool: name, ...(error instanceof McpError ? { code: error.code } : {}) },
        });
      }
      const parsed = CallToolResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new UpstreamError(`Malformed tools/call result for ${name}`, { issues: parsed.error.issues });
      }
      return { content: parsed.data.content, isError: parsed.data.isError ?? false };
    });
  }
}
