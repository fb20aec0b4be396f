import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { JsonRpcError, UpstreamError, ValidationError } from "../rpc/errors.js";
import type { SessionToolClient } from "../session/toolClient.js";
import type { ToolResult } from "../tools/types.js";

/** Generation properties reported to the chat UI. */
export const CHAT_PROPS = Object.freeze({
  default_generation_settings: { n_ctx: 32_768, params: {} },
  total_slots: 1,
  model_path: "operator-relay",
});

/** Single idle slot reported to the chat UI. */
export const CHAT_SLOTS = Object.freeze([{ id: 0, n_ctx: 32_768, speculative: false, is_processing: false }]);

const ToolCallSchema = z
  .object({
    id: z.string(),
    type: z.string().default("function"),
    function: z.object({ name: z.string(), arguments: z.string().default("{}") }).passthrough(),
  })
  .passthrough();

const ChatMessageSchema = z
  .object({
    role: z.string(),
    content: z.unknown().optional(),
    tool_calls: z.array(ToolCallSchema).optional(),
  })
  .passthrough();

const ChatRequestSchema = z
  .object({
    messages: z.array(ChatMessageSchema).min(1),
  })
  .passthrough();

const ChatCompletionSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: ChatMessageSchema,
            finish_reason: z.string().nullable().optional(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

type ChatMessage = z.infer<typeof ChatMessageSchema>;
type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

export interface ChatForwarderOptions {
  /** Base URL of the OpenAI-compatible server; `null` disables forwarding. */
  readonly llmUrl: string | null;
  readonly maxRounds: number;
  readonly requestTimeoutMs: number;
  readonly logger: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
}

/** Joins the text items of a tool result; other items are rendered as JSON. */
export function renderToolResult(content: ToolResult): string {
  if (content.length === 0) {
    return "[]";
  }
  return content
    .map((item) => (item.type === "text" && typeof item.text === "string" ? item.text : JSON.stringify(item)))
    .join("\n");
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const decoded: unknown = JSON.parse(raw);
    const parsed = z.record(z.unknown()).safeParse(decoded);
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

/**
 * Forwards chat-completion requests to the configured endpoint with the
 * session's tools attached, and executes the tool calls the model asks for
 * through the session client until it answers without tool calls.
 */
export class ChatForwarder {
  private readonly baseUrl: URL | null;
  private readonly maxRounds: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ChatForwarderOptions) {
    this.baseUrl = options.llmUrl ? new URL(options.llmUrl.endsWith("/") ? options.llmUrl : `${options.llmUrl}/`) : null;
    this.maxRounds = Math.max(1, options.maxRounds);
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get enabled(): boolean {
    return this.baseUrl !== null;
  }

  /**
   * Runs the tool loop for one chat request posted to `/chat/<path>` and
   * returns the final completion as received from the endpoint.
   */
  async complete(client: SessionToolClient, path: string, body: unknown): Promise<ChatCompletion> {
    if (!this.baseUrl) {
      throw new JsonRpcError("UPSTREAM_FAILURE", "No LLM endpoint configured", { status: 503 });
    }
    const parsed = ChatRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError("Invalid chat request", { issues: parsed.error.issues, status: 400 });
    }

    const url = new URL(path.replace(/^\/+/, ""), this.baseUrl);
    const tools = client.toChatTools();
    const messages: ChatMessage[] = [...parsed.data.messages];
    let completion: ChatCompletion | null = null;

    for (let round = 0; round < this.maxRounds; round += 1) {
      completion = await this.post(url, {
        ...parsed.data,
        messages,
        ...(tools.length > 0 ? { tools } : {}),
        stream: false,
      });
      const message = completion.choices[0]?.message;
      const toolCalls = message?.tool_calls ?? [];
      if (!message || toolCalls.length === 0) {
        return completion;
      }

      messages.push(message);
      for (const call of toolCalls) {
        messages.push({ role: "tool", tool_call_id: call.id, content: await this.runToolCall(client, call) });
      }
    }

    this.logger.warn("chat_rounds_exhausted", { rounds: this.maxRounds });
    if (!completion) {
      throw new UpstreamError("No completion received");
    }
    return completion;
  }

  private async runToolCall(client: SessionToolClient, call: z.infer<typeof ToolCallSchema>): Promise<string> {
    const name = call.function.name;
    if (!client.hasTool(name)) {
      this.logger.warn("chat_tool_unknown", { tool: name });
      return `Unknown tool: ${name}`;
    }
    try {
      const result = await client.callTool(name, parseArguments(call.function.arguments));
      this.logger.info("chat_tool_called", { tool: name, items: result.content.length, is_error: result.isError });
      return renderToolResult(result.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn("chat_tool_failed", { tool: name, message });
      return `Tool ${name} failed: ${message}`;
    }
  }

  private async post(url: URL, payload: Record<string, unknown>): Promise<ChatCompletion> {
    const controller = new AbortController();
    // The deadline covers the body as well: a stalled stream aborts the read.
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    let decoded: unknown;
    try {
      decoded = await this.exchange(url, payload, controller.signal);
    } finally {
      clearTimeout(timeout);
    }
    const parsed = ChatCompletionSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new UpstreamError("LLM endpoint returned an unexpected payload", { issues: parsed.error.issues });
    }
    return parsed.data;
  }

  private async exchange(url: URL, payload: Record<string, unknown>, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      throw abortAware(error, "Failed to reach the LLM endpoint");
    }

    if (!response.ok) {
      this.logger.warn("chat_upstream_status", { status: response.status, url: url.toString() });
      throw new UpstreamError(`LLM endpoint responded with HTTP ${response.status}`, {
        meta: { status: response.status },
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw abortAware(error, "LLM endpoint returned invalid JSON");
    }
  }
}

function abortAware(error: unknown, message: string): UpstreamError {
  if (error instanceof Error && error.name === "AbortError") {
    return new UpstreamError("LLM endpoint timed out", { cause: error });
  }
  return new UpstreamError(message, { cause: error });
}
