import { z } from "zod";

import { leadingProperties, ToolDefinitionSchema } from "../tools/descriptor.js";
import type { ToolCallParams, ToolDescriptor } from "../tools/types.js";

/** Content item sent back by the operator. Extra payload fields are kept. */
export const ToolContentSchema = z.object({ type: z.string().min(1) }).passthrough();

const InitUserMessageSchema = z
  .object({
    action: z.literal("initUser"),
    userName: z.string().trim().optional().nullable(),
  })
  .passthrough();

const StartMcpMessageSchema = z
  .object({
    action: z.literal("startMcp"),
    userName: z.string().trim().min(1),
    tool: ToolDefinitionSchema.optional(),
    tools: z.array(ToolDefinitionSchema).min(1).optional(),
  })
  .passthrough()
  .refine((message) => message.tool !== undefined || message.tools !== undefined, {
    message: "startMcp requires a tool or a tools list",
    path: ["tool"],
  });

const ToolResponseMessageSchema = z
  .object({
    action: z.literal("toolResponse"),
    userName: z.string().optional().nullable(),
    /** Echo of the `callId` of the `toolCall` being answered. Legacy UIs omit it. */
    callId: z.string().min(1).optional(),
    toolResponse: ToolContentSchema,
  })
  .passthrough();

/** Inbound live-connection messages understood by the lifecycle manager. */
export const InboundLiveMessageSchema = z.union([
  InitUserMessageSchema,
  StartMcpMessageSchema,
  ToolResponseMessageSchema,
]);

export type InitUserMessage = z.infer<typeof InitUserMessageSchema>;
export type StartMcpMessage = z.infer<typeof StartMcpMessageSchema>;
export type ToolResponseMessage = z.infer<typeof ToolResponseMessageSchema>;
export type InboundLiveMessage = z.infer<typeof InboundLiveMessageSchema>;

/** Actions the relay recognises; anything else is ignored. */
export const INBOUND_ACTIONS = new Set(["initUser", "startMcp", "toolResponse"]);

export interface ToolCallMessage {
  action: "toolCall";
  callId: string;
  toolRequest: ToolCallParams;
}

export interface ToolDefinitionMessage {
  action: "toolDefinition";
  toolTitle: string;
  toolDescription: string;
  param1Name: string;
  param1Description: string;
  param2Name: string;
  param2Description: string;
}

export interface ToolRequestMessage {
  action: "toolRequest";
  toolRequest: string;
}

export interface ToolResponseNotice {
  action: "toolResponse";
  toolResponse: string;
}

export interface UiServerStartedMessage {
  action: "uiServerStarted";
  message: string;
  url: string;
}

export interface InitUserReply {
  action: "initUser";
  message: string;
  userId: string;
  glossaryToolEnabled?: true;
  internalToolsEnabled?: true;
}

export interface StatusMessage {
  action: "message";
  message: string;
}

export type OutboundLiveMessage =
  | ToolCallMessage
  | ToolDefinitionMessage
  | ToolRequestMessage
  | ToolResponseNotice
  | UiServerStartedMessage
  | InitUserReply
  | StatusMessage;

export function buildToolCallMessage(callId: string, params: ToolCallParams): ToolCallMessage {
  return { action: "toolCall", callId, toolRequest: params };
}

/**
 * UI hint describing a tool so the operator form can render the expected
 * input fields. The form has room for two properties. Built-in tools are
 * shown under their callable name rather than their display title.
 */
export function buildToolDefinitionMessage(
  descriptor: ToolDescriptor,
  toolTitle: string = descriptor.title,
): ToolDefinitionMessage {
  const [first, second] = leadingProperties(descriptor, 2);
  return {
    action: "toolDefinition",
    toolTitle,
    toolDescription: descriptor.description,
    param1Name: first?.name ?? "",
    param1Description: first?.description ?? "",
    param2Name: second?.name ?? "",
    param2Description: second?.description ?? "",
  };
}

/** Placeholder hint shown while the built-in catalog is active. */
export function buildCatalogDefinitionMessage(): ToolDefinitionMessage {
  return {
    action: "toolDefinition",
    toolTitle: "internal tool",
    toolDescription: "We will display the used internal tools here.",
    param1Name: "",
    param1Description: "",
    param2Name: "",
    param2Description: "",
  };
}

export function buildToolRequestMessage(params: ToolCallParams): ToolRequestMessage {
  return { action: "toolRequest", toolRequest: JSON.stringify(params) };
}

export function buildToolResponseNotice(text: string): ToolResponseNotice {
  return { action: "toolResponse", toolResponse: text };
}
