import { z } from "zod";

import type { StructuredLogger } from "../logger.js";

/**
 * Structured payload returned when a direct tool throws. The MCP transport
 * expects the `content` array to contain textual JSON so downstream clients can
 * parse the code, hint and optional details.
 */
export interface ToolErrorResponse {
  isError: true;
  content: Array<{ type: "text"; text: string }>;
}

/** Normalised representation of a thrown error. */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

const DEFAULT_CODE = "E-TOOL-UNEXPECTED";
const INVALID_INPUT_CODE = "E-TOOL-INVALID-INPUT";

function readStringField(error: object, field: string): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Normalises an arbitrary error into a code, message and optional hint. Zod
 * validation errors are mapped to the invalid-input code and keep their issues.
 */
export function normaliseToolError(error: unknown): NormalisedToolError {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof z.ZodError) {
    return { code: INVALID_INPUT_CODE, message, hint: "invalid_input", details: { issues: error.issues } };
  }
  if (typeof error === "object" && error !== null) {
    const code = readStringField(error, "code");
    const hint = readStringField(error, "hint");
    return {
      code: code ?? DEFAULT_CODE,
      message,
      ...(hint !== undefined ? { hint } : {}),
    };
  }
  return { code: DEFAULT_CODE, message };
}

/** Logs the failure and wraps it into an `isError` tool result. */
export function toolErrorResult(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  const normalised = normaliseToolError(error);
  logger.error("tool_call_failed", {
    ...context,
    tool: toolName,
    code: normalised.code,
    message: normalised.message,
  });

  const payload: Record<string, unknown> = {
    ok: false,
    error: normalised.code,
    tool: toolName,
    message: normalised.message,
  };
  if (normalised.hint) {
    payload.hint = normalised.hint;
  }
  if (normalised.details !== undefined) {
    payload.details = normalised.details;
  }
  return { isError: true, content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}
