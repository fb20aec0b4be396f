import type { StructuredLogger } from "../logger.js";
import { type LiveConnection, sendJson } from "../relay/liveConnection.js";
import {
  buildToolDefinitionMessage,
  buildToolRequestMessage,
  buildToolResponseNotice,
  type OutboundLiveMessage,
} from "../session/messages.js";
import type { ObservedToolImplementation, ToolImplementation, ToolResult } from "./types.js";

export interface ObserveToolOptions {
  readonly connection: LiveConnection;
  readonly logger: StructuredLogger;
  /**
   * Field of the first result item echoed to the UI. When absent, or when the
   * item has no string under that name, the whole result is echoed as JSON.
   */
  readonly responseField?: string;
}

/** Text shown to the operator for a finished call. */
export function describeResult(result: ToolResult, responseField?: string): string {
  const first = result[0];
  if (responseField && first) {
    const value = first[responseField];
    if (typeof value === "string") {
      return value;
    }
  }
  return JSON.stringify(result);
}

/**
 * Mirrors every call of `inner` to the live connection: a `toolDefinition` and
 * a `toolRequest` before the call, a `toolResponse` after it. Mirroring never
 * changes the result, and a failed notification is logged only.
 */
export function observeTool(inner: ToolImplementation, options: ObserveToolOptions): ObservedToolImplementation {
  const { connection, logger, responseField } = options;

  const notify = async (message: OutboundLiveMessage): Promise<void> => {
    try {
      await sendJson(connection, message);
    } catch (error) {
      logger.warn("observed_tool_notify_failed", {
        tool: inner.descriptor.name,
        action: message.action,
        connection_id: connection.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  return {
    kind: "observed",
    descriptor: inner.descriptor,
    inner,
    connection,
    async call(params) {
      await notify(buildToolDefinitionMessage(inner.descriptor, inner.descriptor.name));
      await notify(buildToolRequestMessage(params));
      const result = await inner.call(params);
      await notify(buildToolResponseNotice(describeResult(result, responseField)));
      return result;
    },
  };
}
