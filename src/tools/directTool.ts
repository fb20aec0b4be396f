import type { z } from "zod";

import { ValidationError } from "../rpc/errors.js";
import type { DirectToolImplementation, ToolDescriptor, ToolResult } from "./types.js";

/**
 * Declares a tool that runs local logic. Arguments are parsed with `schema`
 * before `handler` runs; parse failures surface as {@link ValidationError}.
 */
export function defineDirectTool<Schema extends z.ZodTypeAny>(
  descriptor: ToolDescriptor,
  schema: Schema,
  handler: (input: z.infer<Schema>) => Promise<ToolResult>,
): DirectToolImplementation {
  return {
    kind: "direct",
    descriptor,
    async call(params) {
      const parsed = schema.safeParse(params.arguments);
      if (!parsed.success) {
        throw new ValidationError(`Invalid arguments for ${descriptor.name}`, { issues: parsed.error.issues });
      }
      return handler(parsed.data);
    },
  };
}
