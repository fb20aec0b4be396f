import { z } from "zod";

import type { ToolDescriptor, ToolPropertyDescriptor } from "./types.js";

/** Property definition as typed by the operator in the UI. */
const ToolPropertyDefinitionSchema = z
  .object({
    type: z.string().trim().min(1),
    description: z.string().default(""),
    /** Element type of array properties. */
    itemsType: z.string().trim().min(1).optional(),
  })
  .passthrough();

/**
 * Tool definition carried by `startMcp`. The UI only sends a title; it doubles
 * as the tool name unless `name` is given.
 */
export const ToolDefinitionSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    title: z.string().trim().min(1),
    description: z.string().default(""),
    properties: z.record(ToolPropertyDefinitionSchema).default({}),
  })
  .passthrough();

export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;

/**
 * Builds the immutable descriptor of a client-defined tool. Every supplied
 * property is required: the operator form only lists the fields the model must
 * fill in.
 */
export function buildToolDescriptor(definition: ToolDefinition): ToolDescriptor {
  const properties: Record<string, ToolPropertyDescriptor> = {};
  for (const [name, property] of Object.entries(definition.properties)) {
    properties[name] = Object.freeze({
      type: property.type,
      description: property.description,
      ...(property.itemsType ? { items: Object.freeze({ type: property.itemsType }) } : {}),
    });
  }

  return Object.freeze({
    name: definition.name ?? definition.title,
    title: definition.title,
    description: definition.description,
    inputSchema: Object.freeze({
      type: "object" as const,
      properties: Object.freeze(properties),
      required: Object.freeze(Object.keys(properties)),
    }),
  });
}

/** Returns the first `count` properties in declaration order. */
export function leadingProperties(
  descriptor: ToolDescriptor,
  count: number,
): Array<{ name: string; description: string }> {
  return Object.entries(descriptor.inputSchema.properties)
    .slice(0, count)
    .map(([name, property]) => ({ name, description: property.description }));
}
