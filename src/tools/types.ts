import type { LiveConnection } from "../relay/liveConnection.js";

/**
 * One item of a tool result. Text items carry `text`; other types carry their
 * own payload fields and are forwarded untouched.
 */
export interface ToolContent {
  type: string;
  [key: string]: unknown;
}

/** Multi-part tool result. An empty list is a legitimate "no answer" outcome. */
export type ToolResult = ToolContent[];

/** Parameters of an MCP `tools/call` request as seen by implementations. */
export interface ToolCallParams {
  name: string;
  arguments: Record<string, unknown>;
}

/** Description of one input property. `items` is only set for array properties. */
export interface ToolPropertyDescriptor {
  readonly type: string;
  readonly description: string;
  readonly items?: { readonly type: string };
}

/** JSON schema subset advertised in `tools/list`. Property order is preserved. */
export interface ToolInputSchema {
  readonly type: "object";
  readonly properties: Readonly<Record<string, ToolPropertyDescriptor>>;
  readonly required: readonly string[];
}

/** Immutable, named capability. */
export interface ToolDescriptor {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
}

interface ToolImplementationBase {
  readonly descriptor: ToolDescriptor;
  call(params: ToolCallParams): Promise<ToolResult>;
}

/** Tool answered by the operator through the Relay Engine. */
export interface RelayToolImplementation extends ToolImplementationBase {
  readonly kind: "relay";
  readonly connection: LiveConnection;
}

/** Tool executing local logic. */
export interface DirectToolImplementation extends ToolImplementationBase {
  readonly kind: "direct";
}

/** Tool whose calls and responses are mirrored to a live connection. */
export interface ObservedToolImplementation extends ToolImplementationBase {
  readonly kind: "observed";
  readonly inner: ToolImplementation;
  readonly connection: LiveConnection;
}

export type ToolImplementation = RelayToolImplementation | DirectToolImplementation | ObservedToolImplementation;

export type ToolKind = ToolImplementation["kind"];
