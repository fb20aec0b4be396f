/** JSON-RPC identifier; `null` when the caller could not be identified. */
export type JsonRpcId = string | number | null;

/** Successful or erroneous JSON-RPC response, as written by the HTTP front on failures. */
export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}
