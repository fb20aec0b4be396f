import type { LiveConnection } from "../relay/liveConnection.js";
import type { RelayEngine } from "../relay/relayEngine.js";
import type { RelayToolImplementation, ToolDescriptor } from "./types.js";

/** Binds a descriptor to the relay: every call is answered by the operator on `connection`. */
export function createRelayTool(
  descriptor: ToolDescriptor,
  connection: LiveConnection,
  engine: RelayEngine,
): RelayToolImplementation {
  return {
    kind: "relay",
    descriptor,
    connection,
    call: (params) => engine.call(connection, params),
  };
}
