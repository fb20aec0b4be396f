/**
 * Outbound half of the persistent channel to the operator's UI. The relay only
 * needs to push text frames and to know whether the channel is gone; the
 * WebSocket adapter lives in `src/ws/wsConnection.ts`.
 */
export interface LiveConnection {
  /** Stable identifier used in logs. */
  readonly id: string;
  /** Sends one text frame. Rejects when the frame could not be written. */
  send(message: string): Promise<void>;
  /** `true` once the channel closed or started closing. */
  isClosed(): boolean;
}

/** Error raised by adapters when a frame cannot be written. */
export class LiveConnectionClosedError extends Error {
  readonly connectionId: string;

  constructor(connectionId: string, message = `Live connection ${connectionId} is closed`) {
    super(message);
    this.name = "LiveConnectionClosedError";
    this.connectionId = connectionId;
  }
}

/** Serialises and sends a JSON message. */
export async function sendJson(connection: LiveConnection, payload: object): Promise<void> {
  await connection.send(JSON.stringify(payload));
}
