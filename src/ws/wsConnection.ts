import WebSocket from "ws";

import { type LiveConnection, LiveConnectionClosedError } from "../relay/liveConnection.js";

/** {@link LiveConnection} backed by a `ws` socket accepted by the live server. */
export class WsLiveConnection implements LiveConnection {
  constructor(
    readonly id: string,
    private readonly socket: WebSocket,
  ) {}

  send(message: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new LiveConnectionClosedError(this.id));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(message, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  isClosed(): boolean {
    return this.socket.readyState === WebSocket.CLOSING || this.socket.readyState === WebSocket.CLOSED;
  }
}
