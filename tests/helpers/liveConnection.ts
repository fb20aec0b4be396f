import { z } from "zod";

import { type LiveConnection, LiveConnectionClosedError } from "../../src/relay/liveConnection.js";

const FrameSchema = z.record(z.unknown());

export interface FakeLiveConnectionOptions {
  /** Makes every `send` reject, as a broken socket would. */
  readonly failSends?: boolean;
}

/** Live connection recording the frames it was asked to send. */
export class FakeLiveConnection implements LiveConnection {
  public readonly sent: string[] = [];
  private closed = false;
  private failSends: boolean;

  constructor(
    readonly id = "conn-1",
    options: FakeLiveConnectionOptions = {},
  ) {
    this.failSends = options.failSends ?? false;
  }

  async send(message: string): Promise<void> {
    if (this.closed || this.failSends) {
      throw new LiveConnectionClosedError(this.id);
    }
    this.sent.push(message);
  }

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
  }

  /** Sent frames decoded as JSON objects. */
  messages(): Array<Record<string, unknown>> {
    return this.sent.map((frame) => FrameSchema.parse(JSON.parse(frame)));
  }

  /** Decoded frames with the given action. */
  messagesWithAction(action: string): Array<Record<string, unknown>> {
    return this.messages().filter((message) => message.action === action);
  }
}
