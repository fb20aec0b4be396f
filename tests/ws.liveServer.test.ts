import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { WebSocket } from "ws";
import { z } from "zod";

import { startRelay, type RunningRelay } from "../src/runtime.js";
import { parseRelayRuntimeOptions } from "../src/serverOptions.js";
import { MCP_ACCEPT } from "./helpers/http.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const FrameSchema = z.record(z.unknown());
type Frame = z.infer<typeof FrameSchema>;

/** Operator UI stand-in collecting the frames pushed by the relay. */
class OperatorClient {
  readonly frames: Frame[] = [];
  private readonly waiters: Array<{ action: string; resolve: (frame: Frame) => void }> = [];

  private constructor(readonly socket: WebSocket) {
    socket.on("message", (data) => {
      const frame = FrameSchema.parse(JSON.parse(data.toString()));
      this.frames.push(frame);
      const index = this.waiters.findIndex((waiter) => waiter.action === frame.action);
      if (index >= 0) {
        const [waiter] = this.waiters.splice(index, 1);
        waiter.resolve(frame);
      }
    });
  }

  static async connect(url: string): Promise<OperatorClient> {
    const socket = new WebSocket(url);
    const client = new OperatorClient(socket);
    await new Promise<void>((resolve, reject) => {
      socket.once("open", () => resolve());
      socket.once("error", reject);
    });
    return client;
  }

  send(frame: Frame): void {
    this.socket.send(JSON.stringify(frame));
  }

  /** Resolves with the first frame carrying `action` that arrives after the call. */
  next(action: string): Promise<Frame> {
    return new Promise((resolve) => {
      this.waiters.push({ action, resolve });
    });
  }

  async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.close();
    });
  }
}

describe("live server", () => {
  let logger: RecordingLogger;
  let relay: RunningRelay;
  let client: OperatorClient;

  beforeEach(async () => {
    logger = new RecordingLogger();
    relay = await startRelay(parseRelayRuntimeOptions(["--port", "0"], {}), logger);
    client = await OperatorClient.connect(`ws://127.0.0.1:${relay.http.port}/ws`);
  });

  afterEach(async () => {
    await client.close();
    await relay.close();
  });

  it("hands out a user identifier on initUser", async () => {
    const reply = client.next("initUser");
    client.send({ action: "initUser" });

    const frame = await reply;
    expect(frame.userId).to.be.a("string").and.match(/^user_[0-9a-f]{12}$/);
    expect(relay.runtime.store.get(String(frame.userId))).to.not.equal(undefined);
  });

  it("relays an MCP tool call to the operator and back", async () => {
    const started = client.next("uiServerStarted");
    client.send({
      action: "startMcp",
      userName: "u1",
      tool: { title: "ask", description: "Ask the operator", properties: { ask: { type: "string", description: "Question" } } },
    });
    await started;

    const toolCall = client.next("toolCall");
    const response = fetch(`http://127.0.0.1:${relay.http.port}/mcp`, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: MCP_ACCEPT, Cookie: "RELAY_SESSION_ID=u1" },
      body: JSON.stringify({
        jsonrpc: "2.0",
        id: 1,
        method: "tools/call",
        params: { name: "ask", arguments: { ask: "meaning?" } },
      }),
    });

    const call = await toolCall;
    expect(call.toolRequest).to.deep.equal({ name: "ask", arguments: { ask: "meaning?" } });
    client.send({ action: "toolResponse", userName: "u1", callId: call.callId, toolResponse: { type: "text", text: "42" } });

    const res = await response;
    expect(res.status).to.equal(200);
    expect(await res.json()).to.deep.equal({ jsonrpc: "2.0", id: 1, result: { content: [{ type: "text", text: "42" }] } });
  });

  it("refuses upgrades on other paths", async () => {
    const socket = new WebSocket(`ws://127.0.0.1:${relay.http.port}/elsewhere`);
    const failure = await new Promise<Error>((resolve) => {
      socket.once("error", resolve);
    });

    expect(failure.message).to.equal("Unexpected server response: 404");
    expect(logger.find("live_upgrade_refused")?.payload).to.deep.equal({ path: "/elsewhere" });
  });

  it("cancels waiting calls when the operator disconnects", async () => {
    const started = client.next("uiServerStarted");
    client.send({ action: "startMcp", userName: "u2", tool: { title: "confirm" } });
    await started;

    const toolCall = client.next("toolCall");
    const response = fetch(`http://127.0.0.1:${relay.http.port}/mcp`, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: MCP_ACCEPT, Cookie: "RELAY_SESSION_ID=u2" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "confirm", arguments: {} } }),
    });
    await toolCall;
    await client.close();

    const res = await response;
    expect(await res.json()).to.deep.equal({ jsonrpc: "2.0", id: 2, result: { content: [] } });
  });
});
