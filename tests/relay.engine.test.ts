import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { RelayEngine } from "../src/relay/relayEngine.js";
import { FakeLiveConnection } from "./helpers/liveConnection.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `call-${next}`;
  };
}

describe("relay engine", () => {
  let clock: sinon.SinonFakeTimers;
  let logger: RecordingLogger;
  let connection: FakeLiveConnection;
  let engine: RelayEngine;

  beforeEach(() => {
    clock = sinon.useFakeTimers();
    logger = new RecordingLogger();
    connection = new FakeLiveConnection("conn-a");
    engine = new RelayEngine({ logger, createCallId: sequentialIds() });
  });

  afterEach(() => {
    clock.restore();
  });

  it("publishes a toolCall frame carrying the call id and the request", async () => {
    const pending = engine.dispatch(connection, { name: "ask", arguments: { ask: "hi" } });
    await clock.tickAsync(0);

    expect(connection.messages()).to.deep.equal([
      { action: "toolCall", callId: "call-1", toolRequest: { name: "ask", arguments: { ask: "hi" } } },
    ]);
    expect(engine.pendingCount(connection)).to.equal(1);

    engine.deliverAnswer(connection, { type: "text", text: "ok" });
    await pending;
  });

  it("returns the operator answer delivered before the deadline", async () => {
    const pending = engine.dispatch(connection, { name: "ask", arguments: { ask: "hi" } });
    await clock.tickAsync(2_000);

    expect(engine.deliverAnswer(connection, { type: "text", text: "hello" })).to.equal(true);
    const report = await pending;

    expect(report).to.deep.equal({
      callId: "call-1",
      status: "answered",
      result: [{ type: "text", text: "hello" }],
      elapsedMs: 2_000,
    });
    expect(engine.pendingCount(connection)).to.equal(0);
    expect(logger.find("relay_call_answered")?.level).to.equal("info");
  });

  it("returns an empty result and logs a timeout when nobody answers", async () => {
    const pending = engine.dispatch(connection, { name: "ask", arguments: { ask: "hi" } });
    await clock.tickAsync(60_000);
    const report = await pending;

    expect(report.status).to.equal("timed_out");
    expect(report.result).to.deep.equal([]);
    expect(report.elapsedMs).to.equal(60_000);
    const entry = logger.find("relay_call_timed_out");
    expect(entry?.level).to.equal("warn");
    expect(entry?.payload).to.deep.equal({
      call_id: "call-1",
      tool: "ask",
      connection_id: "conn-a",
      elapsed_ms: 60_000,
    });
    expect(logger.entries.filter((item) => item.level === "error")).to.deep.equal([]);
  });

  it("gives up at the next poll after the connection closes", async () => {
    const pending = engine.dispatch(connection, { name: "ask", arguments: { ask: "hi" } });
    await clock.tickAsync(1_000);
    connection.close();
    await clock.tickAsync(1_000);
    const report = await pending;

    expect(report.status).to.equal("connection_closed");
    expect(report.result).to.deep.equal([]);
    expect(report.elapsedMs).to.equal(2_000);
    expect(logger.find("relay_call_connection_closed")?.level).to.equal("warn");
  });

  it("wakes waiting calls immediately when the connection is cancelled", async () => {
    const pending = engine.dispatch(connection, { name: "ask", arguments: {} });
    await clock.tickAsync(500);
    connection.close();

    expect(engine.cancelConnection(connection)).to.equal(1);
    const report = await pending;
    expect(report.status).to.equal("connection_closed");
    expect(report.elapsedMs).to.equal(500);
  });

  it("reports a delivery failure without waiting", async () => {
    const broken = new FakeLiveConnection("conn-broken", { failSends: true });
    const report = await engine.dispatch(broken, { name: "ask", arguments: {} });

    expect(report.status).to.equal("delivery_failed");
    expect(report.result).to.deep.equal([]);
    expect(engine.pendingCount(broken)).to.equal(0);
    expect(logger.find("relay_call_delivery_failed")?.payload).to.deep.equal({
      call_id: "call-1",
      tool: "ask",
      connection_id: "conn-broken",
      elapsed_ms: 0,
      error: "Live connection conn-broken is closed",
    });
  });

  it("routes an answer carrying a call id to that call only", async () => {
    const first = engine.dispatch(connection, { name: "ask", arguments: { ask: "one" } });
    const second = engine.dispatch(connection, { name: "ask", arguments: { ask: "two" } });
    await clock.tickAsync(0);

    expect(engine.deliverAnswer(connection, { type: "text", text: "for two" }, "call-2")).to.equal(true);
    expect((await second).result).to.deep.equal([{ type: "text", text: "for two" }]);
    expect(engine.pendingCount(connection)).to.equal(1);

    expect(engine.deliverAnswer(connection, { type: "text", text: "for one" }, "call-1")).to.equal(true);
    expect((await first).result).to.deep.equal([{ type: "text", text: "for one" }]);
  });

  it("routes an untagged answer to the oldest pending call", async () => {
    const first = engine.dispatch(connection, { name: "ask", arguments: { ask: "one" } });
    const second = engine.dispatch(connection, { name: "ask", arguments: { ask: "two" } });
    await clock.tickAsync(0);

    // The operator meant the second call, but without a call id the oldest wins.
    engine.deliverAnswer(connection, { type: "text", text: "meant for two" });
    expect((await first).result).to.deep.equal([{ type: "text", text: "meant for two" }]);

    await clock.tickAsync(60_000);
    expect((await second).status).to.equal("timed_out");
  });

  it("drops a late answer instead of handing it to a later call", async () => {
    const first = engine.dispatch(connection, { name: "ask", arguments: {} });
    await clock.tickAsync(60_000);
    expect((await first).status).to.equal("timed_out");

    expect(engine.deliverAnswer(connection, { type: "text", text: "late" }, "call-1")).to.equal(false);
    expect(logger.find("relay_answer_unmatched")?.payload).to.deep.equal({
      connection_id: "conn-a",
      call_id: "call-1",
      pending: 0,
    });

    const second = engine.dispatch(connection, { name: "ask", arguments: {} });
    await clock.tickAsync(60_000);
    const report = await second;
    expect(report.callId).to.equal("call-2");
    expect(report.result).to.deep.equal([]);
  });

  it("rejects a second answer for a call already answered", async () => {
    const pending = engine.dispatch(connection, { name: "ask", arguments: {} });
    await clock.tickAsync(0);

    expect(engine.deliverAnswer(connection, { type: "text", text: "first" })).to.equal(true);
    expect(engine.deliverAnswer(connection, { type: "text", text: "second" })).to.equal(false);
    expect((await pending).result).to.deep.equal([{ type: "text", text: "first" }]);
  });

  it("honours custom deadlines", async () => {
    const fast = new RelayEngine({ logger, deadlineMs: 5_000, pollIntervalMs: 100, createCallId: sequentialIds() });
    const pending = fast.call(connection, { name: "ask", arguments: {} });
    await clock.tickAsync(5_000);
    expect(await pending).to.deep.equal([]);
  });
});
