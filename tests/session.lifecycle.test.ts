import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { RelayEngine } from "../src/relay/relayEngine.js";
import { SessionLifecycleManager } from "../src/session/lifecycle.js";
import { SessionStore } from "../src/session/sessionStore.js";
import { parseGlossary } from "../src/tools/builtin/glossary.js";
import { BuiltinCatalog } from "../src/tools/catalog.js";
import { FakeLiveConnection } from "./helpers/liveConnection.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

interface Harness {
  logger: RecordingLogger;
  store: SessionStore;
  engine: RelayEngine;
  lifecycle: SessionLifecycleManager;
  connection: FakeLiveConnection;
}

function createHarness(options: { projectDir?: string | null; withGlossary?: boolean } = {}): Harness {
  const logger = new RecordingLogger();
  const store = new SessionStore({ logger });
  const engine = new RelayEngine({ logger, createCallId: () => "call-1" });
  const catalog = new BuiltinCatalog({
    projectAccess: { projectDir: options.projectDir ?? null, projectFilter: null },
    glossary: options.withGlossary ? parseGlossary("# Relay\nForwards calls to an operator.") : null,
    logger,
  });
  const lifecycle = new SessionLifecycleManager({
    store,
    engine,
    catalog,
    logger,
    createSessionId: () => "user_generated",
  });
  return { logger, store, engine, lifecycle, connection: new FakeLiveConnection("conn-a") };
}

const ASK_TOOL = { title: "ask", properties: { ask: { type: "string", description: "d" } } };

describe("session lifecycle", () => {
  describe("initUser", () => {
    it("assigns an identifier to a UI that has none", async () => {
      const { lifecycle, store, connection } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "initUser" }));

      expect(connection.messages()).to.deep.equal([
        { action: "initUser", message: "Initial user: user_generated", userId: "user_generated" },
      ]);
      expect(store.get("user_generated")).to.not.equal(undefined);
    });

    it("advertises the optional built-in tools", async () => {
      const { lifecycle, connection } = createHarness({ projectDir: "/srv/projects", withGlossary: true });
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "initUser", userName: "" }));

      expect(connection.messages()).to.deep.equal([
        {
          action: "initUser",
          message: "Initial user: user_generated",
          userId: "user_generated",
          glossaryToolEnabled: true,
          internalToolsEnabled: true,
        },
      ]);
    });

    it("only touches a known user", async () => {
      const { lifecycle, store, connection } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "initUser", userName: "alice" }));

      expect(connection.sent).to.deep.equal([]);
      expect(store.get("alice")?.defined).to.equal(false);
    });
  });

  describe("startMcp", () => {
    it("installs operator-answered tools and announces the chat UI", async () => {
      const { lifecycle, store, connection } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "startMcp", userName: "u1", tool: ASK_TOOL }));

      expect(connection.messages()).to.deep.equal([
        {
          action: "toolDefinition",
          toolTitle: "ask",
          toolDescription: "",
          param1Name: "ask",
          param1Description: "d",
          param2Name: "",
          param2Description: "",
        },
        { action: "uiServerStarted", message: "Hi u1! MCP-server has been started.", url: "/chat/" },
      ]);
      const session = store.require("u1");
      expect(session.registry.get("ask")?.kind).to.equal("relay");
      expect(session.connection).to.equal(connection);
    });

    it("installs every tool of a tools list", async () => {
      const { lifecycle, store, connection } = createHarness();
      await lifecycle.handleMessage(
        connection,
        JSON.stringify({ action: "startMcp", userName: "u1", tools: [ASK_TOOL, { title: "confirm" }] }),
      );

      expect(store.require("u1").registry.listAll().map((descriptor) => descriptor.name)).to.deep.equal([
        "ask",
        "confirm",
      ]);
      expect(connection.messagesWithAction("toolDefinition")).to.have.length(1);
    });

    it("selects the observed file tools for the internal_tools title", async () => {
      const { lifecycle, store, connection } = createHarness({ projectDir: "/srv/projects" });
      await lifecycle.handleMessage(
        connection,
        JSON.stringify({ action: "startMcp", userName: "u1", tool: { title: "internal_tools" } }),
      );

      const registry = store.require("u1").registry;
      expect(registry.listAll().map((descriptor) => descriptor.name)).to.deep.equal([
        "create_new_file",
        "get_file_text_by_path",
        "find_files_by_glob",
      ]);
      expect(registry.get("create_new_file")?.kind).to.equal("observed");
      expect(connection.messagesWithAction("toolDefinition")).to.deep.equal([
        {
          action: "toolDefinition",
          toolTitle: "internal tool",
          toolDescription: "We will display the used internal tools here.",
          param1Name: "",
          param1Description: "",
          param2Name: "",
          param2Description: "",
        },
      ]);
    });

    it("installs no file tools for internal_tools without a project directory", async () => {
      const { lifecycle, store, connection } = createHarness();
      await lifecycle.handleMessage(
        connection,
        JSON.stringify({ action: "startMcp", userName: "u1", tool: { title: "internal_tools" } }),
      );

      expect(store.require("u1").registry.listAll()).to.deep.equal([]);
      expect(connection.messagesWithAction("toolDefinition")).to.have.nested.property("[0].toolTitle", "internal tool");
    });

    it("selects the glossary tool when a glossary is loaded", async () => {
      const { lifecycle, store, connection } = createHarness({ withGlossary: true });
      await lifecycle.handleMessage(
        connection,
        JSON.stringify({ action: "startMcp", userName: "u1", tool: { title: "glossary_tool_demo" } }),
      );

      const tool = store.require("u1").registry.get("glossary-tool");
      expect(tool?.kind).to.equal("observed");
      expect(connection.messagesWithAction("toolDefinition")).to.have.nested.property("[0].toolTitle", "glossary-tool");
      const result = await tool?.call({ name: "glossary-tool", arguments: { words: "relay" } });
      expect(result).to.deep.equal([{ type: "text", text: "# Relay\nForwards calls to an operator." }]);
      expect(connection.messagesWithAction("toolResponse")).to.deep.equal([
        { action: "toolResponse", toolResponse: "# Relay\nForwards calls to an operator." },
      ]);
    });

    it("treats the glossary title as a plain tool without a glossary", async () => {
      const { lifecycle, store, connection } = createHarness();
      await lifecycle.handleMessage(
        connection,
        JSON.stringify({ action: "startMcp", userName: "u1", tool: { title: "glossary_tool_demo" } }),
      );
      expect(store.require("u1").registry.get("glossary_tool_demo")?.kind).to.equal("relay");
    });
  });

  describe("operator answers", () => {
    let clock: sinon.SinonFakeTimers;

    beforeEach(() => {
      clock = sinon.useFakeTimers();
    });

    afterEach(() => {
      clock.restore();
    });

    it("completes a relayed call with the answer sent two seconds later", async () => {
      const { lifecycle, store, connection } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "startMcp", userName: "u1", tool: ASK_TOOL }));
      const tool = store.require("u1").registry.get("ask");

      const pending = tool?.call({ name: "ask", arguments: { ask: "hi" } });
      await clock.tickAsync(2_000);
      await lifecycle.handleMessage(
        connection,
        JSON.stringify({ action: "toolResponse", userName: "u1", toolResponse: { type: "text", text: "hello" } }),
      );

      expect(await pending).to.deep.equal([{ type: "text", text: "hello" }]);
      expect(connection.messagesWithAction("toolCall")).to.deep.equal([
        { action: "toolCall", callId: "call-1", toolRequest: { name: "ask", arguments: { ask: "hi" } } },
      ]);
    });

    it("cancels waiting calls when the connection closes", async () => {
      const { lifecycle, store, connection, logger } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "startMcp", userName: "u1", tool: ASK_TOOL }));
      const pending = store.require("u1").registry.get("ask")?.call({ name: "ask", arguments: { ask: "hi" } });
      await clock.tickAsync(1_000);

      connection.close();
      expect(lifecycle.onConnectionClosed(connection)).to.equal(1);

      expect(await pending).to.deep.equal([]);
      expect(logger.find("live_connection_closed")?.payload).to.deep.equal({
        connection_id: "conn-a",
        cancelled_calls: 1,
        sessions: ["u1"],
      });
      // The session survives its connection.
      expect(store.require("u1").defined).to.equal(true);
    });
  });

  describe("malformed traffic", () => {
    it("drops frames that are not JSON", async () => {
      const { lifecycle, logger, connection } = createHarness();
      await lifecycle.handleMessage(connection, "{not json");

      expect(connection.sent).to.deep.equal([]);
      expect(logger.find("live_message_malformed")?.payload).to.include({ connection_id: "conn-a", reason: "invalid_json" });
    });

    it("drops frames without an action", async () => {
      const { lifecycle, logger, connection } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ userName: "u1" }));
      expect(logger.find("live_message_malformed")?.payload).to.deep.equal({
        connection_id: "conn-a",
        reason: "missing_action",
      });
    });

    it("ignores unknown actions", async () => {
      const { lifecycle, logger, connection } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "ping" }));
      expect(logger.find("live_message_ignored")?.level).to.equal("debug");
      expect(connection.sent).to.deep.equal([]);
    });

    it("tells the UI when a known action misses fields", async () => {
      const { lifecycle, logger, store, connection } = createHarness();
      await lifecycle.handleMessage(connection, JSON.stringify({ action: "startMcp", userName: "u1" }));

      expect(connection.messages()).to.deep.equal([{ action: "message", message: "Ignored malformed startMcp message" }]);
      expect(logger.find("live_message_malformed")?.payload).to.include({ reason: "invalid_fields", action: "startMcp" });
      expect(store.get("u1")).to.equal(undefined);
    });

    it("drops an answer nobody waits for", async () => {
      const { lifecycle, logger, connection } = createHarness();
      await lifecycle.handleMessage(
        connection,
        JSON.stringify({ action: "toolResponse", toolResponse: { type: "text", text: "stray" } }),
      );
      expect(logger.find("relay_answer_unmatched")?.payload).to.deep.equal({
        connection_id: "conn-a",
        call_id: null,
        pending: 0,
      });
    });
  });
});
