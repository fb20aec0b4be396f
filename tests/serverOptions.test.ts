import { describe, it } from "mocha";
import { expect } from "chai";

import { createSessionId, parseRelayRuntimeOptions, RELAY_RUNTIME_DEFAULTS } from "../src/serverOptions.js";

describe("relay runtime options", () => {
  it("returns the defaults without flags", () => {
    expect(parseRelayRuntimeOptions([], {})).to.deep.equal(RELAY_RUNTIME_DEFAULTS);
  });

  it("parses flags in both spellings", () => {
    const options = parseRelayRuntimeOptions(
      [
        "--host",
        "0.0.0.0",
        "--port=9100",
        "--ws-path",
        "live",
        "--relay-timeout-ms",
        "5000",
        "--relay-poll-ms=250",
        "--session-idle-ms",
        "600000",
        "--max-chat-rounds",
        "3",
        "--log-file",
        "/tmp/relay.log",
      ],
      {},
    );

    expect(options.http).to.deep.equal({ host: "0.0.0.0", port: 9100, mcpPath: "/mcp", wsPath: "/live" });
    expect(options.relay).to.deep.equal({ timeoutMs: 5_000, pollIntervalMs: 250, sessionIdleMs: 600_000 });
    expect(options.chat.maxRounds).to.equal(3);
    expect(options.logFile).to.equal("/tmp/relay.log");
  });

  it("reads tool settings from the environment and lets flags win", () => {
    const env = {
      RELAY_PROJECT_DIR: "/srv/projects",
      RELAY_PROJECT_FILTER: "demo.*",
      RELAY_GLOSSARY_FILE: "/srv/glossary.md",
      RELAY_LLM_URL: "http://llm.test/v1",
    };

    const fromEnv = parseRelayRuntimeOptions([], env);
    expect(fromEnv.tools).to.deep.equal({
      projectDir: "/srv/projects",
      projectFilter: "demo.*",
      glossaryFile: "/srv/glossary.md",
      glossaryDescription: null,
    });
    expect(fromEnv.chat.llmUrl).to.equal("http://llm.test/v1");

    const overridden = parseRelayRuntimeOptions(["--project-dir", "/data", "--glossary-description", "Terms"], env);
    expect(overridden.tools.projectDir).to.equal("/data");
    expect(overridden.tools.glossaryDescription).to.equal("Terms");
  });

  it("ignores unknown flags and positional arguments", () => {
    expect(parseRelayRuntimeOptions(["serve", "--verbose", "--port", "0"], {}).http.port).to.equal(0);
  });

  it("rejects invalid values", () => {
    expect(() => parseRelayRuntimeOptions(["--port"], {})).to.throw("Flag --port requires a value.");
    expect(() => parseRelayRuntimeOptions(["--port", "70000"], {})).to.throw(
      "Value 70000 for --port must be a port between 0 and 65535.",
    );
    expect(() => parseRelayRuntimeOptions(["--relay-timeout-ms", "0"], {})).to.throw(
      "Value 0 for --relay-timeout-ms must be a positive integer.",
    );
    expect(() => parseRelayRuntimeOptions(["--mcp-path", "/ws"], {})).to.throw("--mcp-path and --ws-path must differ.");
    expect(() => parseRelayRuntimeOptions(["--llm-url", "not a url"], {})).to.throw(
      "Value not a url for --llm-url must be an absolute URL.",
    );
  });

  it("creates session identifiers with the user prefix", () => {
    const first = createSessionId();
    expect(first).to.match(/^user_[0-9a-f]{12}$/);
    expect(createSessionId()).to.not.equal(first);
  });
});
