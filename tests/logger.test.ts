import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { runWithSessionContext } from "../src/infra/sessionContext.js";
import { type LogEntry, parseLogLevel, parseRedactionDirectives, StructuredLogger } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "relay.log");

    try {
      const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 256, maxFileCount: 3 });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("relay.log");
      expect(files).to.include("relay.log.1");
      expect(files).to.not.include("relay.log.3");

      const archived = await readFile(path.join(directory, "relay.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("redacts sensitive keys and configured secrets", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      redactionEnabled: true,
      redactSecrets: ["test-secret"],
      onEntry: (entry) => entries.push(entry),
    });

    logger.info("credentials_seen", { cookie: "RELAY_SESSION_ID=u1", note: "uses test-secret here" });

    expect(entries[0].payload).to.deep.equal({ cookie: "[REDACTED]", note: "uses [REDACTED] here" });
  });

  it("tags entries with the active session context", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ onEntry: (entry) => entries.push(entry) });

    runWithSessionContext({ sessionId: "u1", requestId: "req-1", transport: "http" }, () => {
      logger.warn("inside_request");
    });
    logger.warn("outside_request");

    expect(entries[0]).to.include({ session_id: "u1", request_id: "req-1", transport: "http" });
    expect(entries[1]).to.not.have.property("session_id");
  });

  it("omits file mirroring when callers pass a null logFile", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const messages: string[] = [];
      const logger = new StructuredLogger({ logFile: null, onEntry: (entry) => messages.push(entry.message) });

      logger.warn("null_logfile", { detail: "capture" });
      await logger.flush();

      expect(await readdir(directory)).to.deep.equal([]);
      expect(messages).to.deep.equal(["null_logfile"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("discards entries below the minimum level", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ minLevel: "warn", onEntry: (entry) => entries.push(entry) });

    logger.debug("too_chatty");
    logger.info("still_chatty");
    logger.error("kept");

    expect(entries.map((entry) => entry.message)).to.deep.equal(["kept"]);
    expect(parseLogLevel(" WARN ")).to.equal("warn");
    expect(parseLogLevel("verbose")).to.equal("debug");
  });

  it("parses redaction directives", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on")).to.deep.equal({ enabled: true, tokens: [] });
    expect(parseRedactionDirectives("placeholder-a, placeholder-a")).to.deep.equal({
      enabled: true,
      tokens: ["placeholder-a"],
    });
    expect(parseRedactionDirectives("off,placeholder-b")).to.deep.equal({ enabled: false, tokens: ["placeholder-b"] });
  });
});
