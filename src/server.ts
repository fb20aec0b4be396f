#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import process from "node:process";

import { StructuredLogger } from "./logger.js";
import { startRelay, type RunningRelay } from "./runtime.js";
import { parseRelayRuntimeOptions, type RelayRuntimeOptions } from "./serverOptions.js";

export { createRelayRuntime, startRelay } from "./runtime.js";
export { parseRelayRuntimeOptions } from "./serverOptions.js";

/**
 * Bootstraps the relay when the module is executed directly via the CLI:
 * parses options, starts the listeners and registers shutdown hooks.
 */
async function main(): Promise<void> {
  let options: RelayRuntimeOptions;
  try {
    options = parseRelayRuntimeOptions(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    new StructuredLogger().error("cli_options_invalid", { message });
    process.exit(1);
  }

  const logger = new StructuredLogger({ logFile: options.logFile });
  let relay: RunningRelay;
  try {
    relay = await startRelay(options, logger);
  } catch (error) {
    logger.error("relay_start_failed", { message: error instanceof Error ? error.message : String(error) });
    await logger.flush();
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.warn("shutdown_signal", { signal });
    try {
      await relay.close();
    } catch (error) {
      logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
    }
    process.exit(0);
  };

  process.once("SIGINT", (signal) => {
    void shutdown(signal);
  });
  process.once("SIGTERM", (signal) => {
    void shutdown(signal);
  });
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void main();
}
