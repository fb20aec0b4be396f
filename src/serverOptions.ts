import { randomUUID } from "node:crypto";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** HTTP and WebSocket exposure of the relay. */
export interface HttpRuntimeOptions {
  /** Listening host/interface. */
  host: string;
  /** Listening port. `0` picks a free port. */
  port: number;
  /** Path accepting MCP JSON-RPC calls. */
  mcpPath: string;
  /** Path accepting live-connection upgrades. */
  wsPath: string;
}

/** Relay pacing. */
export interface RelayTimingOptions {
  /** Maximum wait for an operator answer. */
  timeoutMs: number;
  /** Interval at which waiting calls check their connection. */
  pollIntervalMs: number;
  /** Idle duration after which detached sessions are evicted; `null` keeps them forever. */
  sessionIdleMs: number | null;
}

/** Built-in tools configuration. */
export interface BuiltinToolOptions {
  /** Base directory of the projects reachable by the file tools. */
  projectDir: string | null;
  /** Regular expression project names must match. */
  projectFilter: string | null;
  /** Markdown glossary enabling the glossary tool. */
  glossaryFile: string | null;
  /** Description advertised by the glossary tool. */
  glossaryDescription: string | null;
}

/** Chat forwarding to an OpenAI-compatible endpoint. */
export interface ChatRuntimeOptions {
  /** Base URL of the completion server; chat forwarding is disabled when absent. */
  llmUrl: string | null;
  /** Maximum number of tool-call rounds per chat request. */
  maxRounds: number;
  /** Timeout applied to each upstream request. */
  requestTimeoutMs: number;
}

export interface RelayRuntimeOptions {
  http: HttpRuntimeOptions;
  relay: RelayTimingOptions;
  tools: BuiltinToolOptions;
  chat: ChatRuntimeOptions;
  /** Optional path where JSON logs must be mirrored. */
  logFile: string | null;
}

/**
 * Immutable defaults. Exported so tests share a single source of truth with the
 * parser.
 */
export const RELAY_RUNTIME_DEFAULTS: Readonly<RelayRuntimeOptions> = Object.freeze({
  http: { host: "127.0.0.1", port: 8090, mcpPath: "/mcp", wsPath: "/ws" },
  relay: { timeoutMs: 60_000, pollIntervalMs: 1_000, sessionIdleMs: null },
  tools: { projectDir: null, projectFilter: null, glossaryFile: null, glossaryDescription: null },
  chat: { llmUrl: null, maxRounds: 8, requestTimeoutMs: 300_000 },
  logFile: null,
} satisfies RelayRuntimeOptions);

const FLAG_WITH_VALUE = new Set([
  "--host",
  "--port",
  "--ws-path",
  "--mcp-path",
  "--llm-url",
  "--relay-timeout-ms",
  "--relay-poll-ms",
  "--session-idle-ms",
  "--log-file",
  "--project-dir",
  "--project-filter",
  "--glossary-file",
  "--glossary-description",
  "--max-chat-rounds",
  "--chat-timeout-ms",
]);

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`Value ${value} for ${flag} must be a positive integer.`);
  }
  return num;
}

function parsePort(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0 || num > 65_535) {
    throw new Error(`Value ${value} for ${flag} must be a port between 0 and 65535.`);
  }
  return num;
}

function normalizePath(raw: string, flag: string): string {
  const cleaned = raw.trim();
  if (!cleaned.length) {
    throw new Error(`Path for ${flag} cannot be empty.`);
  }
  return cleaned.startsWith("/") ? cleaned : `/${cleaned}`;
}

function requireText(raw: string, flag: string): string {
  const cleaned = raw.trim();
  if (!cleaned.length) {
    throw new Error(`Value for ${flag} cannot be empty.`);
  }
  return cleaned;
}

function parseUrl(raw: string, flag: string): string {
  const cleaned = requireText(raw, flag);
  try {
    new URL(cleaned);
  } catch {
    throw new Error(`Value ${cleaned} for ${flag} must be an absolute URL.`);
  }
  return cleaned;
}

function envText(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

/**
 * Parses CLI flags on top of the environment defaults (`RELAY_PROJECT_DIR`,
 * `RELAY_PROJECT_FILTER`, `RELAY_GLOSSARY_FILE`, `RELAY_GLOSSARY_DESCRIPTION`,
 * `RELAY_LLM_URL`). Flags win over the environment.
 */
export function parseRelayRuntimeOptions(argv: string[], env: NodeJS.ProcessEnv = process.env): RelayRuntimeOptions {
  const envLlmUrl = envText(env, "RELAY_LLM_URL");
  const state: RelayRuntimeOptions = {
    http: { ...RELAY_RUNTIME_DEFAULTS.http },
    relay: { ...RELAY_RUNTIME_DEFAULTS.relay },
    tools: {
      projectDir: envText(env, "RELAY_PROJECT_DIR"),
      projectFilter: envText(env, "RELAY_PROJECT_FILTER"),
      glossaryFile: envText(env, "RELAY_GLOSSARY_FILE"),
      glossaryDescription: envText(env, "RELAY_GLOSSARY_DESCRIPTION"),
    },
    chat: {
      ...RELAY_RUNTIME_DEFAULTS.chat,
      llmUrl: envLlmUrl ? parseUrl(envLlmUrl, "RELAY_LLM_URL") : null,
    },
    logFile: RELAY_RUNTIME_DEFAULTS.logFile,
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const [flag, inlineValue] = arg.split("=", 2);
    const expectsValue = FLAG_WITH_VALUE.has(flag);
    let value = inlineValue;

    if (expectsValue && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--host":
        state.http.host = requireText(value ?? "", flag);
        break;
      case "--port":
        state.http.port = parsePort(value ?? "", flag);
        break;
      case "--ws-path":
        state.http.wsPath = normalizePath(value ?? "", flag);
        break;
      case "--mcp-path":
        state.http.mcpPath = normalizePath(value ?? "", flag);
        break;
      case "--llm-url":
        state.chat.llmUrl = parseUrl(value ?? "", flag);
        break;
      case "--max-chat-rounds":
        state.chat.maxRounds = parsePositiveInteger(value ?? "", flag);
        break;
      case "--chat-timeout-ms":
        state.chat.requestTimeoutMs = parsePositiveInteger(value ?? "", flag);
        break;
      case "--relay-timeout-ms":
        state.relay.timeoutMs = parsePositiveInteger(value ?? "", flag);
        break;
      case "--relay-poll-ms":
        state.relay.pollIntervalMs = parsePositiveInteger(value ?? "", flag);
        break;
      case "--session-idle-ms":
        state.relay.sessionIdleMs = parsePositiveInteger(value ?? "", flag);
        break;
      case "--log-file":
        state.logFile = requireText(value ?? "", flag);
        break;
      case "--project-dir":
        state.tools.projectDir = requireText(value ?? "", flag);
        break;
      case "--project-filter":
        state.tools.projectFilter = requireText(value ?? "", flag);
        break;
      case "--glossary-file":
        state.tools.glossaryFile = requireText(value ?? "", flag);
        break;
      case "--glossary-description":
        state.tools.glossaryDescription = requireText(value ?? "", flag);
        break;
      default:
        // Unknown flags are ignored so wrappers can pass their own.
        break;
    }
  }

  if (state.http.mcpPath === state.http.wsPath) {
    throw new Error("--mcp-path and --ws-path must differ.");
  }

  return state;
}

/** Identifier proposed to a UI that has none yet. */
export function createSessionId(): string {
  return `user_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}
