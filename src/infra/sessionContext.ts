import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * Correlation identifiers attached to the work performed for one inbound
 * request or one live-connection message.
 */
export interface SessionLogContext {
  /** Opaque session identifier resolved from the cookie or the live message. */
  readonly sessionId?: string | null;
  /** Correlation id of the HTTP request (`x-request-id`). */
  readonly requestId?: string | null;
  /** Origin of the work: `http`, `ws` or `internal` (chat forwarding). */
  readonly transport?: string | null;
}

/**
 * Lightweight AsyncLocalStorage exposing the session context to downstream
 * helpers (relay engine, tool wrappers, logger). Handlers establish the
 * context once so nested awaits keep reporting the same identifiers.
 */
const storage = new AsyncLocalStorage<SessionLogContext | undefined>();

/**
 * Executes the provided callback while exposing the supplied context. When no
 * context is provided the callback is executed directly without incurring the
 * storage cost.
 */
export function runWithSessionContext<T>(context: SessionLogContext | undefined, callback: () => T): T {
  if (!context) {
    return callback();
  }
  return storage.run(context, callback);
}

/** Retrieves the context associated with the current async execution. */
export function getSessionContext(): SessionLogContext | undefined {
  return storage.getStore();
}
