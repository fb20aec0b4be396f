import { randomUUID } from "node:crypto";

import { StructuredLogger } from "../logger.js";
import { buildToolCallMessage } from "../session/messages.js";
import type { ToolCallParams, ToolContent, ToolResult } from "../tools/types.js";
import { CorrelationQueue, DEFAULT_POLL_INTERVAL_MS } from "./correlationQueue.js";
import { type LiveConnection, sendJson } from "./liveConnection.js";

/** Default bound on the wait for an operator answer. */
export const DEFAULT_RELAY_DEADLINE_MS = 60_000;

/** Terminal state of one relay call. */
export type RelayCallStatus = "answered" | "timed_out" | "connection_closed" | "delivery_failed";

/** Outcome of {@link RelayEngine.dispatch}, used by tests and logs. */
export interface RelayCallReport {
  readonly callId: string;
  readonly status: RelayCallStatus;
  readonly result: ToolResult;
  readonly elapsedMs: number;
}

export interface RelayEngineOptions {
  readonly logger: StructuredLogger;
  readonly deadlineMs?: number;
  readonly pollIntervalMs?: number;
  /** Generates call identifiers. Tests inject deterministic ids. */
  readonly createCallId?: () => string;
}

interface PendingCall {
  readonly callId: string;
  readonly toolName: string;
  readonly queue: CorrelationQueue<ToolContent>;
  answered: boolean;
}

/**
 * Turns a synchronous tool invocation into a round trip with the operator:
 * publish a `toolCall` on the live connection, then await the matching answer
 * until the deadline or the connection closing.
 *
 * Each call owns its correlation queue, registered on the connection's pending
 * table under a generated call id for the duration of the call.
 */
export class RelayEngine {
  private readonly logger: StructuredLogger;
  private readonly deadlineMs: number;
  private readonly pollIntervalMs: number;
  private readonly createCallId: () => string;
  private readonly pending = new Map<LiveConnection, PendingCall[]>();

  constructor(options: RelayEngineOptions) {
    this.logger = options.logger;
    this.deadlineMs = options.deadlineMs ?? DEFAULT_RELAY_DEADLINE_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.createCallId = options.createCallId ?? randomUUID;
  }

  /** Number of calls currently waiting on `connection`. */
  pendingCount(connection: LiveConnection): number {
    return this.pending.get(connection)?.length ?? 0;
  }

  /** Relays the call and returns `[answer]`, or `[]` when no answer came. */
  async call(connection: LiveConnection, params: ToolCallParams): Promise<ToolResult> {
    const report = await this.dispatch(connection, params);
    return report.result;
  }

  async dispatch(connection: LiveConnection, params: ToolCallParams): Promise<RelayCallReport> {
    const startedAt = Date.now();
    const call: PendingCall = {
      callId: this.createCallId(),
      toolName: params.name,
      queue: new CorrelationQueue<ToolContent>(),
      answered: false,
    };
    this.register(connection, call);

    try {
      try {
        await sendJson(connection, buildToolCallMessage(call.callId, params));
      } catch (error) {
        return this.finish(connection, call, "delivery_failed", [], startedAt, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      this.logger.debug("relay_call_dispatched", {
        call_id: call.callId,
        tool: call.toolName,
        connection_id: connection.id,
      });

      const outcome = await call.queue.takeOutcome({
        deadlineMs: this.deadlineMs,
        pollIntervalMs: this.pollIntervalMs,
        isCancelled: () => connection.isClosed(),
      });
      if (outcome.status === "value") {
        return this.finish(connection, call, "answered", [outcome.value], startedAt);
      }
      if (outcome.status === "timeout") {
        return this.finish(connection, call, "timed_out", [], startedAt);
      }
      return this.finish(connection, call, "connection_closed", [], startedAt);
    } finally {
      this.unregister(connection, call);
      call.queue.drain();
    }
  }

  /**
   * Routes an operator answer. With a `callId` only that call may receive it;
   * without one the oldest unanswered call on the connection takes it. Returns
   * `false` when no pending call matched, in which case the answer is dropped.
   */
  deliverAnswer(connection: LiveConnection, answer: ToolContent, callId?: string): boolean {
    const calls = this.pending.get(connection) ?? [];
    const target =
      callId !== undefined
        ? calls.find((candidate) => candidate.callId === callId && !candidate.answered)
        : calls.find((candidate) => !candidate.answered);
    if (!target) {
      this.logger.warn("relay_answer_unmatched", {
        connection_id: connection.id,
        call_id: callId ?? null,
        pending: calls.length,
      });
      return false;
    }
    target.answered = true;
    target.queue.offer(answer);
    return true;
  }

  /** Wakes every call waiting on `connection`. Returns how many were cancelled. */
  cancelConnection(connection: LiveConnection): number {
    const calls = this.pending.get(connection) ?? [];
    let cancelled = 0;
    for (const call of calls) {
      cancelled += call.queue.cancel();
    }
    return cancelled;
  }

  private register(connection: LiveConnection, call: PendingCall): void {
    const calls = this.pending.get(connection);
    if (calls) {
      calls.push(call);
    } else {
      this.pending.set(connection, [call]);
    }
  }

  private unregister(connection: LiveConnection, call: PendingCall): void {
    const calls = this.pending.get(connection);
    if (!calls) {
      return;
    }
    const remaining = calls.filter((candidate) => candidate !== call);
    if (remaining.length === 0) {
      this.pending.delete(connection);
    } else {
      this.pending.set(connection, remaining);
    }
  }

  private finish(
    connection: LiveConnection,
    call: PendingCall,
    status: RelayCallStatus,
    result: ToolResult,
    startedAt: number,
    extra: Record<string, unknown> = {},
  ): RelayCallReport {
    const elapsedMs = Date.now() - startedAt;
    const payload = {
      call_id: call.callId,
      tool: call.toolName,
      connection_id: connection.id,
      elapsed_ms: elapsedMs,
      ...extra,
    };
    switch (status) {
      case "answered":
        this.logger.info("relay_call_answered", payload);
        break;
      case "timed_out":
        this.logger.warn("relay_call_timed_out", payload);
        break;
      case "connection_closed":
        this.logger.warn("relay_call_connection_closed", payload);
        break;
      case "delivery_failed":
        this.logger.error("relay_call_delivery_failed", payload);
        break;
    }
    return { callId: call.callId, status, result, elapsedMs };
  }
}
