import { PipelineError } from "../errors.js";
import {
  isTerminalRunStatus,
  stampEvent,
  type ErrorEventCode,
  type PipelineEvent,
  type PipelineEventDraft,
  type TerminalRunStatus
} from "../events.js";
import { errorMessage, nowIso } from "../helpers.js";
import type { RuntimeEventLog } from "../observability.js";
import type { ConversationSession } from "../sessions/session.js";
import { parseToolArguments, type ToolInvoker } from "../tools/invoker.js";
import type { ToolResultEnvelope } from "../tools/types.js";
import type { RunEventSource, RunNotification, ThreadRunGateway, ToolCallRequest } from "../upstream/types.js";

export interface ConversationIdentity {
  agentId: string;
  userId: string;
}

export type IdentityResolver = (session: ConversationSession) => ConversationIdentity;

export interface RunOutcome {
  conversationId: string;
  runId?: string;
  status: TerminalRunStatus;
  eventCount: number;
  error?: {
    code: ErrorEventCode;
    message: string;
  };
}

export interface EventRouterOptions {
  gateway: ThreadRunGateway;
  invoker: ToolInvoker;
  /** Hands a stamped event to the channels. Runs inside the session lock, so it must not wait on slow consumers. */
  publish: (event: PipelineEvent) => Promise<void> | void;
  identity?: IdentityResolver;
  runtimeEvents?: RuntimeEventLog;
  now?: () => string;
}

interface TurnState {
  session: ConversationSession;
  threadId: string;
  runId?: string;
  eventCount: number;
  texts: Map<string, string>;
  signal?: AbortSignal;
}

type SegmentResult =
  | { kind: "terminal"; status: TerminalRunStatus; error?: RunOutcome["error"] }
  | { kind: "resumed"; source: RunEventSource }
  | { kind: "ended" };

const defaultIdentity: IdentityResolver = (session) => ({
  agentId: session.agentId,
  userId: session.userId
});

/**
 * Drives one user turn from message submission to a terminal run state,
 * turning upstream notifications into sequenced pipeline events.
 */
export class EventRouter {
  private readonly gateway: ThreadRunGateway;
  private readonly invoker: ToolInvoker;
  private readonly publish: EventRouterOptions["publish"];
  private readonly identity: IdentityResolver;
  private readonly runtimeEvents?: RuntimeEventLog;
  private readonly now: () => string;

  constructor(options: EventRouterOptions) {
    this.gateway = options.gateway;
    this.invoker = options.invoker;
    this.publish = options.publish;
    this.identity = options.identity ?? defaultIdentity;
    this.runtimeEvents = options.runtimeEvents;
    this.now = options.now ?? nowIso;
  }

  /** Validates, reserves the run slot synchronously, then runs the turn. */
  runTurn(session: ConversationSession, text: string, options: { signal?: AbortSignal } = {}): Promise<RunOutcome> {
    if (text.trim().length === 0) {
      throw new PipelineError("invalid_input", "Message text must not be empty");
    }
    const runSignal = session.reserveRun();
    const signal = options.signal ? AbortSignal.any([options.signal, runSignal]) : runSignal;
    return this.runReservedTurn(session, text, signal);
  }

  /** Runs a turn for a session whose run slot the caller has already reserved. */
  async runReservedTurn(session: ConversationSession, text: string, signal?: AbortSignal): Promise<RunOutcome> {
    const turn: TurnState = {
      session,
      threadId: "",
      eventCount: 0,
      texts: new Map(),
      signal
    };

    try {
      session.transition("streaming");
      const identity = this.identity(session);

      let source: RunEventSource;
      try {
        turn.threadId = await this.gateway.ensureThread(identity.agentId, identity.userId);
        session.threadId = turn.threadId;
        await this.gateway.submitUserMessage(turn.threadId, text, { userId: identity.userId });
        source = await this.gateway.startRun(turn.threadId, identity.agentId, { signal });
      } catch (error) {
        return await this.fail(turn, "transport_error", errorMessage(error));
      }

      for (;;) {
        const segment = await this.consume(turn, source);
        if (segment.kind === "resumed") {
          session.transition("streaming");
          source = segment.source;
          continue;
        }
        if (segment.kind === "ended") {
          return await this.fail(turn, "stream_ended", "Run stream ended before a terminal status");
        }
        session.transition("terminal");
        const outcome: RunOutcome = {
          conversationId: session.conversationId,
          ...(turn.runId ? { runId: turn.runId } : {}),
          status: segment.status,
          eventCount: turn.eventCount,
          ...(segment.error ? { error: segment.error } : {})
        };
        this.runtimeEvents?.emit(segment.error ? "run.failed" : "run.completed", { ...outcome });
        return outcome;
      }
    } finally {
      session.releaseRun();
    }
  }

  private async consume(turn: TurnState, source: RunEventSource): Promise<SegmentResult> {
    try {
      for await (const notification of source) {
        if (this.isForeign(turn, notification)) {
          continue;
        }
        switch (notification.type) {
          case "run.created":
            this.trackRun(turn, notification.runId);
            this.runtimeEvents?.emit("run.started", {
              conversationId: turn.session.conversationId,
              threadId: notification.threadId,
              runId: notification.runId
            });
            break;
          case "message.delta": {
            turn.texts.set(notification.messageId, (turn.texts.get(notification.messageId) ?? "") + notification.text);
            await this.emit(turn, {
              kind: "fragment",
              messageId: notification.messageId,
              payload: { text: notification.text }
            });
            break;
          }
          case "message.completed": {
            const accumulated = turn.texts.get(notification.messageId);
            turn.texts.delete(notification.messageId);
            await this.emit(turn, {
              kind: "finalized",
              messageId: notification.messageId,
              payload: { text: accumulated || notification.text }
            });
            break;
          }
          case "run.requires_action": {
            this.trackRun(turn, notification.runId);
            turn.session.transition("awaiting_tools");
            const results = await this.runToolCalls(turn, notification.runId, notification.toolCalls);
            const resumed = await this.gateway.submitToolResults(turn.threadId, notification.runId, results, {
              signal: turn.signal
            });
            this.runtimeEvents?.emit("tool.results.submitted", {
              conversationId: turn.session.conversationId,
              runId: notification.runId,
              callIds: Object.keys(results)
            });
            return { kind: "resumed", source: resumed };
          }
          case "run.status": {
            this.trackRun(turn, notification.runId);
            if (!isTerminalRunStatus(notification.status)) {
              this.runtimeEvents?.emit("run.state", {
                conversationId: turn.session.conversationId,
                runId: notification.runId,
                status: notification.status
              });
              break;
            }
            await this.emit(turn, {
              kind: "status",
              payload: { runId: notification.runId, status: notification.status }
            });
            const failure: RunOutcome["error"] = notification.lastError
              ? { code: "upstream_error", message: notification.lastError }
              : undefined;
            return { kind: "terminal", status: notification.status, error: failure };
          }
          case "error":
            await this.emitError(turn, "upstream_error", notification.message);
            return {
              kind: "terminal",
              status: "failed",
              error: { code: "upstream_error", message: notification.message }
            };
          case "done":
            return { kind: "ended" };
        }
      }
    } catch (error) {
      if (error instanceof PipelineError && error.code === "invariant_violation") {
        throw error;
      }
      const message = errorMessage(error);
      await this.emitError(turn, "transport_error", message);
      return { kind: "terminal", status: "failed", error: { code: "transport_error", message } };
    }
    return { kind: "ended" };
  }

  private async runToolCalls(
    turn: TurnState,
    runId: string,
    requested: ToolCallRequest[]
  ): Promise<Record<string, ToolResultEnvelope>> {
    const outstanding = new Map<string, ToolCallRequest>();
    for (const call of requested) {
      if (!outstanding.has(call.callId)) {
        outstanding.set(call.callId, call);
      }
    }

    const settled = await Promise.all(
      Array.from(outstanding.values()).map(async (call) => ({
        call,
        envelope: await this.invoker.invoke(
          { callId: call.callId, toolName: call.toolName, arguments: call.arguments },
          { conversationId: turn.session.conversationId, runId, signal: turn.signal }
        )
      }))
    );

    const results: Record<string, ToolResultEnvelope> = {};
    for (const { call, envelope } of settled) {
      const parsed = parseToolArguments(call.arguments);
      await this.emit(turn, {
        kind: "tool_call",
        payload: {
          callId: call.callId,
          toolName: call.toolName,
          arguments: parsed.ok ? parsed.value : parsed.raw,
          runId,
          ok: envelope.status,
          message: envelope.message
        }
      });
      results[call.callId] = envelope;
    }

    for (const callId of outstanding.keys()) {
      if (!(callId in results)) {
        throw new PipelineError("invariant_violation", `Tool call ${callId} has no result`);
      }
    }
    return results;
  }

  private isForeign(turn: TurnState, notification: RunNotification): boolean {
    if (!("threadId" in notification) || notification.threadId === undefined) {
      return false;
    }
    if (notification.threadId === turn.threadId) {
      return false;
    }
    this.runtimeEvents?.emit("router.notification.ignored", {
      conversationId: turn.session.conversationId,
      reason: "thread_mismatch",
      expectedThreadId: turn.threadId,
      threadId: notification.threadId,
      type: notification.type
    });
    return true;
  }

  private trackRun(turn: TurnState, runId: string): void {
    turn.runId = runId;
    turn.session.activeRunId = runId;
  }

  private async fail(turn: TurnState, code: ErrorEventCode, message: string): Promise<RunOutcome> {
    await this.emitError(turn, code, message);
    turn.session.transition("terminal");
    const outcome: RunOutcome = {
      conversationId: turn.session.conversationId,
      ...(turn.runId ? { runId: turn.runId } : {}),
      status: "failed",
      eventCount: turn.eventCount,
      error: { code, message }
    };
    this.runtimeEvents?.emit("run.failed", { ...outcome });
    return outcome;
  }

  private emitError(turn: TurnState, code: ErrorEventCode, message: string): Promise<void> {
    return this.emit(turn, {
      kind: "error",
      payload: {
        code,
        message,
        ...(turn.runId ? { runId: turn.runId } : {})
      }
    });
  }

  private async emit(turn: TurnState, draft: PipelineEventDraft): Promise<void> {
    const { session } = turn;
    await session.lock.run(async () => {
      const event = stampEvent(draft, {
        conversationId: session.conversationId,
        sequenceNo: session.lastSequenceNo + 1,
        timestamp: this.now()
      });
      session.history.append(event);
      session.nextSequenceNo();
      session.touch();
      await this.publish(event);
    });
    turn.eventCount += 1;
  }
}
