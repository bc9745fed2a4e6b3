import { PipelineError } from "./errors.js";
import type { JsonValue } from "./types.js";

export type TerminalRunStatus = "completed" | "failed" | "cancelled" | "expired" | "incomplete";

export type PipelineEventKind = "fragment" | "finalized" | "tool_call" | "status" | "error" | "gap";

interface PipelineEventBase {
  conversationId: string;
  messageId?: string;
  sequenceNo: number;
  timestamp: string;
}

export interface FragmentEvent extends PipelineEventBase {
  kind: "fragment";
  messageId: string;
  payload: {
    text: string;
  };
}

export interface FinalizedEvent extends PipelineEventBase {
  kind: "finalized";
  messageId: string;
  payload: {
    text: string;
  };
}

export interface ToolCallEvent extends PipelineEventBase {
  kind: "tool_call";
  payload: {
    callId: string;
    toolName: string;
    arguments: JsonValue;
    runId: string;
    ok: boolean;
    message: string;
  };
}

export interface StatusEvent extends PipelineEventBase {
  kind: "status";
  payload: {
    runId: string;
    status: TerminalRunStatus;
  };
}

export type ErrorEventCode = "transport_error" | "stream_ended" | "upstream_error";

export interface ErrorEvent extends PipelineEventBase {
  kind: "error";
  payload: {
    code: ErrorEventCode;
    message: string;
    runId?: string;
  };
}

export interface GapEvent extends PipelineEventBase {
  kind: "gap";
  payload: {
    requestedWatermark: number;
    oldestRetained: number;
  };
}

export type PipelineEvent =
  | FragmentEvent
  | FinalizedEvent
  | ToolCallEvent
  | StatusEvent
  | ErrorEvent
  | GapEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Event shape before the router stamps conversation, sequence and time. */
export type PipelineEventDraft = DistributiveOmit<
  Exclude<PipelineEvent, GapEvent>,
  "conversationId" | "sequenceNo" | "timestamp"
>;

export type PipelineEventHandler = (event: PipelineEvent) => void;

const TERMINAL_RUN_STATUSES = new Set<string>(["completed", "failed", "cancelled", "expired", "incomplete"]);

export function isTerminalRunStatus(status: string): status is TerminalRunStatus {
  return TERMINAL_RUN_STATUSES.has(status);
}

export function isTerminalEvent(event: PipelineEvent): boolean {
  return event.kind === "status" || event.kind === "error";
}

export function stampEvent(
  draft: PipelineEventDraft,
  params: { conversationId: string; sequenceNo: number; timestamp: string }
): PipelineEvent {
  const event: PipelineEvent = {
    ...draft,
    conversationId: params.conversationId,
    sequenceNo: params.sequenceNo,
    timestamp: params.timestamp
  };
  Object.freeze(event.payload);
  return Object.freeze(event);
}

export function createGapEvent(params: {
  conversationId: string;
  requestedWatermark: number;
  oldestRetained: number;
  timestamp: string;
}): GapEvent {
  const event: GapEvent = {
    kind: "gap",
    conversationId: params.conversationId,
    sequenceNo: params.oldestRetained - 1,
    timestamp: params.timestamp,
    payload: {
      requestedWatermark: params.requestedWatermark,
      oldestRetained: params.oldestRetained
    }
  };
  Object.freeze(event.payload);
  return Object.freeze(event);
}

export function serializeEvent(event: PipelineEvent): string {
  return JSON.stringify(event);
}

export function conversationIdFor(agentId: string, userId: string): string {
  const agent = agentId.trim();
  const user = userId.trim();
  if (!agent || !user) {
    throw new PipelineError("invalid_input", "agentId and userId are required");
  }
  if (agent.includes(":")) {
    throw new PipelineError("invalid_input", `agentId must not contain ':' (${agent})`);
  }
  return `${agent}:${user}`;
}

export function parseConversationId(conversationId: string): { agentId: string; userId: string } {
  const separator = conversationId.indexOf(":");
  if (separator <= 0 || separator === conversationId.length - 1) {
    throw new PipelineError(
      "invalid_input",
      `Conversation id must look like <agentId>:<userId> (got "${conversationId}")`
    );
  }
  return {
    agentId: conversationId.slice(0, separator),
    userId: conversationId.slice(separator + 1)
  };
}
