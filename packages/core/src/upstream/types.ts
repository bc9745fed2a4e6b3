import type { ToolResultEnvelope } from "../tools/types.js";

export interface ToolCallRequest {
  callId: string;
  toolName: string;
  /** Raw upstream argument text; decoded by the tool invoker. */
  arguments: string;
}

export type RunNotification =
  | {
      type: "run.created";
      runId: string;
      threadId: string;
    }
  | {
      type: "run.requires_action";
      runId: string;
      threadId: string;
      toolCalls: ToolCallRequest[];
    }
  | {
      type: "run.status";
      runId: string;
      threadId: string;
      status: string;
      lastError?: string;
    }
  | {
      type: "message.delta";
      messageId: string;
      threadId?: string;
      text: string;
    }
  | {
      type: "message.completed";
      messageId: string;
      threadId?: string;
      text: string;
    }
  | {
      type: "error";
      message: string;
    }
  | {
      type: "done";
    };

export type RunNotificationType = RunNotification["type"];

/** Finite, single-consumer sequence of notifications for one run segment. */
export type RunEventSource = AsyncIterable<RunNotification>;

export interface ThreadRunGateway {
  ensureThread(agentId: string, userId: string): Promise<string>;
  submitUserMessage(threadId: string, text: string, options: { userId: string }): Promise<string>;
  startRun(threadId: string, agentId: string, options?: { signal?: AbortSignal }): Promise<RunEventSource>;
  submitToolResults(
    threadId: string,
    runId: string,
    results: Record<string, ToolResultEnvelope>,
    options?: { signal?: AbortSignal }
  ): Promise<RunEventSource>;
}
