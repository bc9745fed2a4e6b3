import { z } from "zod";
import { GatewayTransportError, PipelineError } from "../errors.js";
import type { RuntimeEventLog } from "../observability.js";
import { serializeEnvelope } from "../tools/invoker.js";
import type { ToolResultEnvelope } from "../tools/types.js";
import {
  openSseStream,
  requestJsonWithTimeout,
  upstreamErrorMessage,
  type FetchLike,
  type JsonHttpResponse,
  type SseEvent
} from "./http.js";
import type { RunEventSource, RunNotification, ThreadRunGateway } from "./types.js";

export const DEFAULT_ASSISTANTS_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface AssistantsApiGatewayOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
  requestTimeoutMs?: number;
  /** Threads known from an earlier process, keyed `<agentId>:<userId>`. Validated before first use. */
  knownThreads?: Record<string, string>;
  runtimeEvents?: RuntimeEventLog;
}

const idSchema = z.object({ id: z.string().min(1) });

const runSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  status: z.string(),
  last_error: z.object({ message: z.string() }).nullish(),
  required_action: z
    .object({
      submit_tool_outputs: z.object({
        tool_calls: z.array(
          z.object({
            id: z.string(),
            function: z.object({
              name: z.string(),
              arguments: z.string().default("")
            })
          })
        )
      })
    })
    .nullish()
});

const textContentSchema = z.array(
  z.object({
    type: z.string(),
    text: z.object({ value: z.string().default("") }).optional()
  })
);

const messageDeltaSchema = z.object({
  id: z.string(),
  delta: z.object({
    content: textContentSchema.default([])
  })
});

const messageCompletedSchema = z.object({
  id: z.string(),
  thread_id: z.string().optional(),
  content: textContentSchema.default([])
});

function joinText(content: z.infer<typeof textContentSchema>): string {
  return content
    .filter((part) => part.type === "text")
    .map((part) => part.text?.value ?? "")
    .join("");
}

function parseData(event: SseEvent): unknown {
  try {
    return JSON.parse(event.data);
  } catch {
    return null;
  }
}

/** Maps one Assistants v2 stream event to a notification; `null` for events the pipeline ignores. */
export function normalizeAssistantsEvent(event: SseEvent): RunNotification | null {
  if (event.event === "done" || event.data === "[DONE]") {
    return { type: "done" };
  }

  if (event.event === "error") {
    return {
      type: "error",
      message: upstreamErrorMessage(parseData(event), event.data || "upstream stream error")
    };
  }

  if (event.event.startsWith("thread.run.step.")) {
    return null;
  }

  if (event.event.startsWith("thread.run.")) {
    const parsed = runSchema.safeParse(parseData(event));
    if (!parsed.success) {
      return { type: "error", message: `malformed ${event.event} payload` };
    }
    const run = parsed.data;
    if (event.event === "thread.run.created") {
      return { type: "run.created", runId: run.id, threadId: run.thread_id };
    }
    if (event.event === "thread.run.requires_action") {
      return {
        type: "run.requires_action",
        runId: run.id,
        threadId: run.thread_id,
        toolCalls: (run.required_action?.submit_tool_outputs.tool_calls ?? []).map((call) => ({
          callId: call.id,
          toolName: call.function.name,
          arguments: call.function.arguments
        }))
      };
    }
    return {
      type: "run.status",
      runId: run.id,
      threadId: run.thread_id,
      status: run.status,
      ...(run.last_error ? { lastError: run.last_error.message } : {})
    };
  }

  if (event.event === "thread.message.delta") {
    const parsed = messageDeltaSchema.safeParse(parseData(event));
    if (!parsed.success) {
      return { type: "error", message: "malformed thread.message.delta payload" };
    }
    const text = joinText(parsed.data.delta.content);
    return text.length > 0 ? { type: "message.delta", messageId: parsed.data.id, text } : null;
  }

  if (event.event === "thread.message.completed") {
    const parsed = messageCompletedSchema.safeParse(parseData(event));
    if (!parsed.success) {
      return { type: "error", message: "malformed thread.message.completed payload" };
    }
    return {
      type: "message.completed",
      messageId: parsed.data.id,
      ...(parsed.data.thread_id ? { threadId: parsed.data.thread_id } : {}),
      text: joinText(parsed.data.content)
    };
  }

  return null;
}

async function* toNotifications(events: AsyncGenerator<SseEvent>): AsyncGenerator<RunNotification> {
  for await (const event of events) {
    const notification = normalizeAssistantsEvent(event);
    if (!notification) {
      continue;
    }
    yield notification;
    if (notification.type === "done") {
      return;
    }
  }
}

interface CachedThread {
  threadId: string;
  validated: boolean;
}

export class AssistantsApiGateway implements ThreadRunGateway {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly requestTimeoutMs: number;
  private readonly runtimeEvents?: RuntimeEventLog;
  private readonly threads = new Map<string, CachedThread>();
  private readonly pendingThreads = new Map<string, Promise<string>>();

  constructor(options: AssistantsApiGatewayOptions) {
    if (!options.apiKey.trim()) {
      throw new PipelineError("invalid_input", "An API key is required for the assistants gateway");
    }
    this.apiKey = options.apiKey.trim();
    this.baseUrl = (options.baseUrl ?? DEFAULT_ASSISTANTS_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.runtimeEvents = options.runtimeEvents;
    for (const [key, threadId] of Object.entries(options.knownThreads ?? {})) {
      this.threads.set(key, { threadId, validated: false });
    }
  }

  ensureThread(agentId: string, userId: string): Promise<string> {
    const key = `${agentId}:${userId}`;
    const cached = this.threads.get(key);
    if (cached?.validated) {
      return Promise.resolve(cached.threadId);
    }
    const pending = this.pendingThreads.get(key);
    if (pending) {
      return pending;
    }
    const resolution = this.resolveThread(key, agentId, userId).finally(() => {
      this.pendingThreads.delete(key);
    });
    this.pendingThreads.set(key, resolution);
    return resolution;
  }

  async submitUserMessage(threadId: string, text: string, options: { userId: string }): Promise<string> {
    if (text.trim().length === 0) {
      throw new PipelineError("invalid_input", "Message text must not be empty");
    }
    const response = await this.request("POST", `/threads/${encodeURIComponent(threadId)}/messages`, {
      role: "user",
      content: text,
      metadata: {
        user_id: options.userId
      }
    });
    return this.expectId(response, "create message");
  }

  async startRun(threadId: string, agentId: string, options: { signal?: AbortSignal } = {}): Promise<RunEventSource> {
    const events = await openSseStream({
      fetchImpl: this.fetchImpl,
      url: `${this.baseUrl}/threads/${encodeURIComponent(threadId)}/runs`,
      headers: this.headers(),
      body: {
        assistant_id: agentId,
        stream: true
      },
      timeoutMs: this.requestTimeoutMs,
      signal: options.signal
    });
    return toNotifications(events);
  }

  async submitToolResults(
    threadId: string,
    runId: string,
    results: Record<string, ToolResultEnvelope>,
    options: { signal?: AbortSignal } = {}
  ): Promise<RunEventSource> {
    const events = await openSseStream({
      fetchImpl: this.fetchImpl,
      url: `${this.baseUrl}/threads/${encodeURIComponent(threadId)}/runs/${encodeURIComponent(runId)}/submit_tool_outputs`,
      headers: this.headers(),
      body: {
        tool_outputs: Object.entries(results).map(([callId, envelope]) => ({
          tool_call_id: callId,
          output: serializeEnvelope(envelope)
        })),
        stream: true
      },
      timeoutMs: this.requestTimeoutMs,
      signal: options.signal
    });
    return toNotifications(events);
  }

  private async resolveThread(key: string, agentId: string, userId: string): Promise<string> {
    const cached = this.threads.get(key);
    if (cached) {
      const response = await this.request("GET", `/threads/${encodeURIComponent(cached.threadId)}`);
      if (response.status >= 200 && response.status < 300) {
        cached.validated = true;
        return cached.threadId;
      }
      if (response.status !== 404) {
        throw this.failure(response, "retrieve thread");
      }
      this.threads.delete(key);
      this.runtimeEvents?.emit("gateway.thread.invalid", { key, threadId: cached.threadId });
    }

    const created = await this.request("POST", "/threads", {
      metadata: {
        user_id: userId,
        agent_id: agentId
      }
    });
    const threadId = this.expectId(created, "create thread");
    this.threads.set(key, { threadId, validated: true });
    this.runtimeEvents?.emit("gateway.thread.created", { key, threadId });
    return threadId;
  }

  private headers(): Record<string, string> {
    return {
      authorization: `Bearer ${this.apiKey}`,
      "OpenAI-Beta": "assistants=v2"
    };
  }

  private request(method: "GET" | "POST", route: string, body?: Record<string, unknown>): Promise<JsonHttpResponse> {
    return requestJsonWithTimeout({
      fetchImpl: this.fetchImpl,
      method,
      url: `${this.baseUrl}${route}`,
      headers: this.headers(),
      body,
      timeoutMs: this.requestTimeoutMs
    });
  }

  private expectId(response: JsonHttpResponse, action: string): string {
    if (response.status < 200 || response.status >= 300) {
      throw this.failure(response, action);
    }
    const parsed = idSchema.safeParse(response.json);
    if (!parsed.success) {
      throw new GatewayTransportError(`${action}: response carried no id`, { status: response.status });
    }
    return parsed.data.id;
  }

  private failure(response: JsonHttpResponse, action: string): GatewayTransportError {
    return new GatewayTransportError(
      `${action} failed: ${upstreamErrorMessage(response.json, `HTTP ${response.status}`)}`,
      { status: response.status }
    );
  }
}
