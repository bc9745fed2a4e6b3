import { PipelineError } from "../errors.js";
import type { RuntimeEventLog } from "../observability.js";
import { toJsonValue, type JsonValue } from "../types.js";
import { asToolDefinition, toolFromFunction } from "./definition.js";
import { executeToolDefinition } from "./execution.js";
import { truncateTail } from "./truncation.js";
import type {
  ToolContext,
  ToolDefinition,
  ToolFunctionMap,
  ToolInvocation,
  ToolResultEnvelope
} from "./types.js";

export const DEFAULT_TOOL_TIMEOUT_MS = 60_000;
export const DEFAULT_TOOL_MAX_OUTPUT_TOKENS = 124_000;
export const DEFAULT_TOOL_CHARS_PER_TOKEN = 4;

export type ToolSource = ToolDefinition[] | ToolFunctionMap;

export interface ToolInvokerOptions {
  tools?: ToolSource;
  /** 0 disables the per-call deadline. */
  timeoutMs?: number;
  maxOutputTokens?: number;
  charsPerToken?: number;
  runtimeEvents?: RuntimeEventLog;
}

export type ParsedToolArguments =
  | {
      ok: true;
      value: JsonValue;
    }
  | {
      ok: false;
      raw: string;
    };

export function parseToolArguments(raw: unknown): ParsedToolArguments {
  if (typeof raw !== "string") {
    return {
      ok: true,
      value: raw === undefined ? {} : toJsonValue(raw)
    };
  }
  if (raw.trim().length === 0) {
    return {
      ok: true,
      value: {}
    };
  }
  try {
    return {
      ok: true,
      value: toJsonValue(JSON.parse(raw))
    };
  } catch {
    return {
      ok: false,
      raw
    };
  }
}

export function serializeEnvelope(envelope: ToolResultEnvelope): string {
  return JSON.stringify({
    status: envelope.status,
    message: envelope.message,
    result: envelope.result
  });
}

function failure(message: string): ToolResultEnvelope {
  return {
    status: false,
    message,
    result: null
  };
}

function collectDefinitions(source: ToolSource | undefined): ToolDefinition[] {
  if (!source) {
    return [];
  }
  if (Array.isArray(source)) {
    return source.map((entry) => {
      const tool = asToolDefinition(entry);
      if (!tool) {
        throw new PipelineError("invalid_input", "Tool definitions need a non-empty name and an execute function");
      }
      return tool;
    });
  }
  return Object.entries(source).map(([name, fn]) => toolFromFunction(name, fn));
}

export class ToolInvoker {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly timeoutMs: number;
  private readonly maxOutputChars: number;
  private readonly runtimeEvents?: RuntimeEventLog;

  constructor(options: ToolInvokerOptions = {}) {
    for (const tool of collectDefinitions(options.tools)) {
      if (this.tools.has(tool.name)) {
        throw new PipelineError("invalid_input", `Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    this.timeoutMs = Math.max(0, options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS);
    this.maxOutputChars =
      Math.max(1, options.maxOutputTokens ?? DEFAULT_TOOL_MAX_OUTPUT_TOKENS) *
      Math.max(1, options.charsPerToken ?? DEFAULT_TOOL_CHARS_PER_TOKEN);
    this.runtimeEvents = options.runtimeEvents;
  }

  has(toolName: string): boolean {
    return this.tools.has(toolName);
  }

  listNames(): string[] {
    return Array.from(this.tools.keys()).sort((left, right) => left.localeCompare(right));
  }

  /** Never rejects; every failure mode maps to an envelope with `status: false`. */
  async invoke(call: ToolInvocation, context: Omit<ToolContext, "callId">): Promise<ToolResultEnvelope> {
    const startedAt = Date.now();
    const eventBase = {
      conversationId: context.conversationId,
      runId: context.runId,
      callId: call.callId,
      toolName: call.toolName
    };
    this.runtimeEvents?.emit("tool.call.started", eventBase);

    const envelope = await this.resolve(call, { ...context, callId: call.callId });
    const durationMs = Date.now() - startedAt;
    if (envelope.status) {
      this.runtimeEvents?.emit("tool.call.completed", {
        ...eventBase,
        durationMs,
        truncated: envelope.message !== "Success"
      });
    } else {
      this.runtimeEvents?.emit("tool.call.failed", {
        ...eventBase,
        durationMs,
        message: envelope.message
      });
    }
    return envelope;
  }

  private async resolve(call: ToolInvocation, context: ToolContext): Promise<ToolResultEnvelope> {
    const tool = this.tools.get(call.toolName);
    if (!tool) {
      return failure(`unknown tool: ${call.toolName}`);
    }

    const parsed = parseToolArguments(call.arguments);
    if (!parsed.ok) {
      return failure(`invalid arguments for ${call.toolName}: arguments are not valid JSON`);
    }

    const execution = await executeToolDefinition({
      tool,
      input: parsed.value,
      context,
      timeoutMs: this.timeoutMs
    });
    if (!execution.ok) {
      if (execution.error.code === "validation_error") {
        return failure(`invalid arguments for ${call.toolName}: ${execution.error.message}`);
      }
      return failure(execution.error.message);
    }

    return this.budget(toJsonValue(execution.output));
  }

  private budget(result: JsonValue): ToolResultEnvelope {
    const serialized = typeof result === "string" ? result : JSON.stringify(result);
    if (serialized.length <= this.maxOutputChars) {
      return {
        status: true,
        message: "Success",
        result
      };
    }
    return {
      status: true,
      message: "Success (truncated)",
      result: truncateTail(serialized, this.maxOutputChars)
    };
  }
}
