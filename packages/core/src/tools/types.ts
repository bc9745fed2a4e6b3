import type { JsonValue } from "../types.js";

export interface ToolContext {
  conversationId: string;
  runId: string;
  callId: string;
  signal?: AbortSignal;
}

export interface ToolValidationIssue {
  path: string;
  message: string;
  code?: string;
}

export interface ToolValidationError {
  code: "validation_error";
  message: string;
  issues: ToolValidationIssue[];
}

export interface ToolExecutionError {
  code: "execution_error";
  message: string;
}

export interface ToolTimeoutError {
  code: "timeout";
  message: string;
}

export type ToolFailure = ToolValidationError | ToolExecutionError | ToolTimeoutError;

export interface ToolParameterSchema<TInput = unknown> {
  safeParse: (
    input: unknown
  ) =>
    | {
        success: true;
        data: TInput;
      }
    | {
        success: false;
        error: unknown;
      };
}

export interface ToolDefinitionSpec<TInput = unknown, TOutput = unknown> {
  name: string;
  description?: string;
  parameters?: ToolParameterSchema<TInput>;
  execute(input: TInput, context: ToolContext): Promise<TOutput> | TOutput;
}

export type ToolDefinition = ToolDefinitionSpec<unknown, unknown>;

/** Bare callables accepted in place of definitions; no argument validation. */
export type ToolFunction = (args: unknown, context: ToolContext) => unknown;

export type ToolFunctionMap = Record<string, ToolFunction>;

export type ToolExecutionResult =
  | {
      ok: true;
      output: unknown;
    }
  | {
      ok: false;
      error: ToolFailure;
    };

/** Result shape submitted upstream for every tool call. */
export interface ToolResultEnvelope {
  status: boolean;
  message: string;
  result: JsonValue | null;
}

export interface ToolInvocation {
  callId: string;
  toolName: string;
  /** Raw JSON string as delivered upstream, or already-decoded data. */
  arguments: unknown;
}
