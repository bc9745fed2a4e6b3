import { errorMessage } from "../helpers.js";
import { normalizeValidationIssues } from "./definition.js";
import type {
  ToolContext,
  ToolDefinition,
  ToolExecutionResult,
  ToolValidationError
} from "./types.js";

export function validateToolInput(
  tool: ToolDefinition,
  input: unknown
):
  | {
      ok: true;
      value: unknown;
    }
  | {
      ok: false;
      error: ToolValidationError;
    } {
  if (!tool.parameters) {
    return {
      ok: true,
      value: input
    };
  }

  const parsed = tool.parameters.safeParse(input);
  if (parsed.success) {
    return {
      ok: true,
      value: parsed.data
    };
  }

  const issues = normalizeValidationIssues(parsed.error);
  const first = issues[0];
  return {
    ok: false,
    error: {
      code: "validation_error",
      message: first ? (first.path === "$" ? first.message : `${first.path}: ${first.message}`) : errorMessage(parsed.error),
      issues
    }
  };
}

export async function executeToolDefinition(params: {
  tool: ToolDefinition;
  input: unknown;
  context: ToolContext;
  timeoutMs?: number;
}): Promise<ToolExecutionResult> {
  const validation = validateToolInput(params.tool, params.input);
  if (!validation.ok) {
    return {
      ok: false,
      error: validation.error
    };
  }

  const timeoutMs = params.timeoutMs ?? 0;
  let timer: NodeJS.Timeout | undefined;
  try {
    const execution = Promise.resolve().then(() => params.tool.execute(validation.value, params.context));
    if (timeoutMs <= 0) {
      return {
        ok: true,
        output: await execution
      };
    }
    const timedOut = Symbol("timeout");
    const deadline = new Promise<typeof timedOut>((resolve) => {
      timer = setTimeout(() => resolve(timedOut), timeoutMs);
    });
    const output = await Promise.race([execution, deadline]);
    if (output === timedOut) {
      return {
        ok: false,
        error: {
          code: "timeout",
          message: `tool ${params.tool.name} timed out after ${timeoutMs}ms`
        }
      };
    }
    return {
      ok: true,
      output
    };
  } catch (error) {
    return {
      ok: false,
      error: {
        code: "execution_error",
        message: errorMessage(error)
      }
    };
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
