import type {
  ToolDefinition,
  ToolDefinitionSpec,
  ToolFunction,
  ToolParameterSchema,
  ToolValidationIssue
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function isSchemaLike(value: unknown): value is ToolParameterSchema {
  return isRecord(value) && typeof value.safeParse === "function";
}

export function defineTool<TInput = unknown, TOutput = unknown>(
  tool: ToolDefinitionSpec<TInput, TOutput>
): ToolDefinition {
  return tool;
}

export function toolFromFunction(name: string, fn: ToolFunction): ToolDefinition {
  return defineTool({
    name,
    execute: (input, context) => fn(input, context)
  });
}

function isToolDefinition(value: unknown): value is ToolDefinition {
  if (!isRecord(value)) {
    return false;
  }
  if (typeof value.name !== "string" || value.name.trim().length === 0) {
    return false;
  }
  if (typeof value.execute !== "function") {
    return false;
  }
  return value.parameters === undefined || isSchemaLike(value.parameters);
}

export function asToolDefinition(value: unknown): ToolDefinition | null {
  if (!isToolDefinition(value)) {
    return null;
  }
  return {
    name: value.name.trim(),
    description: typeof value.description === "string" ? value.description : undefined,
    parameters: value.parameters,
    execute: value.execute
  };
}

export function normalizeValidationIssues(error: unknown): ToolValidationIssue[] {
  if (!isRecord(error) || !Array.isArray(error.issues)) {
    return [];
  }

  const normalized: ToolValidationIssue[] = [];
  for (const issue of error.issues) {
    if (!isRecord(issue)) {
      continue;
    }
    const pathParts = Array.isArray(issue.path) ? issue.path.map((part) => String(part)) : [];
    normalized.push({
      path: pathParts.length > 0 ? pathParts.join(".") : "$",
      message: typeof issue.message === "string" ? issue.message : "Invalid value",
      code: typeof issue.code === "string" ? issue.code : undefined
    });
  }
  return normalized;
}
