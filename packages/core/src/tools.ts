export { asToolDefinition, defineTool, isSchemaLike, normalizeValidationIssues, toolFromFunction } from "./tools/definition.js";
export { executeToolDefinition, validateToolInput } from "./tools/execution.js";
export {
  DEFAULT_TOOL_CHARS_PER_TOKEN,
  DEFAULT_TOOL_MAX_OUTPUT_TOKENS,
  DEFAULT_TOOL_TIMEOUT_MS,
  ToolInvoker,
  parseToolArguments,
  serializeEnvelope
} from "./tools/invoker.js";
export type { ParsedToolArguments, ToolInvokerOptions, ToolSource } from "./tools/invoker.js";
export { truncateTail } from "./tools/truncation.js";
export type {
  ToolContext,
  ToolDefinition,
  ToolDefinitionSpec,
  ToolExecutionResult,
  ToolFailure,
  ToolFunction,
  ToolFunctionMap,
  ToolInvocation,
  ToolParameterSchema,
  ToolResultEnvelope,
  ToolValidationIssue
} from "./tools/types.js";
