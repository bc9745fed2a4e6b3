export { createPipeline, PipelineRuntime } from "./pipeline.js";
export type { PipelineDependencies, PipelineState, PipelineStatus, SubmittedRun } from "./pipeline.js";

export {
  defineConfig,
  resolvePipelineConfig,
  parseChannelList,
  DEFAULT_ACTIVE_CHANNELS,
  DEFAULT_PUSH_PORT,
  DEFAULT_RUNS_MAX_QUEUED,
  DEFAULT_USER_ID
} from "./config.js";
export type {
  BuiltInChannelName,
  BusyPolicy,
  PipelineConfig,
  PipelineUpstreamConfig,
  PipelineHistoryConfig,
  PipelineToolsConfig,
  PipelineChannelsConfig,
  PipelinePushConfig,
  PipelineRunsConfig,
  PipelineObservabilityConfig,
  PipelineHooks,
  ResolvedPipelineConfig
} from "./config.js";

export { PipelineError, GatewayTransportError, isPipelineError } from "./errors.js";
export type { PipelineErrorCode } from "./errors.js";

export {
  isTerminalEvent,
  isTerminalRunStatus,
  serializeEvent,
  stampEvent,
  createGapEvent,
  conversationIdFor,
  parseConversationId
} from "./events.js";
export type {
  PipelineEvent,
  PipelineEventKind,
  PipelineEventDraft,
  PipelineEventHandler,
  FragmentEvent,
  FinalizedEvent,
  ToolCallEvent,
  StatusEvent,
  ErrorEvent,
  ErrorEventCode,
  GapEvent,
  TerminalRunStatus
} from "./events.js";

export { RollingEventHistory, DEFAULT_HISTORY_CAPACITY } from "./history.js";
export type { HistoryGap, HistoryReplay } from "./history.js";

export { SerialLock, ConversationSession, SessionRegistry } from "./sessions.js";
export type { ConversationSnapshot, RunState } from "./sessions.js";

export {
  defineTool,
  toolFromFunction,
  asToolDefinition,
  validateToolInput,
  executeToolDefinition,
  ToolInvoker,
  parseToolArguments,
  serializeEnvelope,
  truncateTail,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_TOOL_MAX_OUTPUT_TOKENS,
  DEFAULT_TOOL_CHARS_PER_TOKEN
} from "./tools.js";
export type {
  ToolContext,
  ToolDefinition,
  ToolDefinitionSpec,
  ToolExecutionResult,
  ToolFailure,
  ToolFunction,
  ToolFunctionMap,
  ToolInvocation,
  ToolInvokerOptions,
  ToolParameterSchema,
  ToolResultEnvelope,
  ToolSource,
  ToolValidationIssue
} from "./tools.js";

export { AssistantsApiGateway, normalizeAssistantsEvent, DEFAULT_ASSISTANTS_BASE_URL } from "./upstream/assistants-api.js";
export type { AssistantsApiGatewayOptions } from "./upstream/assistants-api.js";
export { readSseEvents } from "./upstream/http.js";
export type { FetchLike, SseEvent } from "./upstream/http.js";
export type {
  RunEventSource,
  RunNotification,
  RunNotificationType,
  ThreadRunGateway,
  ToolCallRequest
} from "./upstream/types.js";

export { EventRouter } from "./router/router.js";
export type { ConversationIdentity, EventRouterOptions, IdentityResolver, RunOutcome } from "./router/router.js";

export { ChannelFanOut, DEFAULT_CHANNEL_MAX_PENDING, DEFAULT_PUBLISH_TIMEOUT_MS } from "./channels/fan-out.js";
export { ConsoleChannel, formatConsoleLine } from "./channels/console.js";
export type { ConsoleWriter } from "./channels/console.js";
export { PushStreamChannel } from "./channels/push-stream.js";
export type { Channel, ChannelDiagnostics, ChannelOutcome } from "./channels/types.js";

export { ConsumerQueue, DEFAULT_CONSUMER_MAX_QUEUED } from "./push-stream/queue.js";
export type { QueueCloseReason } from "./push-stream/queue.js";
export { PushStreamMultiplexer } from "./push-stream/multiplexer.js";
export { PushStreamServer, formatSseFrame } from "./push-stream/server.js";
export type { PushStreamBackend, PushStreamServerOptions } from "./push-stream/server.js";

export { RuntimeEventLog, redactRuntimeEvent } from "./observability.js";
export type { RuntimeEvent, RuntimeEventListener, RuntimeEventType } from "./observability.js";

export type { JsonValue, JsonObject } from "./types.js";
export { toJsonValue, isJsonObject } from "./types.js";
