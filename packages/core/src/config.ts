import type { Channel } from "./channels/types.js";
import type { ConsoleWriter } from "./channels/console.js";
import { DEFAULT_PUBLISH_TIMEOUT_MS } from "./channels/fan-out.js";
import { PipelineError } from "./errors.js";
import { DEFAULT_HISTORY_CAPACITY } from "./history.js";
import { DEFAULT_CONSUMER_MAX_QUEUED } from "./push-stream/queue.js";
import {
  DEFAULT_TOOL_CHARS_PER_TOKEN,
  DEFAULT_TOOL_MAX_OUTPUT_TOKENS,
  DEFAULT_TOOL_TIMEOUT_MS,
  type ToolSource
} from "./tools/invoker.js";
import { DEFAULT_ASSISTANTS_BASE_URL, DEFAULT_REQUEST_TIMEOUT_MS } from "./upstream/assistants-api.js";

export type BuiltInChannelName = "console" | "push";
export type BusyPolicy = "reject" | "queue";

export interface PipelineUpstreamConfig {
  /** Assistant id runs are started against. */
  agentId: string;
  apiKey?: string;
  baseUrl?: string;
  requestTimeoutMs?: number;
  knownThreads?: Record<string, string>;
}

export interface PipelineHistoryConfig {
  capacity?: number;
}

export interface PipelineToolsConfig {
  definitions?: ToolSource;
  /** 0 disables the deadline. */
  timeoutMs?: number;
  maxOutputTokens?: number;
  charsPerToken?: number;
}

export interface PipelineChannelsConfig {
  /** Channel ids in delivery order; `console`, `push`, or the id of a channel in `custom`. */
  active?: string[];
  custom?: Channel[];
  publishTimeoutMs?: number;
  consoleWriter?: ConsoleWriter;
}

export interface PipelinePushConfig {
  enabled?: boolean;
  host?: string;
  port?: number;
  token?: string;
  maxQueued?: number;
  pingMs?: number;
  maxBodyBytes?: number;
}

export interface PipelineRunsConfig {
  busyPolicy?: BusyPolicy;
  /** Waiting turns per conversation under the `queue` policy. */
  maxQueued?: number;
}

export interface PipelineObservabilityConfig {
  enabled?: boolean;
  directory?: string;
  ringSize?: number;
}

export interface PipelineHooks {
  onStart?: () => Promise<void> | void;
  onShutdown?: () => Promise<void> | void;
}

export interface PipelineConfig {
  upstream: PipelineUpstreamConfig;
  /** User id the terminal front ends speak as. */
  userId?: string;
  history?: PipelineHistoryConfig;
  tools?: PipelineToolsConfig;
  channels?: PipelineChannelsConfig;
  push?: PipelinePushConfig;
  runs?: PipelineRunsConfig;
  observability?: PipelineObservabilityConfig;
  hooks?: PipelineHooks;
}

export interface ResolvedPipelineConfig {
  upstream: Required<Omit<PipelineUpstreamConfig, "apiKey">> & { apiKey?: string };
  userId: string;
  history: Required<PipelineHistoryConfig>;
  tools: Required<Omit<PipelineToolsConfig, "definitions">> & { definitions?: ToolSource };
  channels: {
    active: string[];
    custom: Channel[];
    publishTimeoutMs: number;
    consoleWriter?: ConsoleWriter;
  };
  push: Required<Omit<PipelinePushConfig, "token">> & { token?: string };
  runs: Required<PipelineRunsConfig>;
  observability: { enabled: boolean; directory?: string; ringSize: number };
  hooks: PipelineHooks;
}

export const DEFAULT_USER_ID = "local";
export const DEFAULT_ACTIVE_CHANNELS: readonly string[] = ["console"];
export const DEFAULT_PUSH_PORT = 8790;
export const DEFAULT_RUNS_MAX_QUEUED = 8;

export function defineConfig<T extends PipelineConfig>(config: T): T {
  return config;
}

function positiveInteger(value: number | undefined, fallback: number, label: string, allowZero = false): number {
  if (value === undefined) {
    return fallback;
  }
  const minimum = allowZero ? 0 : 1;
  if (!Number.isInteger(value) || value < minimum) {
    throw new PipelineError("invalid_input", `${label} must be an integer >= ${minimum} (got ${value})`);
  }
  return value;
}

export function parseChannelList(value: string): string[] {
  const names: string[] = [];
  for (const part of value.split(",")) {
    const name = part.trim().toLowerCase();
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

export function resolvePipelineConfig(config: PipelineConfig): ResolvedPipelineConfig {
  const agentId = config.upstream.agentId.trim();
  if (!agentId) {
    throw new PipelineError("invalid_input", "upstream.agentId is required");
  }

  const push = config.push ?? {};
  return {
    upstream: {
      agentId,
      apiKey: config.upstream.apiKey?.trim() || undefined,
      baseUrl: config.upstream.baseUrl?.trim() || DEFAULT_ASSISTANTS_BASE_URL,
      requestTimeoutMs: positiveInteger(
        config.upstream.requestTimeoutMs,
        DEFAULT_REQUEST_TIMEOUT_MS,
        "upstream.requestTimeoutMs"
      ),
      knownThreads: { ...config.upstream.knownThreads }
    },
    userId: config.userId?.trim() || DEFAULT_USER_ID,
    history: {
      capacity: positiveInteger(config.history?.capacity, DEFAULT_HISTORY_CAPACITY, "history.capacity")
    },
    tools: {
      definitions: config.tools?.definitions,
      timeoutMs: positiveInteger(config.tools?.timeoutMs, DEFAULT_TOOL_TIMEOUT_MS, "tools.timeoutMs", true),
      maxOutputTokens: positiveInteger(
        config.tools?.maxOutputTokens,
        DEFAULT_TOOL_MAX_OUTPUT_TOKENS,
        "tools.maxOutputTokens"
      ),
      charsPerToken: positiveInteger(config.tools?.charsPerToken, DEFAULT_TOOL_CHARS_PER_TOKEN, "tools.charsPerToken")
    },
    channels: {
      active: config.channels?.active
        ? parseChannelList(config.channels.active.join(","))
        : [...DEFAULT_ACTIVE_CHANNELS],
      custom: [...(config.channels?.custom ?? [])],
      publishTimeoutMs: positiveInteger(
        config.channels?.publishTimeoutMs,
        DEFAULT_PUBLISH_TIMEOUT_MS,
        "channels.publishTimeoutMs",
        true
      ),
      consoleWriter: config.channels?.consoleWriter
    },
    push: {
      enabled: push.enabled ?? false,
      host: push.host?.trim() || "127.0.0.1",
      port: positiveInteger(push.port, DEFAULT_PUSH_PORT, "push.port", true),
      token: push.token?.trim() || undefined,
      maxQueued: positiveInteger(push.maxQueued, DEFAULT_CONSUMER_MAX_QUEUED, "push.maxQueued"),
      pingMs: positiveInteger(push.pingMs, 15_000, "push.pingMs"),
      maxBodyBytes: positiveInteger(push.maxBodyBytes, 512_000, "push.maxBodyBytes")
    },
    runs: {
      busyPolicy: config.runs?.busyPolicy ?? "reject",
      maxQueued: positiveInteger(config.runs?.maxQueued, DEFAULT_RUNS_MAX_QUEUED, "runs.maxQueued", true)
    },
    observability: {
      enabled: config.observability?.enabled ?? false,
      directory: config.observability?.directory,
      ringSize: positiveInteger(config.observability?.ringSize, 200, "observability.ringSize")
    },
    hooks: { ...config.hooks }
  };
}
