import { RedisChannel } from "@threadline/channel-redis";
import {
  createPipeline,
  type Channel,
  type PipelineDependencies,
  type PipelineRuntime,
  type RuntimeEvent
} from "@threadline/core";
import type { LoadedCliConfig } from "./config.js";

export type CliMode = "plain" | "tui" | "serve";

export interface CliPipelineOptions {
  mode: CliMode;
  consoleWriter?: { write: (text: string) => unknown };
  /** Builds the `redis` channel; defaults to an ioredis-backed `RedisChannel`. */
  createRedisChannel?: (url: string) => Channel;
}

export interface CliPipeline {
  pipeline: PipelineRuntime;
  warnings: string[];
}

export function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

function truncateText(value: string, max = 220): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, Math.max(0, max - 3))}...`;
}

function summarizeValue(value: unknown): string {
  if (typeof value === "string") {
    return truncateText(value);
  }
  if (typeof value === "number" || typeof value === "boolean" || value === null || value === undefined) {
    return String(value);
  }
  try {
    return truncateText(JSON.stringify(value));
  } catch {
    return truncateText(String(value));
  }
}

export function formatRuntimeEvent(event: RuntimeEvent): string {
  const keys = Object.keys(event.payload).sort((left, right) => left.localeCompare(right));
  const payloadSummary = keys.map((key) => `${key}=${summarizeValue(event.payload[key])}`).join(" ");
  return `[threadline][event] ${event.timestamp} ${event.type}${payloadSummary ? ` ${payloadSummary}` : ""}`;
}

/**
 * Picks the channel set for a front end: the Ink UI reads through the push
 * multiplexer instead of stdout, and `serve` always opens the push server.
 */
export function resolveCliChannels(loaded: LoadedCliConfig, mode: CliMode): string[] {
  const active = [...(loaded.pipelineConfig.channels?.active ?? ["console"])];
  if (mode === "tui") {
    const withoutConsole = active.filter((name) => name !== "console");
    return withoutConsole.includes("push") ? withoutConsole : [...withoutConsole, "push"];
  }
  if (mode === "serve") {
    return active.filter((name) => name !== "console");
  }
  return active;
}

export function createCliPipeline(
  loaded: LoadedCliConfig,
  options: CliPipelineOptions,
  deps: PipelineDependencies = {}
): CliPipeline {
  const warnings: string[] = [];
  const active = resolveCliChannels(loaded, options.mode);
  const custom = [...(loaded.pipelineConfig.channels?.custom ?? [])];

  if (active.includes("redis") && !custom.some((channel) => channel.id === "redis")) {
    if (loaded.redisUrl) {
      const build = options.createRedisChannel ?? ((url: string) => new RedisChannel({ url }));
      custom.push(build(loaded.redisUrl));
    } else {
      warnings.push("channel redis is active but THREADLINE_REDIS_URL is not set");
    }
  }

  const pipeline = createPipeline(
    {
      ...loaded.pipelineConfig,
      channels: {
        ...loaded.pipelineConfig.channels,
        active,
        custom,
        consoleWriter: options.consoleWriter
      },
      push: {
        ...loaded.pipelineConfig.push,
        enabled: options.mode === "serve" || (loaded.pipelineConfig.push?.enabled ?? false)
      }
    },
    deps
  );
  return { pipeline, warnings };
}
