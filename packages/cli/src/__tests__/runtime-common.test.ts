import { describe, expect, it } from "vitest";
import type { Channel, PipelineConfig } from "@threadline/core";
import type { LoadedCliConfig } from "../config.js";
import { createCliPipeline, formatRuntimeEvent, resolveCliChannels } from "../runtime-common.js";

function loadedConfig(overrides: Partial<PipelineConfig> = {}, redisUrl?: string): LoadedCliConfig {
  return {
    projectRoot: "/tmp/threadline-project",
    configPath: null,
    pipelineConfig: {
      upstream: { agentId: "asst_1", apiKey: "test-secret" },
      ...overrides
    },
    ...(redisUrl ? { redisUrl } : {})
  };
}

describe("resolveCliChannels", () => {
  it("swaps console for push in the terminal UI and drops it when serving", () => {
    const loaded = loadedConfig({ channels: { active: ["console", "redis"] } });

    expect(resolveCliChannels(loaded, "plain")).toEqual(["console", "redis"]);
    expect(resolveCliChannels(loaded, "tui")).toEqual(["redis", "push"]);
    expect(resolveCliChannels(loaded, "serve")).toEqual(["redis"]);
  });

  it("defaults to the console channel", () => {
    expect(resolveCliChannels(loadedConfig(), "plain")).toEqual(["console"]);
    expect(resolveCliChannels(loadedConfig(), "tui")).toEqual(["push"]);
  });
});

describe("createCliPipeline", () => {
  it("warns when the redis channel has no URL", () => {
    const { pipeline, warnings } = createCliPipeline(loadedConfig({ channels: { active: ["redis"] } }), {
      mode: "plain"
    });

    expect(warnings).toEqual(["channel redis is active but THREADLINE_REDIS_URL is not set"]);
    expect(pipeline.getStatus().channels).toEqual([]);
  });

  it("builds the redis channel from the configured URL", () => {
    const urls: string[] = [];
    const channel: Channel = { id: "redis", publish: () => undefined };

    const { pipeline, warnings } = createCliPipeline(
      loadedConfig({ channels: { active: ["redis"] } }, "redis://127.0.0.1:6379"),
      {
        mode: "plain",
        createRedisChannel: (url) => {
          urls.push(url);
          return channel;
        }
      }
    );

    expect(warnings).toEqual([]);
    expect(urls).toEqual(["redis://127.0.0.1:6379"]);
    expect(pipeline.getStatus().channels).toEqual(["redis"]);
  });

  it("enables the push server when serving", () => {
    const { pipeline } = createCliPipeline(loadedConfig(), { mode: "serve" });

    expect(pipeline.config.push.enabled).toBe(true);
    expect(pipeline.getStatus().channels).toEqual(["push"]);
  });
});

describe("formatRuntimeEvent", () => {
  it("prints payload keys in order and truncates long values", () => {
    expect(
      formatRuntimeEvent({
        type: "run.rejected",
        timestamp: "2026-01-01T00:00:00.000Z",
        payload: { reason: "run_active", conversationId: "asst_1:alice", meta: { queued: 1 } }
      })
    ).toBe(
      '[threadline][event] 2026-01-01T00:00:00.000Z run.rejected conversationId=asst_1:alice meta={"queued":1} reason=run_active'
    );

    const line = formatRuntimeEvent({
      type: "channel.unknown",
      timestamp: "2026-01-01T00:00:00.000Z",
      payload: { name: "x".repeat(300) }
    });
    expect(line).toBe(`[threadline][event] 2026-01-01T00:00:00.000Z channel.unknown name=${"x".repeat(217)}...`);
  });
});
