import { describe, expect, it } from "vitest";
import type { PipelineEvent } from "../events.js";
import { PipelineError } from "../errors.js";
import { createPipeline } from "../pipeline.js";
import { ScriptedGateway, completedRun, deferred } from "./helpers/scripted-gateway.js";

const conversationId = "asst_1:alice";

function captureWriter(): { write: (text: string) => void; text: () => string } {
  const chunks: string[] = [];
  return {
    write: (text: string) => {
      chunks.push(text);
    },
    text: () => chunks.join("")
  };
}

function captureSyncError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected throw");
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected rejection");
}

describe("pipeline runtime", () => {
  it("runs a turn through the console channel", async () => {
    const writer = captureWriter();
    const gateway = new ScriptedGateway([completedRun("run_1", "msg_1", ["He", "llo!"])]);
    const pipeline = createPipeline(
      { upstream: { agentId: "asst_1" }, channels: { active: ["console"], consoleWriter: writer } },
      { gateway }
    );
    await pipeline.start();

    const outcome = await pipeline.handleUserMessage(conversationId, "hi");

    expect(outcome).toEqual({ conversationId, runId: "run_1", status: "completed", eventCount: 4 });
    expect(writer.text()).toBe("Hello!\n[run] run_1 completed\n");
    expect(gateway.messages).toEqual([{ threadId: "thread_1", text: "hi", userId: "alice" }]);
    expect(pipeline.getSession(conversationId)).toMatchObject({ lastSequenceNo: 4, runState: "idle" });
    expect(pipeline.channelDiagnostics()).toEqual([{ channelId: "console", delivered: 4, failed: 0 }]);
    await pipeline.stop();
  });

  it("rejects a second message while a run is active under the reject policy", async () => {
    const gateway = new ScriptedGateway([completedRun("run_1", "msg_1", ["ok"])]);
    const gate = deferred();
    gateway.startRunGate = gate.promise;
    const pipeline = createPipeline({ upstream: { agentId: "asst_1" }, channels: { active: [] } }, { gateway });
    await pipeline.start();

    const first = pipeline.submitUserMessage(conversationId, "one");
    expect(captureSyncError(() => pipeline.submitUserMessage(conversationId, "two"))).toMatchObject({
      code: "run_active"
    });
    expect(pipeline.listRuntimeEvents().map((event) => event.type)).toContain("run.rejected");

    gate.resolve();
    await expect(first.completion).resolves.toMatchObject({ status: "completed", runId: "run_1" });
    await pipeline.stop();
  });

  it("queues turns behind the active run under the queue policy", async () => {
    const gateway = new ScriptedGateway([
      completedRun("run_1", "msg_1", ["one"]),
      completedRun("run_2", "msg_2", ["two"])
    ]);
    const gate = deferred();
    gateway.startRunGate = gate.promise;
    const pipeline = createPipeline(
      { upstream: { agentId: "asst_1" }, channels: { active: [] }, runs: { busyPolicy: "queue", maxQueued: 1 } },
      { gateway }
    );
    await pipeline.start();

    const first = pipeline.handleUserMessage(conversationId, "one");
    const second = pipeline.handleUserMessage(conversationId, "two");
    const overflow = await captureError(pipeline.handleUserMessage(conversationId, "three"));
    expect(overflow).toBeInstanceOf(PipelineError);
    expect(overflow).toMatchObject({ code: "run_active" });

    gate.resolve();
    await expect(first).resolves.toMatchObject({ runId: "run_1", status: "completed" });
    await expect(second).resolves.toMatchObject({ runId: "run_2", status: "completed" });
    expect(gateway.messages.map((message) => message.text)).toEqual(["one", "two"]);
    expect(pipeline.getSession(conversationId)?.lastSequenceNo).toBe(6);
    await pipeline.stop();
  });

  it("backfills an attached consumer from history", async () => {
    const pipeline = createPipeline(
      { upstream: { agentId: "asst_1" }, channels: { active: ["push"] } },
      { gateway: new ScriptedGateway([completedRun("run_1", "msg_1", ["a", "b"])]) }
    );
    await pipeline.start();
    await pipeline.handleUserMessage(conversationId, "hi");

    const queue = await pipeline.attach(conversationId, 2);

    expect(queue.drain().map((event) => [event.sequenceNo, event.kind])).toEqual([
      [3, "finalized"],
      [4, "status"]
    ]);
    await pipeline.detach(queue);
    await pipeline.stop();
  });

  it("delivers to custom channels and reports unknown channel names", async () => {
    const seen: PipelineEvent[] = [];
    const pipeline = createPipeline(
      {
        upstream: { agentId: "asst_1" },
        channels: {
          active: ["Memory", "pager"],
          custom: [{ id: "memory", publish: (event) => void seen.push(event) }]
        }
      },
      { gateway: new ScriptedGateway([completedRun("run_1", "msg_1", ["ok"])]) }
    );

    expect(pipeline.getStatus().channels).toEqual(["memory"]);
    expect(pipeline.listRuntimeEvents()).toContainEqual(
      expect.objectContaining({ type: "channel.unknown", payload: { name: "pager" } })
    );

    await pipeline.start();
    await pipeline.handleUserMessage(conversationId, "hi");
    await pipeline.drainChannels();
    expect(seen.map((event) => event.kind)).toEqual(["fragment", "finalized", "status"]);
    await pipeline.stop();
  });

  it("keeps push delivery moving while another channel hangs", async () => {
    const calls: number[] = [];
    const pipeline = createPipeline(
      {
        upstream: { agentId: "asst_1" },
        channels: {
          active: ["stalled", "push"],
          custom: [
            {
              id: "stalled",
              publish: (event) => {
                calls.push(event.sequenceNo);
                return new Promise<void>(() => undefined);
              }
            }
          ],
          publishTimeoutMs: 1_000
        }
      },
      { gateway: new ScriptedGateway([completedRun("run_1", "msg_1", ["He", "llo!"])]) }
    );
    await pipeline.start();
    const queue = await pipeline.attach(conversationId, 0);

    const started = Date.now();
    const outcome = await pipeline.handleUserMessage(conversationId, "hi");

    expect(outcome).toMatchObject({ status: "completed", eventCount: 4 });
    expect(Date.now() - started).toBeLessThan(900);
    expect(queue.drain().map((event) => event.sequenceNo)).toEqual([1, 2, 3, 4]);
    expect(calls).toEqual([1]);
    expect(pipeline.channelDiagnostics()).toEqual([
      { channelId: "stalled", delivered: 0, failed: 0 },
      { channelId: "push", delivered: 4, failed: 0 }
    ]);
    await pipeline.stop();
  });

  it("rejects queued turns and new messages once stopped", async () => {
    const gateway = new ScriptedGateway([completedRun("run_1", "msg_1", ["ok"])]);
    const gate = deferred();
    gateway.startRunGate = gate.promise;
    const shutdownCalls: string[] = [];
    const pipeline = createPipeline(
      {
        upstream: { agentId: "asst_1" },
        channels: { active: [] },
        runs: { busyPolicy: "queue" },
        hooks: { onShutdown: () => void shutdownCalls.push("shutdown") }
      },
      { gateway }
    );
    await pipeline.start();

    const first = pipeline.submitUserMessage(conversationId, "one");
    const queued = captureError(pipeline.handleUserMessage(conversationId, "two"));
    const stopping = pipeline.stop();
    gate.resolve();
    await stopping;

    expect(await queued).toMatchObject({ code: "closed" });
    await expect(first.completion).resolves.toMatchObject({ conversationId });
    expect(captureSyncError(() => pipeline.submitUserMessage(conversationId, "three"))).toMatchObject({
      code: "closed"
    });
    expect(pipeline.getStatus()).toMatchObject({ state: "stopped", sessions: 0 });
    expect(shutdownCalls).toEqual(["shutdown"]);
  });

  it("requires an api key when no gateway is supplied", () => {
    expect(() => createPipeline({ upstream: { agentId: "asst_1" } })).toThrowError(
      "upstream.apiKey is required when no gateway is supplied"
    );
  });
});
