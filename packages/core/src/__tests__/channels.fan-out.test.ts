import { describe, expect, it } from "vitest";
import { ChannelFanOut } from "../channels/fan-out.js";
import type { Channel } from "../channels/types.js";
import { stampEvent, type PipelineEvent } from "../events.js";
import { RuntimeEventLog } from "../observability.js";

function fragment(sequenceNo: number): PipelineEvent {
  return stampEvent(
    { kind: "fragment", messageId: "msg_1", payload: { text: "hi" } },
    { conversationId: "asst_1:alice", sequenceNo, timestamp: "2026-01-01T00:00:00.000Z" }
  );
}

function recorder(id: string): Channel & { received: number[] } {
  const received: number[] = [];
  return {
    id,
    received,
    publish: (event) => {
      received.push(event.sequenceNo);
    }
  };
}

describe("channel fan-out", () => {
  it("isolates a throwing channel from its siblings", async () => {
    const runtimeEvents = new RuntimeEventLog();
    const before = recorder("before");
    const after = recorder("after");
    const fanOut = new ChannelFanOut(
      [
        before,
        {
          id: "broken",
          publish: () => {
            throw new Error("socket closed");
          }
        },
        after
      ],
      { runtimeEvents }
    );

    const outcomes = await fanOut.publishAll(fragment(1));

    expect(outcomes).toEqual([
      { channelId: "before", ok: true },
      { channelId: "broken", ok: false, error: "socket closed" },
      { channelId: "after", ok: true }
    ]);
    expect(before.received).toEqual([1]);
    expect(after.received).toEqual([1]);
    expect(runtimeEvents.list()[0]).toMatchObject({
      type: "channel.publish.failed",
      payload: { channelId: "broken", sequenceNo: 1, error: "socket closed", timedOut: false }
    });
  });

  it("isolates async rejections and counts deliveries per channel", async () => {
    const fanOut = new ChannelFanOut([
      recorder("ok"),
      {
        id: "flaky",
        publish: async (event) => {
          if (event.sequenceNo === 2) {
            throw new Error("publish refused");
          }
        }
      }
    ]);

    await fanOut.publishAll(fragment(1));
    await fanOut.publishAll(fragment(2));

    expect(fanOut.diagnostics()).toEqual([
      { channelId: "ok", delivered: 2, failed: 0 },
      { channelId: "flaky", delivered: 1, failed: 1, lastError: "publish refused" }
    ]);
  });

  it("bounds a slow publish with the timeout", async () => {
    const fanOut = new ChannelFanOut(
      [
        {
          id: "stuck",
          publish: () => new Promise<void>(() => undefined)
        }
      ],
      { publishTimeoutMs: 15 }
    );

    const [outcome] = await fanOut.publishAll(fragment(1));

    expect(outcome).toEqual({
      channelId: "stuck",
      ok: false,
      error: "channel stuck did not finish publishing within 15ms",
      timedOut: true
    });
  });

  it("closes every channel even when one close fails", async () => {
    const closed: string[] = [];
    const runtimeEvents = new RuntimeEventLog();
    const fanOut = new ChannelFanOut(
      [
        {
          id: "a",
          publish: () => undefined,
          close: () => {
            throw new Error("already closed");
          }
        },
        {
          id: "b",
          publish: () => undefined,
          close: async () => {
            closed.push("b");
          }
        }
      ],
      { runtimeEvents }
    );

    await fanOut.close();

    expect(closed).toEqual(["b"]);
    expect(runtimeEvents.list().map((event) => event.type)).toEqual(["channel.close.failed"]);
  });

  it("delivers inline channels at once while a queued channel hangs", async () => {
    const stalledCalls: number[] = [];
    const live = { ...recorder("live"), inline: true };
    const fanOut = new ChannelFanOut(
      [
        {
          id: "stalled",
          publish: (event) => {
            stalledCalls.push(event.sequenceNo);
            return new Promise<void>(() => undefined);
          }
        },
        live
      ],
      { publishTimeoutMs: 0 }
    );

    fanOut.dispatch(fragment(1));
    fanOut.dispatch(fragment(2));
    fanOut.dispatch(fragment(3));

    expect(live.received).toEqual([1, 2, 3]);
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(stalledCalls).toEqual([1]);
    expect(fanOut.pending("stalled")).toBe(3);
    expect(fanOut.diagnostics()).toEqual([
      { channelId: "stalled", delivered: 0, failed: 0 },
      { channelId: "live", delivered: 3, failed: 0 }
    ]);
  });

  it("keeps per-channel order through the delivery lane", async () => {
    const received: number[] = [];
    const fanOut = new ChannelFanOut([
      {
        id: "slow-first",
        publish: async (event) => {
          await new Promise((resolve) => setTimeout(resolve, event.sequenceNo === 1 ? 20 : 0));
          received.push(event.sequenceNo);
        }
      }
    ]);

    fanOut.dispatch(fragment(1));
    fanOut.dispatch(fragment(2));
    fanOut.dispatch(fragment(3));
    await fanOut.drain();

    expect(received).toEqual([1, 2, 3]);
    expect(fanOut.pending("slow-first")).toBe(0);
  });

  it("drops events for a channel whose lane is full", () => {
    const runtimeEvents = new RuntimeEventLog();
    const fanOut = new ChannelFanOut([{ id: "stalled", publish: () => new Promise<void>(() => undefined) }], {
      publishTimeoutMs: 0,
      maxPendingPerChannel: 2,
      runtimeEvents
    });

    for (const sequenceNo of [1, 2, 3, 4]) {
      fanOut.dispatch(fragment(sequenceNo));
    }

    expect(fanOut.diagnostics()).toEqual([
      { channelId: "stalled", delivered: 0, failed: 2, lastError: "channel stalled has 2 deliveries pending" }
    ]);
    expect(runtimeEvents.list().map((event) => event.payload.sequenceNo)).toEqual([3, 4]);
  });

  it("drops queued deliveries that outlive the close deadline", async () => {
    const fanOut = new ChannelFanOut([{ id: "stalled", publish: () => new Promise<void>(() => undefined) }], {
      publishTimeoutMs: 20
    });

    fanOut.dispatch(fragment(1));
    fanOut.dispatch(fragment(2));
    fanOut.dispatch(fragment(3));
    await fanOut.close();
    await fanOut.drain();

    expect(fanOut.diagnostics()).toEqual([
      { channelId: "stalled", delivered: 0, failed: 3, lastError: "channel stalled closed before delivery" }
    ]);
  });

  it("rejects duplicate channel ids", () => {
    expect(() => new ChannelFanOut([recorder("x"), recorder("x")])).toThrow("Duplicate channel id: x");
  });
});
