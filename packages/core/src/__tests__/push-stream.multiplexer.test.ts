import { describe, expect, it } from "vitest";
import { stampEvent, type PipelineEvent } from "../events.js";
import { RuntimeEventLog } from "../observability.js";
import { PushStreamMultiplexer } from "../push-stream/multiplexer.js";
import { SessionRegistry } from "../sessions/registry.js";

const conversationId = "asst_1:alice";
const timestamp = "2026-01-01T00:00:00.000Z";

function createHarness(capacity = 3) {
  const sessions = new SessionRegistry(capacity);
  const runtimeEvents = new RuntimeEventLog();
  const multiplexer = new PushStreamMultiplexer({ sessions, runtimeEvents, now: () => timestamp });
  const session = sessions.ensure(conversationId);

  const emit = (text: string): Promise<PipelineEvent> =>
    session.lock.run(() => {
      const event = stampEvent(
        { kind: "fragment", messageId: "msg_1", payload: { text } },
        { conversationId, sequenceNo: session.lastSequenceNo + 1, timestamp }
      );
      session.history.append(event);
      session.nextSequenceNo();
      multiplexer.deliver(event);
      return event;
    });

  const emitMany = async (count: number): Promise<void> => {
    for (let index = 1; index <= count; index += 1) {
      await emit(`e${index}`);
    }
  };

  return { sessions, runtimeEvents, multiplexer, session, emit, emitMany };
}

describe("push-stream multiplexer", () => {
  it("backfills a gap marker and the retained tail for a consumer behind eviction", async () => {
    const { multiplexer, emitMany } = createHarness(3);
    await emitMany(5);

    const queue = await multiplexer.attach(conversationId, 0);
    const delivered = queue.drain();

    expect(delivered.map((event) => [event.kind, event.sequenceNo])).toEqual([
      ["gap", 2],
      ["fragment", 3],
      ["fragment", 4],
      ["fragment", 5]
    ]);
    expect(delivered[0]?.payload).toEqual({ requestedWatermark: 0, oldestRetained: 3 });
  });

  it("replays only events after the watermark without a gap", async () => {
    const { multiplexer, emitMany } = createHarness(3);
    await emitMany(5);

    const queue = await multiplexer.attach(conversationId, 4);

    expect(queue.drain().map((event) => event.sequenceNo)).toEqual([5]);
  });

  it("switches from backfill to live delivery without duplicates", async () => {
    const { multiplexer, emit, emitMany, session } = createHarness(3);
    await emitMany(2);

    const queue = await multiplexer.attach(conversationId, 0);
    const live = await emit("e3");
    multiplexer.deliver(live);

    expect(queue.drain().map((event) => event.sequenceNo)).toEqual([1, 2, 3]);
    expect(queue.lastSequenceNo).toBe(3);
    expect(session.attachedConsumers).toBe(1);
  });

  it("waits for an in-flight emission before taking the backfill", async () => {
    const { multiplexer, emit, session } = createHarness(5);
    const emission = session.lock.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
    });
    const pendingEmit = emit("e1");
    const attaching = multiplexer.attach(conversationId, 0);
    await Promise.all([emission, pendingEmit]);
    const queue = await attaching;

    expect(queue.drain().map((event) => event.sequenceNo)).toEqual([1]);
  });

  it("resolves waiting readers with live events", async () => {
    const { multiplexer, emit } = createHarness(3);
    const queue = await multiplexer.attach(conversationId, 0);

    const next = queue.next();
    await emit("live");

    await expect(next).resolves.toMatchObject({ done: false, value: { sequenceNo: 1, payload: { text: "live" } } });
  });

  it("detaches idempotently and ends pending reads", async () => {
    const { multiplexer, session, runtimeEvents } = createHarness(3);
    const queue = await multiplexer.attach(conversationId, 0);
    const next = queue.next();

    await multiplexer.detach(queue);
    await multiplexer.detach(queue);

    await expect(next).resolves.toEqual({ value: undefined, done: true });
    expect(queue.closeReason).toBe("detached");
    expect(session.attachedConsumers).toBe(0);
    expect(multiplexer.consumerCount(conversationId)).toBe(0);
    expect(runtimeEvents.list().map((event) => event.type)).toEqual(["consumer.attached", "consumer.detached"]);
  });

  it("closes and detaches a consumer that overflows", async () => {
    const { sessions, runtimeEvents, emitMany, session } = createHarness(10);
    const multiplexer = new PushStreamMultiplexer({ sessions, runtimeEvents, maxQueued: 2 });
    const queue = await multiplexer.attach(conversationId, 0);

    await emitMany(3);

    expect(queue.closed).toBe(true);
    expect(queue.closeReason).toBe("overflow");
    expect(queue.pending).toBe(0);
    expect(session.attachedConsumers).toBe(0);
    expect(runtimeEvents.list().at(-1)?.type).toBe("consumer.overflow");
  });

  it("clamps a watermark that runs ahead of this process", async () => {
    const { multiplexer, emit, emitMany } = createHarness(3);
    await emitMany(2);

    const queue = await multiplexer.attach(conversationId, 50);
    await emit("after-restart");

    expect(queue.drain().map((event) => event.sequenceNo)).toEqual([3]);
  });

  it("closes the queue when an async iteration stops early", async () => {
    const { multiplexer, emitMany, session } = createHarness(3);
    await emitMany(2);
    const queue = await multiplexer.attach(conversationId, 0);

    const seen: number[] = [];
    for await (const event of queue) {
      seen.push(event.sequenceNo);
      break;
    }

    expect(seen).toEqual([1]);
    expect(queue.closeReason).toBe("client_closed");
    expect(session.attachedConsumers).toBe(0);
  });

  it("closes every consumer on shutdown", async () => {
    const { multiplexer } = createHarness(3);
    const first = await multiplexer.attach(conversationId, 0);
    const second = await multiplexer.attach(conversationId, 0);
    expect(multiplexer.consumerCount(conversationId)).toBe(2);

    multiplexer.closeAll();

    expect([first.closeReason, second.closeReason]).toEqual(["shutdown", "shutdown"]);
    expect(multiplexer.consumerCount(conversationId)).toBe(0);
  });
});
