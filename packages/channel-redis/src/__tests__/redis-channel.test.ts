import { describe, expect, it } from "vitest";
import { stampEvent, type PipelineEvent } from "@threadline/core";
import { RedisChannel, type RedisPublisher } from "../redis-channel.js";

class FakePublisher implements RedisPublisher {
  readonly published: Array<{ channel: string; message: string }> = [];
  quitCalls = 0;
  failWith?: Error;

  async publish(channel: string, message: string): Promise<number> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.published.push({ channel, message });
    return 2;
  }

  async quit(): Promise<string> {
    this.quitCalls += 1;
    return "OK";
  }
}

function fragment(sequenceNo: number, text: string): PipelineEvent {
  return stampEvent(
    { kind: "fragment", messageId: "msg_1", payload: { text } },
    { conversationId: "asst_1:alice", sequenceNo, timestamp: "2026-01-01T00:00:00.000Z" }
  );
}

describe("redis channel", () => {
  it("publishes serialized events to the conversation channel", async () => {
    const client = new FakePublisher();
    const channel = new RedisChannel({ client });

    await channel.publish(fragment(1, "Hi"));

    expect(channel.id).toBe("redis");
    expect(client.published).toHaveLength(1);
    expect(client.published[0]?.channel).toBe("threadline:events:asst_1:alice");
    expect(JSON.parse(client.published[0]?.message ?? "null")).toMatchObject({
      kind: "fragment",
      conversationId: "asst_1:alice",
      sequenceNo: 1,
      payload: { text: "Hi" }
    });
    expect(channel.receivers).toBe(2);
  });

  it("honours a custom prefix and id", async () => {
    const client = new FakePublisher();
    const channel = new RedisChannel({ client, id: "events-bus", prefix: "demo" });

    await channel.publish(fragment(7, "x"));

    expect(channel.id).toBe("events-bus");
    expect(client.published.map((entry) => entry.channel)).toEqual(["demo:asst_1:alice"]);
  });

  it("propagates publish failures to the caller", async () => {
    const client = new FakePublisher();
    client.failWith = new Error("connection lost");
    const channel = new RedisChannel({ client });

    await expect(channel.publish(fragment(1, "x"))).rejects.toThrow("connection lost");
  });

  it("leaves an injected client open and stops publishing once closed", async () => {
    const client = new FakePublisher();
    const channel = new RedisChannel({ client });

    await channel.close();
    await channel.close();
    await channel.publish(fragment(1, "late"));

    expect(client.quitCalls).toBe(0);
    expect(client.published).toEqual([]);
  });
});
