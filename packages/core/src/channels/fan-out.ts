import type { PipelineEvent } from "../events.js";
import { errorMessage } from "../helpers.js";
import type { RuntimeEventLog } from "../observability.js";
import type { Channel, ChannelDiagnostics, ChannelOutcome } from "./types.js";

export const DEFAULT_PUBLISH_TIMEOUT_MS = 5_000;
export const DEFAULT_CHANNEL_MAX_PENDING = 1_000;

export interface ChannelFanOutOptions {
  /** 0 disables the per-publish deadline. */
  publishTimeoutMs?: number;
  /** Deliveries a lane holds, in flight included, before new events are dropped for that channel. */
  maxPendingPerChannel?: number;
  runtimeEvents?: RuntimeEventLog;
}

class PublishTimeoutError extends Error {
  constructor(channelId: string, timeoutMs: number) {
    super(`channel ${channelId} did not finish publishing within ${timeoutMs}ms`);
    this.name = "PublishTimeoutError";
  }
}

interface DeliveryLane {
  tail: Promise<void>;
  pending: number;
}

function withDeadline(task: Promise<void>, channelId: string, timeoutMs: number): Promise<void> {
  if (timeoutMs <= 0) {
    return task;
  }
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PublishTimeoutError(channelId, timeoutMs)), timeoutMs);
  });
  return Promise.race([task, deadline]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Delivers every event to a fixed set of channels; one channel's failure never affects another.
 * Inline channels run in the caller's turn. Every other channel gets its own ordered lane, so a
 * slow channel only delays itself.
 */
export class ChannelFanOut {
  private readonly channels: readonly Channel[];
  private readonly stats = new Map<string, ChannelDiagnostics>();
  private readonly lanes = new Map<string, DeliveryLane>();
  private readonly publishTimeoutMs: number;
  private readonly maxPendingPerChannel: number;
  private readonly runtimeEvents?: RuntimeEventLog;
  private closed = false;

  constructor(channels: Channel[], options: ChannelFanOutOptions = {}) {
    const seen = new Set<string>();
    for (const channel of channels) {
      if (seen.has(channel.id)) {
        throw new Error(`Duplicate channel id: ${channel.id}`);
      }
      seen.add(channel.id);
      this.stats.set(channel.id, { channelId: channel.id, delivered: 0, failed: 0 });
    }
    this.channels = Object.freeze([...channels]);
    this.publishTimeoutMs = Math.max(0, options.publishTimeoutMs ?? DEFAULT_PUBLISH_TIMEOUT_MS);
    this.maxPendingPerChannel = Math.max(1, options.maxPendingPerChannel ?? DEFAULT_CHANNEL_MAX_PENDING);
    this.runtimeEvents = options.runtimeEvents;
  }

  get channelIds(): string[] {
    return this.channels.map((channel) => channel.id);
  }

  /** Hands the event to every channel without waiting for queued deliveries. */
  dispatch(event: PipelineEvent): void {
    for (const channel of this.channels) {
      // outcomes are recorded in diagnostics; delivery promises never reject
      void this.deliver(channel, event);
    }
  }

  /** Like `dispatch`, resolving once every channel has settled this event. */
  publishAll(event: PipelineEvent): Promise<ChannelOutcome[]> {
    return Promise.all(this.channels.map((channel) => this.deliver(channel, event)));
  }

  /** Number of deliveries queued or in flight for a channel. */
  pending(channelId: string): number {
    return this.lanes.get(channelId)?.pending ?? 0;
  }

  /** Resolves when every lane is empty, or after `timeoutMs` when it is positive. */
  async drain(timeoutMs = 0): Promise<void> {
    const settled = (async () => {
      while (Array.from(this.lanes.values()).some((lane) => lane.pending > 0)) {
        await Promise.all(Array.from(this.lanes.values(), (lane) => lane.tail));
      }
    })();
    if (timeoutMs <= 0) {
      await settled;
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    try {
      await Promise.race([settled, deadline]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  diagnostics(): ChannelDiagnostics[] {
    return this.channels.map((channel) => {
      const stats = this.stats.get(channel.id);
      return stats ? { ...stats } : { channelId: channel.id, delivered: 0, failed: 0 };
    });
  }

  /** Gives queued deliveries one publish deadline to finish, then drops the rest and closes every channel. */
  async close(): Promise<void> {
    await this.drain(this.publishTimeoutMs > 0 ? this.publishTimeoutMs : DEFAULT_PUBLISH_TIMEOUT_MS);
    this.closed = true;
    await Promise.all(
      this.channels.map(async (channel) => {
        try {
          await channel.close?.();
        } catch (error) {
          this.runtimeEvents?.emit("channel.close.failed", {
            channelId: channel.id,
            error: errorMessage(error)
          });
        }
      })
    );
  }

  private deliver(channel: Channel, event: PipelineEvent): Promise<ChannelOutcome> {
    if (channel.inline) {
      return this.publishInline(channel, event);
    }
    return this.enqueue(channel, event);
  }

  private publishInline(channel: Channel, event: PipelineEvent): Promise<ChannelOutcome> {
    let result: unknown;
    try {
      result = channel.publish(event);
    } catch (error) {
      return Promise.resolve(this.recordFailure(channel, event, error));
    }
    if (isPromiseLike(result)) {
      return this.settle(channel, event, Promise.resolve(result).then(() => undefined));
    }
    return Promise.resolve(this.recordSuccess(channel));
  }

  private enqueue(channel: Channel, event: PipelineEvent): Promise<ChannelOutcome> {
    let lane = this.lanes.get(channel.id);
    if (!lane) {
      lane = { tail: Promise.resolve(), pending: 0 };
      this.lanes.set(channel.id, lane);
    }
    if (lane.pending >= this.maxPendingPerChannel) {
      return Promise.resolve(
        this.recordFailure(channel, event, new Error(`channel ${channel.id} has ${lane.pending} deliveries pending`))
      );
    }

    const current = lane;
    current.pending += 1;
    const outcome = current.tail
      .then(() => {
        if (this.closed) {
          return this.recordFailure(channel, event, new Error(`channel ${channel.id} closed before delivery`));
        }
        // sync throws surface as rejections here
        return this.settle(channel, event, Promise.resolve().then(() => channel.publish(event)));
      })
      .finally(() => {
        current.pending -= 1;
      });
    current.tail = outcome.then(() => undefined);
    return outcome;
  }

  private async settle(channel: Channel, event: PipelineEvent, task: Promise<void>): Promise<ChannelOutcome> {
    try {
      await withDeadline(task, channel.id, this.publishTimeoutMs);
      return this.recordSuccess(channel);
    } catch (error) {
      return this.recordFailure(channel, event, error);
    }
  }

  private recordSuccess(channel: Channel): ChannelOutcome {
    const stats = this.stats.get(channel.id);
    if (stats) {
      stats.delivered += 1;
    }
    return { channelId: channel.id, ok: true };
  }

  private recordFailure(channel: Channel, event: PipelineEvent, error: unknown): ChannelOutcome {
    const message = errorMessage(error);
    const timedOut = error instanceof PublishTimeoutError;
    const stats = this.stats.get(channel.id);
    if (stats) {
      stats.failed += 1;
      stats.lastError = message;
    }
    this.runtimeEvents?.emit("channel.publish.failed", {
      channelId: channel.id,
      conversationId: event.conversationId,
      sequenceNo: event.sequenceNo,
      kind: event.kind,
      error: message,
      timedOut
    });
    return timedOut
      ? { channelId: channel.id, ok: false, error: message, timedOut: true }
      : { channelId: channel.id, ok: false, error: message };
  }
}
