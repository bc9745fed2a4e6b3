import { randomUUID } from "node:crypto";
import { createGapEvent, type PipelineEvent } from "../events.js";
import { nowIso } from "../helpers.js";
import type { RuntimeEventLog } from "../observability.js";
import type { SessionRegistry } from "../sessions/registry.js";
import { ConsumerQueue, DEFAULT_CONSUMER_MAX_QUEUED, type QueueCloseReason } from "./queue.js";

export interface PushStreamMultiplexerOptions {
  sessions: SessionRegistry;
  maxQueued?: number;
  runtimeEvents?: RuntimeEventLog;
  now?: () => string;
}

/**
 * Joins history backfill and live delivery for push-stream consumers. Attach
 * runs inside the conversation's lock, so no event can land between the
 * replayed tail and the first live event.
 */
export class PushStreamMultiplexer {
  private readonly sessions: SessionRegistry;
  private readonly maxQueued: number;
  private readonly runtimeEvents?: RuntimeEventLog;
  private readonly now: () => string;
  private readonly consumers = new Map<string, Set<ConsumerQueue>>();

  constructor(options: PushStreamMultiplexerOptions) {
    this.sessions = options.sessions;
    this.maxQueued = options.maxQueued ?? DEFAULT_CONSUMER_MAX_QUEUED;
    this.runtimeEvents = options.runtimeEvents;
    this.now = options.now ?? nowIso;
  }

  attach(conversationId: string, watermark = 0, options: { maxQueued?: number } = {}): Promise<ConsumerQueue> {
    const session = this.sessions.ensure(conversationId);
    return session.lock.run(() => {
      // a watermark from before a restart may run ahead of this process
      const startAfter = Math.min(Math.max(0, Math.floor(watermark)), session.lastSequenceNo);
      const queue = new ConsumerQueue({
        id: randomUUID(),
        conversationId,
        startAfter,
        maxQueued: options.maxQueued ?? this.maxQueued,
        onClose: (closed, reason) => this.forget(closed, reason)
      });

      const replay = session.history.replayAfter(startAfter);
      if (replay.gap) {
        queue.enqueue(
          createGapEvent({
            conversationId,
            requestedWatermark: replay.gap.requestedWatermark,
            oldestRetained: replay.gap.oldestRetained,
            timestamp: this.now()
          })
        );
      }
      for (const event of replay.events) {
        if (!queue.enqueue(event)) {
          break;
        }
      }
      if (queue.closed) {
        return queue;
      }

      const set = this.consumers.get(conversationId) ?? new Set<ConsumerQueue>();
      set.add(queue);
      this.consumers.set(conversationId, set);
      session.attachedConsumers += 1;
      this.runtimeEvents?.emit("consumer.attached", {
        conversationId,
        consumerId: queue.id,
        watermark: startAfter,
        backfilled: queue.pending,
        gap: replay.gap !== null
      });
      return queue;
    });
  }

  /** Called by the push-stream channel inside the router's section. */
  deliver(event: PipelineEvent): void {
    const set = this.consumers.get(event.conversationId);
    if (!set) {
      return;
    }
    for (const queue of Array.from(set)) {
      if (event.sequenceNo <= queue.lastSequenceNo) {
        continue;
      }
      queue.enqueue(event);
    }
  }

  async detach(queue: ConsumerQueue): Promise<void> {
    const session = this.sessions.get(queue.conversationId);
    if (!session) {
      queue.close("detached");
      return;
    }
    await session.lock.run(() => {
      queue.close("detached");
    });
  }

  consumerCount(conversationId: string): number {
    return this.consumers.get(conversationId)?.size ?? 0;
  }

  closeAll(reason: QueueCloseReason = "shutdown"): void {
    for (const set of Array.from(this.consumers.values())) {
      for (const queue of Array.from(set)) {
        queue.close(reason);
      }
    }
  }

  private forget(queue: ConsumerQueue, reason: QueueCloseReason): void {
    const set = this.consumers.get(queue.conversationId);
    if (!set?.delete(queue)) {
      return;
    }
    if (set.size === 0) {
      this.consumers.delete(queue.conversationId);
    }
    const session = this.sessions.get(queue.conversationId);
    if (session) {
      session.attachedConsumers = Math.max(0, session.attachedConsumers - 1);
    }
    this.runtimeEvents?.emit(reason === "overflow" ? "consumer.overflow" : "consumer.detached", {
      conversationId: queue.conversationId,
      consumerId: queue.id,
      reason
    });
  }
}
