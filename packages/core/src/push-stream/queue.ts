import type { PipelineEvent } from "../events.js";

export const DEFAULT_CONSUMER_MAX_QUEUED = 1_000;

export type QueueCloseReason = "detached" | "overflow" | "shutdown" | "client_closed";

export interface ConsumerQueueOptions {
  id: string;
  conversationId: string;
  /** Events at or below this sequence number are never enqueued. */
  startAfter: number;
  maxQueued?: number;
  onClose?: (queue: ConsumerQueue, reason: QueueCloseReason) => void;
}

/**
 * Per-consumer FIFO between the multiplexer and one push-stream client.
 * Closing discards undelivered items and ends every pending `next()`.
 */
export class ConsumerQueue implements AsyncIterable<PipelineEvent> {
  readonly id: string;
  readonly conversationId: string;
  readonly maxQueued: number;
  private items: PipelineEvent[] = [];
  private readonly waiters: Array<(result: IteratorResult<PipelineEvent>) => void> = [];
  private lastEnqueued: number;
  private reason: QueueCloseReason | null = null;
  private readonly onClose?: ConsumerQueueOptions["onClose"];

  constructor(options: ConsumerQueueOptions) {
    this.id = options.id;
    this.conversationId = options.conversationId;
    this.maxQueued = Math.max(1, options.maxQueued ?? DEFAULT_CONSUMER_MAX_QUEUED);
    this.lastEnqueued = options.startAfter;
    this.onClose = options.onClose;
  }

  get pending(): number {
    return this.items.length;
  }

  get lastSequenceNo(): number {
    return this.lastEnqueued;
  }

  get closed(): boolean {
    return this.reason !== null;
  }

  get closeReason(): QueueCloseReason | null {
    return this.reason;
  }

  /** Returns false when the queue is closed, including by this call overflowing it. */
  enqueue(event: PipelineEvent): boolean {
    if (this.reason !== null) {
      return false;
    }
    this.lastEnqueued = event.sequenceNo;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return true;
    }
    if (this.items.length >= this.maxQueued) {
      this.close("overflow");
      return false;
    }
    this.items.push(event);
    return true;
  }

  next(): Promise<IteratorResult<PipelineEvent>> {
    const item = this.items.shift();
    if (item) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.reason !== null) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  drain(): PipelineEvent[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  close(reason: QueueCloseReason): void {
    if (this.reason !== null) {
      return;
    }
    this.reason = reason;
    this.items = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onClose?.(this, reason);
  }

  [Symbol.asyncIterator](): AsyncIterator<PipelineEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close("client_closed");
        return { value: undefined, done: true };
      }
    };
  }
}
