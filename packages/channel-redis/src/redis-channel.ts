import { Redis } from "ioredis";
import { serializeEvent, type Channel, type PipelineEvent } from "@threadline/core";

export const DEFAULT_REDIS_CHANNEL_PREFIX = "threadline:events";

/** The slice of an ioredis client the channel needs. */
export interface RedisPublisher {
  publish: (channel: string, message: string) => Promise<number>;
  quit: () => Promise<unknown>;
}

export type RedisChannelOptions =
  | {
      id?: string;
      prefix?: string;
      url: string;
    }
  | {
      id?: string;
      prefix?: string;
      client: RedisPublisher;
    };

export function redisChannelName(prefix: string, conversationId: string): string {
  return `${prefix}:${conversationId}`;
}

/**
 * Publishes every pipeline event to `<prefix>:<conversationId>`.
 * A client built from `url` is owned and quit on close; an injected one is left open.
 */
export class RedisChannel implements Channel {
  readonly id: string;
  private readonly prefix: string;
  private readonly client: RedisPublisher;
  private readonly ownsClient: boolean;
  private closed = false;
  private published = 0;

  constructor(options: RedisChannelOptions) {
    this.id = options.id ?? "redis";
    this.prefix = options.prefix?.trim() || DEFAULT_REDIS_CHANNEL_PREFIX;
    if ("client" in options) {
      this.client = options.client;
      this.ownsClient = false;
    } else {
      this.client = new Redis(options.url, { maxRetriesPerRequest: 2 });
      this.ownsClient = true;
    }
  }

  /** Subscriber deliveries reported by `PUBLISH` since construction. */
  get receivers(): number {
    return this.published;
  }

  async publish(event: PipelineEvent): Promise<void> {
    if (this.closed) {
      return;
    }
    this.published += await this.client.publish(
      redisChannelName(this.prefix, event.conversationId),
      serializeEvent(event)
    );
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.ownsClient) {
      await this.client.quit();
    }
  }
}
