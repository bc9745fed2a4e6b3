import type { PipelineEvent } from "../events.js";
import type { PushStreamMultiplexer } from "../push-stream/multiplexer.js";
import type { Channel } from "./types.js";

/** Live leg of the push stream: forwards router events to attached consumers. */
export class PushStreamChannel implements Channel {
  readonly id: string;
  readonly inline = true;
  private readonly multiplexer: PushStreamMultiplexer;

  constructor(multiplexer: PushStreamMultiplexer, options: { id?: string } = {}) {
    this.multiplexer = multiplexer;
    this.id = options.id ?? "push";
  }

  publish(event: PipelineEvent): void {
    this.multiplexer.deliver(event);
  }

  close(): void {
    this.multiplexer.closeAll("shutdown");
  }
}
