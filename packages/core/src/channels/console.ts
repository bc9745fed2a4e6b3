import { isTerminalEvent, type PipelineEvent } from "../events.js";
import type { Channel } from "./types.js";

export interface ConsoleWriter {
  write: (text: string) => unknown;
}

export function formatConsoleLine(event: PipelineEvent): string | null {
  switch (event.kind) {
    case "tool_call":
      return event.payload.ok
        ? `[tool] ${event.payload.toolName} ok`
        : `[tool] ${event.payload.toolName} failed: ${event.payload.message}`;
    case "status":
      return `[run] ${event.payload.runId} ${event.payload.status}`;
    case "error":
      return `[error] ${event.payload.code}: ${event.payload.message}`;
    case "gap":
      return `[gap] events ${event.payload.requestedWatermark + 1}-${event.payload.oldestRetained - 1} are no longer retained`;
    default:
      return null;
  }
}

/** Streams fragments inline and prints one line per tool call, status and error. */
export class ConsoleChannel implements Channel {
  readonly id: string;
  readonly inline = true;
  private readonly writer: ConsoleWriter;
  private readonly streamed = new Set<string>();
  private midLine = false;

  constructor(options: { id?: string; writer?: ConsoleWriter } = {}) {
    this.id = options.id ?? "console";
    this.writer = options.writer ?? process.stdout;
  }

  publish(event: PipelineEvent): void {
    if (event.kind === "fragment") {
      this.streamed.add(event.messageId);
      this.writer.write(event.payload.text);
      this.midLine = !event.payload.text.endsWith("\n");
      return;
    }

    if (event.kind === "finalized") {
      if (this.streamed.delete(event.messageId)) {
        if (this.midLine) {
          this.writer.write("\n");
        }
      } else {
        this.breakLine();
        this.writer.write(`${event.payload.text}\n`);
      }
      this.midLine = false;
      return;
    }

    if (isTerminalEvent(event)) {
      // a run that ends mid-message never finalizes it
      this.streamed.clear();
    }
    const line = formatConsoleLine(event);
    if (line !== null) {
      this.breakLine();
      this.writer.write(`${line}\n`);
    }
  }

  private breakLine(): void {
    if (this.midLine) {
      this.writer.write("\n");
      this.midLine = false;
    }
  }
}
