import { PipelineError } from "./errors.js";
import type { PipelineEvent } from "./events.js";

export const DEFAULT_HISTORY_CAPACITY = 300;

export interface HistoryGap {
  requestedWatermark: number;
  oldestRetained: number;
}

export interface HistoryReplay {
  gap: HistoryGap | null;
  events: PipelineEvent[];
}

/**
 * Fixed-capacity, insertion-ordered store of the newest events of one
 * conversation. Entries are contiguous in sequence number; the oldest entry
 * is evicted first.
 */
export class RollingEventHistory {
  readonly capacity: number;
  private readonly entries: PipelineEvent[] = [];

  constructor(capacity = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isFinite(capacity) || capacity < 1) {
      throw new PipelineError("invalid_input", `History capacity must be at least 1 (got ${capacity})`);
    }
    this.capacity = Math.floor(capacity);
  }

  get size(): number {
    return this.entries.length;
  }

  append(event: PipelineEvent): void {
    if (event.kind === "gap") {
      throw new PipelineError("invariant_violation", "Gap markers are per-consumer and never stored");
    }
    const latest = this.latestSequenceNo();
    if (latest !== null && event.sequenceNo !== latest + 1) {
      throw new PipelineError(
        "invariant_violation",
        `History expects sequence ${latest + 1} but received ${event.sequenceNo}`
      );
    }
    this.entries.push(event);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  oldestSequenceNo(): number | null {
    return this.entries[0]?.sequenceNo ?? null;
  }

  latestSequenceNo(): number | null {
    return this.entries[this.entries.length - 1]?.sequenceNo ?? null;
  }

  replayAfter(watermark: number): HistoryReplay {
    const oldest = this.oldestSequenceNo();
    if (oldest === null) {
      return { gap: null, events: [] };
    }
    const gap = watermark + 1 < oldest ? { requestedWatermark: watermark, oldestRetained: oldest } : null;
    const startIndex = Math.max(0, watermark + 1 - oldest);
    return {
      gap,
      events: this.entries.slice(startIndex)
    };
  }

  clear(): void {
    this.entries.length = 0;
  }
}
