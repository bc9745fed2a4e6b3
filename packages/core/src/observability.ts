import fs from "node:fs";
import path from "node:path";
import { ensureDirectory, errorMessage, nowIso } from "./helpers.js";

const RUNTIME_EVENT_RING_SIZE = 200;
const JOURNAL_FIELD_MAX_CHARS = 2_000;
const JOURNAL_MAX_DEPTH = 6;
const REDACTED = "[REDACTED]";
const SENSITIVE_KEY = /token|secret|password|passphrase|api[_-]?key|authorization|cookie|private[_-]?key/i;
const SECRET_IN_TEXT: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/gi, `Bearer ${REDACTED}`],
  [/\b(?:sk|rk)-[A-Za-z0-9_-]{12,}/g, REDACTED],
  [/\b(token|secret|password|passphrase|api[_-]?key)\s*[:=]\s*[^\s,;]+/gi, `$1=${REDACTED}`]
];

export type RuntimeEventType =
  | "pipeline.started"
  | "pipeline.stopped"
  | "run.accepted"
  | "run.rejected"
  | "run.queued"
  | "run.started"
  | "run.state"
  | "run.completed"
  | "run.failed"
  | "tool.call.started"
  | "tool.call.completed"
  | "tool.call.failed"
  | "tool.results.submitted"
  | "router.notification.ignored"
  | "channel.unknown"
  | "channel.publish.failed"
  | "channel.close.failed"
  | "consumer.attached"
  | "consumer.detached"
  | "consumer.overflow"
  | "push.server.listening"
  | "push.server.request_failed"
  | "gateway.thread.created"
  | "gateway.thread.invalid";

export interface RuntimeEvent {
  type: RuntimeEventType;
  timestamp: string;
  payload: Record<string, unknown>;
}

export type RuntimeEventListener = (event: RuntimeEvent) => void;

export interface RuntimeEventLogOptions {
  /** Directory for `runtime-events.jsonl`; appending is disabled when unset. */
  directory?: string;
  ringSize?: number;
}

function scrubText(text: string): string {
  const scrubbed = SECRET_IN_TEXT.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), text);
  if (scrubbed.length <= JOURNAL_FIELD_MAX_CHARS) {
    return scrubbed;
  }
  return `${scrubbed.slice(0, JOURNAL_FIELD_MAX_CHARS)}...[+${scrubbed.length - JOURNAL_FIELD_MAX_CHARS} chars]`;
}

function scrubValue(value: unknown, depth: number, seen: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return scrubText(value);
  }
  if (value === null || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "object") {
    return value === undefined ? undefined : scrubText(String(value));
  }
  if (depth >= JOURNAL_MAX_DEPTH) {
    return "[depth]";
  }
  if (seen.has(value)) {
    return "[circular]";
  }
  seen.add(value);
  if (value instanceof Error) {
    return { name: value.name, message: scrubText(value.message) };
  }
  if (Array.isArray(value)) {
    return value.map((entry) => scrubValue(entry, depth + 1, seen));
  }
  return scrubPayload(Object.fromEntries(Object.entries(value)), depth + 1, seen);
}

function scrubPayload(payload: Record<string, unknown>, depth: number, seen: WeakSet<object>): Record<string, unknown> {
  const scrubbed: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    scrubbed[key] = SENSITIVE_KEY.test(key) ? REDACTED : scrubValue(value, depth, seen);
  }
  return scrubbed;
}

/**
 * Journal form of a runtime event: secrets in payload keys and text are
 * replaced and each text field is clipped.
 */
export function redactRuntimeEvent(event: RuntimeEvent): RuntimeEvent {
  return {
    type: event.type,
    timestamp: event.timestamp,
    payload: scrubPayload(event.payload, 0, new WeakSet<object>())
  };
}

export class RuntimeEventLog {
  private readonly events: RuntimeEvent[] = [];
  private readonly listeners = new Set<RuntimeEventListener>();
  private readonly ringSize: number;
  private readonly directory: string | null;
  private writeFailed = false;

  constructor(options: RuntimeEventLogOptions = {}) {
    this.ringSize = Math.max(1, options.ringSize ?? RUNTIME_EVENT_RING_SIZE);
    this.directory = options.directory ? path.resolve(options.directory) : null;
  }

  emit(type: RuntimeEventType, payload: Record<string, unknown> = {}): RuntimeEvent {
    const event: RuntimeEvent = {
      type,
      timestamp: nowIso(),
      payload
    };
    this.events.push(event);
    if (this.events.length > this.ringSize) {
      this.events.splice(0, this.events.length - this.ringSize);
    }
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch {
        // listener faults never reach the emitter
      }
    }
    this.append(event);
    return event;
  }

  onEvent(listener: RuntimeEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  list(limit = this.ringSize): RuntimeEvent[] {
    const bounded = Math.max(0, Math.floor(limit));
    return bounded === 0 ? [] : this.events.slice(-bounded);
  }

  private append(event: RuntimeEvent): void {
    if (!this.directory || this.writeFailed) {
      return;
    }
    try {
      ensureDirectory(this.directory);
      fs.appendFileSync(
        path.join(this.directory, "runtime-events.jsonl"),
        `${JSON.stringify(redactRuntimeEvent(event))}\n`,
        "utf8"
      );
    } catch (error) {
      this.writeFailed = true;
      process.stderr.write(`[threadline] observability disabled: ${errorMessage(error)}\n`);
    }
  }
}
