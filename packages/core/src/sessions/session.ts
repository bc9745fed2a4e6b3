import { PipelineError } from "../errors.js";
import { parseConversationId } from "../events.js";
import { nowIso } from "../helpers.js";
import { RollingEventHistory } from "../history.js";
import { SerialLock } from "./lock.js";

export type RunState = "idle" | "starting" | "streaming" | "awaiting_tools" | "terminal";

export interface ConversationSnapshot {
  conversationId: string;
  agentId: string;
  userId: string;
  threadId: string | null;
  activeRunId: string | null;
  runState: RunState;
  attachedConsumers: number;
  lastSequenceNo: number;
  retainedEvents: number;
  oldestRetainedSequenceNo: number | null;
  createdAt: string;
  lastActivityAt: string;
}

export class ConversationSession {
  readonly conversationId: string;
  readonly agentId: string;
  readonly userId: string;
  readonly history: RollingEventHistory;
  readonly lock = new SerialLock();
  readonly createdAt: string;

  threadId: string | null = null;
  activeRunId: string | null = null;
  attachedConsumers = 0;
  lastActivityAt: string;

  private state: RunState = "idle";
  private lastSequence = 0;
  private runAbort: AbortController | null = null;

  constructor(conversationId: string, historyCapacity?: number) {
    const identity = parseConversationId(conversationId);
    this.conversationId = conversationId;
    this.agentId = identity.agentId;
    this.userId = identity.userId;
    this.history = new RollingEventHistory(historyCapacity);
    this.createdAt = nowIso();
    this.lastActivityAt = this.createdAt;
  }

  get runState(): RunState {
    return this.state;
  }

  get lastSequenceNo(): number {
    return this.lastSequence;
  }

  get runInProgress(): boolean {
    return this.state !== "idle" && this.state !== "terminal";
  }

  get runSignal(): AbortSignal | undefined {
    return this.runAbort?.signal;
  }

  /** Claims the single run slot. Throws when a run is already starting or active. */
  reserveRun(): AbortSignal {
    if (this.runInProgress) {
      throw new PipelineError(
        "run_active",
        `Conversation ${this.conversationId} already has an active run${this.activeRunId ? ` (${this.activeRunId})` : ""}`
      );
    }
    this.state = "starting";
    this.activeRunId = null;
    this.runAbort = new AbortController();
    this.touch();
    return this.runAbort.signal;
  }

  transition(next: Exclude<RunState, "idle">): void {
    if (!this.runInProgress) {
      throw new PipelineError(
        "invariant_violation",
        `Conversation ${this.conversationId} has no reserved run (state=${this.state})`
      );
    }
    this.state = next;
    this.touch();
  }

  releaseRun(): void {
    this.state = "idle";
    this.activeRunId = null;
    this.runAbort = null;
    this.touch();
  }

  abortRun(reason?: string): void {
    this.runAbort?.abort(reason ? new Error(reason) : undefined);
  }

  /** Must only be called inside `lock.run`. */
  nextSequenceNo(): number {
    this.lastSequence += 1;
    return this.lastSequence;
  }

  touch(): void {
    this.lastActivityAt = nowIso();
  }

  snapshot(): ConversationSnapshot {
    return {
      conversationId: this.conversationId,
      agentId: this.agentId,
      userId: this.userId,
      threadId: this.threadId,
      activeRunId: this.activeRunId,
      runState: this.state,
      attachedConsumers: this.attachedConsumers,
      lastSequenceNo: this.lastSequence,
      retainedEvents: this.history.size,
      oldestRetainedSequenceNo: this.history.oldestSequenceNo(),
      createdAt: this.createdAt,
      lastActivityAt: this.lastActivityAt
    };
  }
}
