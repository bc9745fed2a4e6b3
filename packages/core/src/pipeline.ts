import { ChannelFanOut } from "./channels/fan-out.js";
import { ConsoleChannel } from "./channels/console.js";
import { PushStreamChannel } from "./channels/push-stream.js";
import type { Channel, ChannelDiagnostics } from "./channels/types.js";
import { resolvePipelineConfig, type PipelineConfig, type ResolvedPipelineConfig } from "./config.js";
import { PipelineError, isPipelineError } from "./errors.js";
import { errorMessage } from "./helpers.js";
import { RuntimeEventLog, type RuntimeEvent, type RuntimeEventListener } from "./observability.js";
import type { ConsumerQueue } from "./push-stream/queue.js";
import { PushStreamMultiplexer } from "./push-stream/multiplexer.js";
import { PushStreamServer, type PushStreamBackend } from "./push-stream/server.js";
import { EventRouter, type IdentityResolver, type RunOutcome } from "./router/router.js";
import { SessionRegistry } from "./sessions/registry.js";
import type { ConversationSnapshot } from "./sessions/session.js";
import { ToolInvoker } from "./tools/invoker.js";
import { AssistantsApiGateway } from "./upstream/assistants-api.js";
import type { FetchLike } from "./upstream/http.js";
import type { ThreadRunGateway } from "./upstream/types.js";

export type PipelineState = "idle" | "running" | "stopping" | "stopped";

export interface PipelineDependencies {
  gateway?: ThreadRunGateway;
  fetchImpl?: FetchLike;
  runtimeEvents?: RuntimeEventLog;
  identity?: IdentityResolver;
  now?: () => string;
}

export interface SubmittedRun {
  conversationId: string;
  /** Settles when the run reaches a terminal state; never rejects. */
  completion: Promise<RunOutcome>;
}

export interface PipelineStatus {
  state: PipelineState;
  agentId: string;
  channels: string[];
  pushUrl?: string;
  sessions: number;
  activeRuns: number;
}

interface WaitingTurn {
  text: string;
  resolve: (outcome: RunOutcome) => void;
  reject: (error: unknown) => void;
}

export class PipelineRuntime implements PushStreamBackend {
  readonly config: ResolvedPipelineConfig;
  private readonly runtimeEvents: RuntimeEventLog;
  private readonly sessions: SessionRegistry;
  private readonly gateway: ThreadRunGateway;
  private readonly multiplexer: PushStreamMultiplexer;
  private readonly fanOut: ChannelFanOut;
  private readonly router: EventRouter;
  private readonly inFlight = new Set<Promise<RunOutcome>>();
  private readonly waiting = new Map<string, WaitingTurn[]>();
  private pushServer: PushStreamServer | null = null;
  private state: PipelineState = "idle";

  constructor(config: PipelineConfig, deps: PipelineDependencies = {}) {
    this.config = resolvePipelineConfig(config);
    this.runtimeEvents =
      deps.runtimeEvents ??
      new RuntimeEventLog({
        directory: this.config.observability.enabled ? this.config.observability.directory : undefined,
        ringSize: this.config.observability.ringSize
      });
    this.sessions = new SessionRegistry(this.config.history.capacity);

    const invoker = new ToolInvoker({
      tools: this.config.tools.definitions,
      timeoutMs: this.config.tools.timeoutMs,
      maxOutputTokens: this.config.tools.maxOutputTokens,
      charsPerToken: this.config.tools.charsPerToken,
      runtimeEvents: this.runtimeEvents
    });

    this.gateway = deps.gateway ?? this.createGateway(deps.fetchImpl);
    this.multiplexer = new PushStreamMultiplexer({
      sessions: this.sessions,
      maxQueued: this.config.push.maxQueued,
      runtimeEvents: this.runtimeEvents,
      now: deps.now
    });
    this.fanOut = new ChannelFanOut(this.buildChannels(), {
      publishTimeoutMs: this.config.channels.publishTimeoutMs,
      runtimeEvents: this.runtimeEvents
    });
    this.router = new EventRouter({
      gateway: this.gateway,
      invoker,
      publish: (event) => {
        this.fanOut.dispatch(event);
      },
      identity: deps.identity,
      runtimeEvents: this.runtimeEvents,
      now: deps.now
    });
  }

  async start(): Promise<PipelineStatus> {
    if (this.state === "running") {
      return this.getStatus();
    }
    if (this.state !== "idle") {
      throw new PipelineError("closed", "Pipeline has been stopped");
    }
    await this.config.hooks.onStart?.();
    if (this.config.push.enabled) {
      const server = new PushStreamServer(this, {
        host: this.config.push.host,
        port: this.config.push.port,
        token: this.config.push.token,
        pingMs: this.config.push.pingMs,
        maxBodyBytes: this.config.push.maxBodyBytes,
        runtimeEvents: this.runtimeEvents
      });
      await server.start();
      this.pushServer = server;
    }
    this.state = "running";
    const status = this.getStatus();
    this.runtimeEvents.emit("pipeline.started", { ...status });
    return status;
  }

  async stop(): Promise<void> {
    if (this.state === "stopping" || this.state === "stopped") {
      return;
    }
    this.state = "stopping";

    for (const [conversationId, turns] of this.waiting) {
      for (const turn of turns.splice(0)) {
        turn.reject(new PipelineError("closed", `Pipeline stopped before queued turn for ${conversationId} ran`));
      }
    }
    this.waiting.clear();

    for (const session of this.sessions.list()) {
      session.abortRun("pipeline stopping");
    }
    await Promise.all(Array.from(this.inFlight));

    this.multiplexer.closeAll("shutdown");
    await this.fanOut.close();
    await this.pushServer?.stop();
    this.pushServer = null;
    this.sessions.clear();

    try {
      await this.config.hooks.onShutdown?.();
    } finally {
      this.state = "stopped";
      this.runtimeEvents.emit("pipeline.stopped", {});
    }
  }

  /** Reserves the run synchronously and continues the turn in the background. */
  submitUserMessage(conversationId: string, text: string): SubmittedRun {
    this.assertOpen();
    if (text.trim().length === 0) {
      throw new PipelineError("invalid_input", "Message text must not be empty");
    }
    const session = this.sessions.ensure(conversationId);

    let signal: AbortSignal;
    try {
      signal = session.reserveRun();
    } catch (error) {
      this.runtimeEvents.emit("run.rejected", { conversationId, reason: errorMessage(error) });
      throw error;
    }
    this.runtimeEvents.emit("run.accepted", { conversationId, chars: text.length });

    const completion = this.router.runReservedTurn(session, text, signal).catch((error): RunOutcome => {
      const message = errorMessage(error);
      this.runtimeEvents.emit("run.failed", { conversationId, error: message });
      return {
        conversationId,
        status: "failed",
        eventCount: 0,
        error: { code: "transport_error", message }
      };
    });
    this.inFlight.add(completion);
    void completion.finally(() => {
      this.inFlight.delete(completion);
      this.pumpWaiting(conversationId);
    });
    return { conversationId, completion };
  }

  /** Awaited form of `submitUserMessage`; queues behind an active run under the `queue` policy. */
  async handleUserMessage(conversationId: string, text: string): Promise<RunOutcome> {
    try {
      return await this.submitUserMessage(conversationId, text).completion;
    } catch (error) {
      if (this.config.runs.busyPolicy !== "queue" || !isPipelineError(error, "run_active")) {
        throw error;
      }
    }

    const turns = this.waiting.get(conversationId) ?? [];
    if (turns.length >= this.config.runs.maxQueued) {
      throw new PipelineError(
        "run_active",
        `Conversation ${conversationId} already has ${turns.length} queued turns`
      );
    }
    return new Promise<RunOutcome>((resolve, reject) => {
      turns.push({ text, resolve, reject });
      this.waiting.set(conversationId, turns);
      this.runtimeEvents.emit("run.queued", { conversationId, queued: turns.length });
    });
  }

  attach(conversationId: string, watermark = 0, options: { maxQueued?: number } = {}): Promise<ConsumerQueue> {
    this.assertOpen();
    return this.multiplexer.attach(conversationId, watermark, options);
  }

  detach(queue: ConsumerQueue): Promise<void> {
    return this.multiplexer.detach(queue);
  }

  getSession(conversationId: string): ConversationSnapshot | null {
    return this.sessions.snapshot(conversationId);
  }

  listSessions(): ConversationSnapshot[] {
    return this.sessions.snapshots();
  }

  onRuntimeEvent(listener: RuntimeEventListener): () => void {
    return this.runtimeEvents.onEvent(listener);
  }

  listRuntimeEvents(limit?: number): RuntimeEvent[] {
    return this.runtimeEvents.list(limit);
  }

  /** Waits until every queued channel delivery has settled. */
  drainChannels(timeoutMs?: number): Promise<void> {
    return this.fanOut.drain(timeoutMs);
  }

  channelDiagnostics(): ChannelDiagnostics[] {
    return this.fanOut.diagnostics();
  }

  getStatus(): PipelineStatus {
    const sessions = this.sessions.list();
    return {
      state: this.state,
      agentId: this.config.upstream.agentId,
      channels: this.fanOut.channelIds,
      ...(this.pushServer?.url ? { pushUrl: this.pushServer.url } : {}),
      sessions: sessions.length,
      activeRuns: sessions.filter((session) => session.runInProgress).length
    };
  }

  private assertOpen(): void {
    if (this.state === "stopping" || this.state === "stopped") {
      throw new PipelineError("closed", "Pipeline is shutting down");
    }
  }

  private pumpWaiting(conversationId: string): void {
    const turns = this.waiting.get(conversationId);
    const next = turns?.shift();
    if (!turns || !next) {
      return;
    }
    if (turns.length === 0) {
      this.waiting.delete(conversationId);
    }
    try {
      void this.submitUserMessage(conversationId, next.text).completion.then(next.resolve, next.reject);
    } catch (error) {
      if (isPipelineError(error, "run_active")) {
        // another submitter took the slot; wait for its completion
        const remaining = this.waiting.get(conversationId) ?? [];
        remaining.unshift(next);
        this.waiting.set(conversationId, remaining);
        return;
      }
      next.reject(error);
    }
  }

  private createGateway(fetchImpl: FetchLike | undefined): ThreadRunGateway {
    const apiKey = this.config.upstream.apiKey;
    if (!apiKey) {
      throw new PipelineError("invalid_input", "upstream.apiKey is required when no gateway is supplied");
    }
    return new AssistantsApiGateway({
      apiKey,
      baseUrl: this.config.upstream.baseUrl,
      requestTimeoutMs: this.config.upstream.requestTimeoutMs,
      knownThreads: this.config.upstream.knownThreads,
      fetchImpl,
      runtimeEvents: this.runtimeEvents
    });
  }

  private buildChannels(): Channel[] {
    const names = [...this.config.channels.active];
    if (this.config.push.enabled && !names.includes("push")) {
      names.push("push");
    }

    const channels: Channel[] = [];
    for (const name of names) {
      if (name === "console") {
        channels.push(new ConsoleChannel({ writer: this.config.channels.consoleWriter }));
        continue;
      }
      if (name === "push") {
        channels.push(new PushStreamChannel(this.multiplexer));
        continue;
      }
      const custom = this.config.channels.custom.find((channel) => channel.id === name);
      if (custom) {
        channels.push(custom);
        continue;
      }
      this.runtimeEvents.emit("channel.unknown", { name });
    }
    return channels;
  }
}

export function createPipeline(config: PipelineConfig, deps?: PipelineDependencies): PipelineRuntime {
  return new PipelineRuntime(config, deps);
}
