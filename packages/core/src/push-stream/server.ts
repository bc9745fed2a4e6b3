import http from "node:http";
import { z } from "zod";
import { isPipelineError } from "../errors.js";
import { serializeEvent, type PipelineEvent } from "../events.js";
import { errorMessage } from "../helpers.js";
import type { RuntimeEventLog } from "../observability.js";
import type { ConversationSnapshot } from "../sessions/session.js";
import { bearerToken, readRequestText, writable } from "./http.js";
import type { ConsumerQueue } from "./queue.js";

const PUSH_STREAM_PING_MS = 15_000;
const PUSH_STREAM_RETRY_MS = 1_000;
const BASE_PATH = "/v1/conversations";

export interface PushStreamBackend {
  attach: (conversationId: string, watermark: number) => Promise<ConsumerQueue>;
  detach: (queue: ConsumerQueue) => Promise<void>;
  /** Throws `run_active` or `invalid_input` synchronously; the turn itself continues in the background. */
  submitUserMessage: (conversationId: string, text: string) => unknown;
  getSession: (conversationId: string) => ConversationSnapshot | null;
}

export interface PushStreamServerOptions {
  host?: string;
  port?: number;
  /** When set, every route except `/healthz` requires this bearer token. */
  token?: string;
  pingMs?: number;
  maxBodyBytes?: number;
  runtimeEvents?: RuntimeEventLog;
}

const messageBodySchema = z.object({
  text: z.string()
});

export function formatSseFrame(event: PipelineEvent): string {
  return `id: ${event.sequenceNo}\nevent: ${event.kind}\ndata: ${serializeEvent(event)}\n\n`;
}

function writeJson(response: http.ServerResponse, statusCode: number, body: Record<string, unknown>): void {
  if (response.headersSent) {
    response.end();
    return;
  }
  response.statusCode = statusCode;
  response.setHeader("content-type", "application/json; charset=utf-8");
  response.end(`${JSON.stringify(body)}\n`);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function parseWatermark(url: URL, request: http.IncomingMessage): number | null {
  const raw = url.searchParams.get("watermark") ?? headerValue(request.headers["last-event-id"]) ?? "0";
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

export class PushStreamServer {
  private readonly backend: PushStreamBackend;
  private readonly host: string;
  private readonly port: number;
  private readonly token?: string;
  private readonly pingMs: number;
  private readonly maxBodyBytes?: number;
  private readonly runtimeEvents?: RuntimeEventLog;
  private readonly streams = new Set<http.ServerResponse>();
  private server: http.Server | null = null;
  private baseUrl: string | undefined;

  constructor(backend: PushStreamBackend, options: PushStreamServerOptions = {}) {
    this.backend = backend;
    this.host = options.host?.trim() || "127.0.0.1";
    this.port = options.port ?? 8790;
    this.token = options.token?.trim() || undefined;
    this.pingMs = options.pingMs ?? PUSH_STREAM_PING_MS;
    this.maxBodyBytes = options.maxBodyBytes;
    this.runtimeEvents = options.runtimeEvents;
  }

  get url(): string | undefined {
    return this.baseUrl;
  }

  async start(): Promise<string> {
    if (this.server && this.baseUrl) {
      return this.baseUrl;
    }

    const server = http.createServer((request, response) => {
      void this.handle(request, response).catch((error) => {
        this.runtimeEvents?.emit("push.server.request_failed", {
          method: request.method,
          url: request.url,
          error: errorMessage(error)
        });
        writeJson(response, 500, {
          ok: false,
          error: errorMessage(error)
        });
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    const port = address && typeof address === "object" ? address.port : this.port;
    this.server = server;
    this.baseUrl = `http://${this.host}:${port}`;
    this.runtimeEvents?.emit("push.server.listening", { url: this.baseUrl });
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    for (const stream of Array.from(this.streams)) {
      stream.end();
    }
    this.streams.clear();

    const server = this.server;
    this.server = null;
    this.baseUrl = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private authorized(request: http.IncomingMessage, url: URL): boolean {
    if (!this.token) {
      return true;
    }
    const bearer = bearerToken(request.headers.authorization) ?? url.searchParams.get("token");
    return bearer === this.token;
  }

  private async handle(request: http.IncomingMessage, response: http.ServerResponse): Promise<void> {
    const method = (request.method ?? "GET").toUpperCase();
    const url = new URL(request.url ?? "/", "http://127.0.0.1");
    const pathname = url.pathname;

    if (method === "GET" && pathname === "/healthz") {
      writeJson(response, 200, { ok: true });
      return;
    }

    if (!this.authorized(request, url)) {
      writeJson(response, 401, { ok: false, error: "unauthorized" });
      return;
    }

    const match = pathname.match(/^\/v1\/conversations\/([^/]+)(?:\/(events|messages))?$/);
    if (!match?.[1]) {
      writeJson(response, 404, { ok: false, error: "not_found" });
      return;
    }
    const conversationId = decodeSegment(match[1]);
    if (!conversationId) {
      writeJson(response, 400, { ok: false, error: "invalid_input", message: "Malformed conversation id" });
      return;
    }
    const action = match[2];

    if (method === "GET" && action === "events") {
      const watermark = parseWatermark(url, request);
      if (watermark === null) {
        writeJson(response, 400, { ok: false, error: "invalid_input", message: "Watermark must be a non-negative integer" });
        return;
      }
      await this.stream(request, response, conversationId, watermark);
      return;
    }

    if (method === "POST" && action === "messages") {
      await this.acceptMessage(request, response, conversationId);
      return;
    }

    if (method === "GET" && action === undefined) {
      const snapshot = this.backend.getSession(conversationId);
      if (!snapshot) {
        writeJson(response, 404, { ok: false, error: "unknown_conversation", conversationId });
        return;
      }
      writeJson(response, 200, { ok: true, session: snapshot });
      return;
    }

    writeJson(response, 405, { ok: false, error: "method_not_allowed", path: `${BASE_PATH}/${match[1]}` });
  }

  private async acceptMessage(
    request: http.IncomingMessage,
    response: http.ServerResponse,
    conversationId: string
  ): Promise<void> {
    let bodyText = "";
    try {
      bodyText = await readRequestText(request, this.maxBodyBytes);
    } catch (error) {
      writeJson(response, 413, { ok: false, error: errorMessage(error) });
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(bodyText);
    } catch {
      writeJson(response, 400, { ok: false, error: "invalid_input", message: "Body must be JSON" });
      return;
    }
    const parsed = messageBodySchema.safeParse(payload);
    if (!parsed.success) {
      writeJson(response, 400, { ok: false, error: "invalid_input", message: "Body must look like {\"text\": string}" });
      return;
    }

    try {
      this.backend.submitUserMessage(conversationId, parsed.data.text);
    } catch (error) {
      if (isPipelineError(error, "run_active")) {
        writeJson(response, 409, { ok: false, error: "run_active", message: error.message });
        return;
      }
      if (isPipelineError(error, "invalid_input")) {
        writeJson(response, 400, { ok: false, error: "invalid_input", message: error.message });
        return;
      }
      if (isPipelineError(error, "closed")) {
        writeJson(response, 503, { ok: false, error: "closed", message: error.message });
        return;
      }
      throw error;
    }
    writeJson(response, 202, { ok: true, conversationId });
  }

  private async stream(
    request: http.IncomingMessage,
    response: http.ServerResponse,
    conversationId: string,
    watermark: number
  ): Promise<void> {
    let disconnected = false;
    const onDisconnect = (): void => {
      disconnected = true;
    };
    response.once("close", onDisconnect);

    let queue: ConsumerQueue;
    try {
      queue = await this.backend.attach(conversationId, watermark);
    } catch (error) {
      if (isPipelineError(error, "invalid_input")) {
        writeJson(response, 400, { ok: false, error: "invalid_input", message: error.message });
        return;
      }
      throw error;
    } finally {
      response.off("close", onDisconnect);
    }

    let released = false;
    let ping: NodeJS.Timeout | undefined;
    const release = (): void => {
      if (released) {
        return;
      }
      released = true;
      clearInterval(ping);
      this.streams.delete(response);
      this.backend.detach(queue).catch((error) => {
        this.runtimeEvents?.emit("push.server.request_failed", {
          conversationId,
          consumerId: queue.id,
          error: errorMessage(error)
        });
      });
    };

    if (disconnected || request.destroyed || response.destroyed) {
      release();
      return;
    }
    response.on("close", release);
    response.on("error", release);

    response.statusCode = 200;
    response.setHeader("content-type", "text/event-stream; charset=utf-8");
    response.setHeader("cache-control", "no-cache, no-transform");
    response.setHeader("connection", "keep-alive");
    response.setHeader("x-accel-buffering", "no");
    response.flushHeaders();
    response.write(`retry: ${PUSH_STREAM_RETRY_MS}\n\n`);
    this.streams.add(response);

    ping = setInterval(() => {
      if (!response.writableEnded) {
        response.write(": keepalive\n\n");
      }
    }, this.pingMs);

    for await (const event of queue) {
      if (response.writableEnded || response.destroyed) {
        break;
      }
      if (!response.write(formatSseFrame(event))) {
        // events arriving meanwhile wait in the consumer queue
        await writable(response);
      }
    }
    release();
    if (!response.writableEnded) {
      response.end();
    }
  }
}
