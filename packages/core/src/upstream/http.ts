import { GatewayTransportError } from "../errors.js";
import { errorMessage } from "../helpers.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonHttpResponse {
  status: number;
  text: string;
  json: unknown;
}

export interface SseEvent {
  event: string;
  data: string;
  id?: string;
}

export function parseJson(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function createTimeoutAbortController(params: {
  timeoutMs: number;
  signal?: AbortSignal;
}): { controller: AbortController; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error(`request timed out after ${params.timeoutMs}ms`)), params.timeoutMs);

  const onAbort = (): void => {
    controller.abort(params.signal?.reason);
  };
  if (params.signal?.aborted) {
    onAbort();
  } else {
    params.signal?.addEventListener("abort", onAbort);
  }

  return {
    controller,
    cleanup: () => {
      clearTimeout(timeout);
      params.signal?.removeEventListener("abort", onAbort);
    }
  };
}

/** Best-effort extraction of `{ error: { message } }` bodies. */
export function upstreamErrorMessage(json: unknown, fallback: string): string {
  if (json && typeof json === "object" && "error" in json) {
    const error = json.error;
    if (typeof error === "string" && error.trim()) {
      return error;
    }
    if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
      return error.message;
    }
  }
  return fallback;
}

export async function requestJsonWithTimeout(params: {
  fetchImpl: FetchLike;
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: Record<string, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<JsonHttpResponse> {
  const timeout = createTimeoutAbortController({
    timeoutMs: params.timeoutMs,
    signal: params.signal
  });

  try {
    const response = await params.fetchImpl(params.url, {
      method: params.method,
      headers: {
        ...(params.body ? { "content-type": "application/json" } : {}),
        ...params.headers
      },
      body: params.body ? JSON.stringify(params.body) : undefined,
      signal: timeout.controller.signal
    });

    const text = await response.text();
    return {
      status: response.status,
      text,
      json: parseJson(text)
    };
  } catch (error) {
    throw new GatewayTransportError(`${params.method} ${params.url} failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    timeout.cleanup();
  }
}

/**
 * Opens a streamed POST. The timeout bounds the wait for response headers;
 * once the stream is open only `signal` ends it.
 */
export async function openSseStream(params: {
  fetchImpl: FetchLike;
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<AsyncGenerator<SseEvent>> {
  const controller = new AbortController();
  const onAbort = (): void => {
    controller.abort(params.signal?.reason);
  };
  if (params.signal?.aborted) {
    onAbort();
  } else {
    params.signal?.addEventListener("abort", onAbort);
  }
  const detach = (): void => {
    params.signal?.removeEventListener("abort", onAbort);
  };
  const headerTimer = setTimeout(
    () => controller.abort(new Error(`request timed out after ${params.timeoutMs}ms`)),
    params.timeoutMs
  );

  let response: Response;
  try {
    response = await params.fetchImpl(params.url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        accept: "text/event-stream, application/json",
        ...params.headers
      },
      body: JSON.stringify(params.body),
      signal: controller.signal
    });
  } catch (error) {
    detach();
    throw new GatewayTransportError(`POST ${params.url} failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    clearTimeout(headerTimer);
  }

  const contentType = (response.headers.get("content-type") ?? "").toLowerCase();
  if (response.status < 200 || response.status >= 300 || !contentType.includes("text/event-stream") || !response.body) {
    detach();
    const text = await response.text().catch(() => "");
    const fallback =
      response.status >= 200 && response.status < 300
        ? `expected an event stream from ${params.url} (content-type: ${contentType || "none"})`
        : `POST ${params.url} returned HTTP ${response.status}`;
    throw new GatewayTransportError(upstreamErrorMessage(parseJson(text), fallback), {
      status: response.status
    });
  }

  return readSseEvents(response.body, detach);
}

export async function* readSseEvents(
  stream: ReadableStream<Uint8Array>,
  onFinish?: () => void
): AsyncGenerator<SseEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();

  let buffer = "";
  let eventName = "";
  let eventId: string | undefined;
  let dataLines: string[] = [];

  const takeEvent = (): SseEvent | null => {
    if (eventName.length === 0 && dataLines.length === 0) {
      return null;
    }
    const event: SseEvent = {
      event: eventName || "message",
      data: dataLines.join("\n"),
      ...(eventId !== undefined ? { id: eventId } : {})
    };
    eventName = "";
    eventId = undefined;
    dataLines = [];
    return event;
  };

  const consumeLine = (rawLine: string): SseEvent | null => {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.length === 0) {
      return takeEvent();
    }
    if (line.startsWith(":")) {
      return null;
    }
    if (line.startsWith("event:")) {
      eventName = line.slice("event:".length).trim();
    } else if (line.startsWith("data:")) {
      const data = line.slice("data:".length);
      dataLines.push(data.startsWith(" ") ? data.slice(1) : data);
    } else if (line.startsWith("id:")) {
      eventId = line.slice("id:".length).trim();
    }
    return null;
  };

  let completed = false;
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let lineBreakIndex = buffer.indexOf("\n");
      while (lineBreakIndex >= 0) {
        const event = consumeLine(buffer.slice(0, lineBreakIndex));
        buffer = buffer.slice(lineBreakIndex + 1);
        if (event) {
          yield event;
        }
        lineBreakIndex = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      consumeLine(buffer);
    }
    const last = takeEvent();
    if (last) {
      yield last;
    }
    completed = true;
  } finally {
    if (!completed) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
    onFinish?.();
  }
}
