import type { PipelineEvent } from "@threadline/core";
import { renderPipelineEvent, stripLinePrefix, type TuiTranscriptEntry } from "@threadline/tui";

const DEFAULT_MAX_TRANSCRIPT = 300;
const DEFAULT_MAX_EVENTS = 300;

export interface TuiConversationBuffers {
  transcript: TuiTranscriptEntry[];
  events: string[];
  /** Transcript entry id of each assistant message still streaming. */
  streamingByMessage: Map<string, string>;
  lastSequenceByConversation: Map<string, number>;
  nextEntryId: number;
}

export function createTuiConversationBuffers(): TuiConversationBuffers {
  return {
    transcript: [],
    events: [],
    streamingByMessage: new Map<string, string>(),
    lastSequenceByConversation: new Map<string, number>(),
    nextEntryId: 0
  };
}

function trimEvents(buffers: TuiConversationBuffers, maxEvents: number = DEFAULT_MAX_EVENTS): void {
  if (buffers.events.length > maxEvents) {
    buffers.events.splice(0, buffers.events.length - maxEvents);
  }
}

function trimTranscript(buffers: TuiConversationBuffers, maxTranscript: number = DEFAULT_MAX_TRANSCRIPT): void {
  if (buffers.transcript.length <= maxTranscript) {
    return;
  }
  const removed = new Set(buffers.transcript.splice(0, buffers.transcript.length - maxTranscript).map((entry) => entry.id));
  for (const [messageId, entryId] of buffers.streamingByMessage) {
    if (removed.has(entryId)) {
      buffers.streamingByMessage.delete(messageId);
    }
  }
}

function appendEntry(buffers: TuiConversationBuffers, entry: Omit<TuiTranscriptEntry, "id">): TuiTranscriptEntry {
  buffers.nextEntryId += 1;
  const created: TuiTranscriptEntry = { id: `m-${buffers.nextEntryId}`, ...entry };
  buffers.transcript.push(created);
  trimTranscript(buffers);
  return created;
}

export function pushEventLine(buffers: TuiConversationBuffers, line: string): void {
  const normalized = stripLinePrefix(line.trim());
  if (!normalized) {
    return;
  }
  buffers.events.push(normalized);
  trimEvents(buffers);
}

export function pushEventLines(buffers: TuiConversationBuffers, lines: string[]): void {
  for (const line of lines) {
    pushEventLine(buffers, line);
  }
}

export function pushUserMessage(buffers: TuiConversationBuffers, params: { conversationId: string; text: string }): void {
  const text = params.text.trim();
  if (text) {
    appendEntry(buffers, { role: "user", conversationId: params.conversationId, text });
  }
}

/** Highest sequence number applied for a conversation; the watermark to reattach with. */
export function lastAppliedSequence(buffers: TuiConversationBuffers, conversationId: string): number {
  return buffers.lastSequenceByConversation.get(conversationId) ?? 0;
}

function streamingEntry(buffers: TuiConversationBuffers, conversationId: string, messageId: string): TuiTranscriptEntry {
  const entryId = buffers.streamingByMessage.get(messageId);
  const existing = entryId ? buffers.transcript.find((entry) => entry.id === entryId) : undefined;
  if (existing) {
    return existing;
  }
  const created = appendEntry(buffers, {
    role: "assistant",
    conversationId,
    messageId,
    text: "",
    streaming: true
  });
  buffers.streamingByMessage.set(messageId, created.id);
  return created;
}

function settleStreaming(buffers: TuiConversationBuffers, conversationId: string): void {
  for (const entry of buffers.transcript) {
    if (entry.conversationId === conversationId && entry.streaming) {
      entry.streaming = false;
      if (entry.messageId) {
        buffers.streamingByMessage.delete(entry.messageId);
      }
    }
  }
}

/** Applies one event; events at or below the conversation's applied sequence are ignored. */
export function applyPipelineEvent(buffers: TuiConversationBuffers, event: PipelineEvent): void {
  if (event.sequenceNo <= lastAppliedSequence(buffers, event.conversationId)) {
    return;
  }
  buffers.lastSequenceByConversation.set(event.conversationId, event.sequenceNo);

  const signal = renderPipelineEvent(event);
  if (signal) {
    pushEventLine(buffers, signal);
  }

  switch (event.kind) {
    case "fragment":
      streamingEntry(buffers, event.conversationId, event.messageId).text += event.payload.text;
      return;
    case "finalized": {
      const entry = streamingEntry(buffers, event.conversationId, event.messageId);
      entry.text = event.payload.text;
      entry.streaming = false;
      buffers.streamingByMessage.delete(event.messageId);
      return;
    }
    case "tool_call":
      appendEntry(buffers, {
        role: "tool",
        conversationId: event.conversationId,
        text: event.payload.ok
          ? `${event.payload.toolName} ok`
          : `${event.payload.toolName} failed: ${event.payload.message}`
      });
      return;
    case "status":
      settleStreaming(buffers, event.conversationId);
      return;
    case "error":
      settleStreaming(buffers, event.conversationId);
      appendEntry(buffers, {
        role: "error",
        conversationId: event.conversationId,
        text: `${event.payload.code}: ${event.payload.message}`
      });
      return;
    case "gap":
      appendEntry(buffers, {
        role: "system",
        conversationId: event.conversationId,
        text: `events ${event.payload.requestedWatermark + 1}-${event.payload.oldestRetained - 1} are no longer retained`
      });
      return;
  }
}
