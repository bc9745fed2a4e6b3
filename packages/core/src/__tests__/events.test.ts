import { describe, expect, it } from "vitest";
import {
  conversationIdFor,
  createGapEvent,
  isTerminalEvent,
  isTerminalRunStatus,
  parseConversationId,
  serializeEvent,
  stampEvent
} from "../events.js";

const stamp = { conversationId: "asst_1:alice", sequenceNo: 7, timestamp: "2026-01-01T00:00:00.000Z" };

describe("pipeline events", () => {
  it("stamps drafts into frozen events", () => {
    const event = stampEvent({ kind: "status", payload: { runId: "run_1", status: "completed" } }, stamp);
    expect(event).toEqual({
      kind: "status",
      conversationId: "asst_1:alice",
      sequenceNo: 7,
      timestamp: "2026-01-01T00:00:00.000Z",
      payload: { runId: "run_1", status: "completed" }
    });
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(isTerminalEvent(event)).toBe(true);
  });

  it("places a gap marker directly before the oldest retained event", () => {
    const gap = createGapEvent({
      conversationId: "asst_1:alice",
      requestedWatermark: 0,
      oldestRetained: 3,
      timestamp: "2026-01-01T00:00:00.000Z"
    });
    expect(gap.sequenceNo).toBe(2);
    expect(gap.payload).toEqual({ requestedWatermark: 0, oldestRetained: 3 });
    expect(isTerminalEvent(gap)).toBe(false);
  });

  it("serializes events as JSON", () => {
    const event = stampEvent({ kind: "fragment", messageId: "msg_1", payload: { text: "hi" } }, stamp);
    expect(serializeEvent(event)).toBe(
      '{"kind":"fragment","messageId":"msg_1","payload":{"text":"hi"},"conversationId":"asst_1:alice","sequenceNo":7,"timestamp":"2026-01-01T00:00:00.000Z"}'
    );
  });

  it("recognizes terminal run statuses", () => {
    expect(["completed", "failed", "cancelled", "expired", "incomplete"].every(isTerminalRunStatus)).toBe(true);
    expect(isTerminalRunStatus("in_progress")).toBe(false);
    expect(isTerminalRunStatus("requires_action")).toBe(false);
  });

  it("builds and splits conversation ids at the first colon", () => {
    expect(conversationIdFor("asst_1", "team:alice")).toBe("asst_1:team:alice");
    expect(parseConversationId("asst_1:team:alice")).toEqual({ agentId: "asst_1", userId: "team:alice" });
    expect(() => conversationIdFor("asst:1", "alice")).toThrow("agentId must not contain ':' (asst:1)");
    expect(() => parseConversationId("no-separator")).toThrow(
      'Conversation id must look like <agentId>:<userId> (got "no-separator")'
    );
  });
});
