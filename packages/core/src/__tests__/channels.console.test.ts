import { describe, expect, it } from "vitest";
import { ConsoleChannel } from "../channels/console.js";
import { stampEvent, type PipelineEventDraft } from "../events.js";

function publishAll(channel: ConsoleChannel, drafts: PipelineEventDraft[]): void {
  drafts.forEach((draft, index) => {
    channel.publish(
      stampEvent(draft, {
        conversationId: "asst_1:alice",
        sequenceNo: index + 1,
        timestamp: "2026-01-01T00:00:00.000Z"
      })
    );
  });
}

describe("console channel", () => {
  it("prints fragments inline and ends the line on finalize", () => {
    let output = "";
    const channel = new ConsoleChannel({ writer: { write: (text) => (output += text) } });

    publishAll(channel, [
      { kind: "fragment", messageId: "msg_1", payload: { text: "He" } },
      { kind: "fragment", messageId: "msg_1", payload: { text: "llo!" } },
      { kind: "finalized", messageId: "msg_1", payload: { text: "Hello!" } },
      { kind: "status", payload: { runId: "run_1", status: "completed" } }
    ]);

    expect(output).toBe("Hello!\n[run] run_1 completed\n");
  });

  it("forgets streamed messages once the run ends", () => {
    let output = "";
    const channel = new ConsoleChannel({ writer: { write: (text) => (output += text) } });

    publishAll(channel, [
      { kind: "fragment", messageId: "msg_1", payload: { text: "Partial" } },
      { kind: "error", payload: { code: "transport_error", message: "socket closed", runId: "run_1" } },
      { kind: "finalized", messageId: "msg_1", payload: { text: "Partial answer" } }
    ]);

    expect(output).toBe("Partial\n[error] transport_error: socket closed\nPartial answer\n");
  });

  it("prints the finalized text when no fragments arrived", () => {
    let output = "";
    const channel = new ConsoleChannel({ writer: { write: (text) => (output += text) } });

    publishAll(channel, [{ kind: "finalized", messageId: "msg_1", payload: { text: "Whole answer" } }]);

    expect(output).toBe("Whole answer\n");
  });

  it("breaks a pending line before tool and error lines", () => {
    let output = "";
    const channel = new ConsoleChannel({ writer: { write: (text) => (output += text) } });

    publishAll(channel, [
      { kind: "fragment", messageId: "msg_1", payload: { text: "Checking" } },
      {
        kind: "tool_call",
        payload: { callId: "call_1", toolName: "lookup", arguments: { id: 42 }, runId: "run_1", ok: true, message: "Success" }
      },
      {
        kind: "tool_call",
        payload: { callId: "call_2", toolName: "nope", arguments: {}, runId: "run_1", ok: false, message: "unknown tool: nope" }
      },
      { kind: "error", payload: { code: "stream_ended", message: "Run stream ended before a terminal status" } }
    ]);

    expect(output).toBe(
      [
        "Checking",
        "[tool] lookup ok",
        "[tool] nope failed: unknown tool: nope",
        "[error] stream_ended: Run stream ended before a terminal status",
        ""
      ].join("\n")
    );
  });
});
