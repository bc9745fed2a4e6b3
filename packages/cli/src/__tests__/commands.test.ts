import { describe, expect, it } from "vitest";
import { createPipeline } from "@threadline/core";
import { parseSlashCommand, runSlashCommand } from "../commands.js";

const conversationId = "asst_1:alice";

function idlePipeline() {
  return createPipeline({
    upstream: { agentId: "asst_1", apiKey: "test-secret" },
    channels: { active: ["console", "pager"], consoleWriter: { write: () => undefined } }
  });
}

describe("parseSlashCommand", () => {
  it("splits the command name from its arguments", () => {
    expect(parseSlashCommand("  /Events 5 ")).toEqual({ name: "events", args: ["5"] });
    expect(parseSlashCommand("/quit")).toEqual({ name: "quit", args: [] });
    expect(parseSlashCommand("hello /status")).toBeNull();
  });
});

describe("runSlashCommand", () => {
  it("reports pipeline status, sessions and channels", () => {
    const pipeline = idlePipeline();

    expect(runSlashCommand({ pipeline, conversationId, name: "status", args: [] })).toEqual({
      kind: "output",
      lines: ["[threadline] pipeline: idle agent=asst_1 conversation=asst_1:alice sessions=0 activeRuns=0"]
    });
    expect(runSlashCommand({ pipeline, conversationId, name: "sessions", args: [] })).toEqual({
      kind: "output",
      lines: ["[threadline] conversations: (none)"]
    });
    expect(runSlashCommand({ pipeline, conversationId, name: "channels", args: [] })).toEqual({
      kind: "output",
      lines: ["[threadline] channel console delivered=0 failed=0"]
    });
  });

  it("prints the most recent runtime events", () => {
    const result = runSlashCommand({ pipeline: idlePipeline(), conversationId, name: "events", args: ["1"] });

    expect(result.kind).toBe("output");
    const lines = result.kind === "output" ? result.lines : [];
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[threadline\]\[event\] \S+ channel\.unknown name=pager$/);
  });

  it("switches conversation for /user", () => {
    const pipeline = idlePipeline();

    expect(runSlashCommand({ pipeline, conversationId, name: "user", args: ["bob"] })).toEqual({
      kind: "switch",
      conversationId: "asst_1:bob",
      lines: ["[threadline] conversation: asst_1:bob"]
    });
    expect(runSlashCommand({ pipeline, conversationId, name: "user", args: [] })).toEqual({
      kind: "output",
      lines: ["[threadline] usage: /user <id>"]
    });
  });

  it("handles quit and unknown commands", () => {
    const pipeline = idlePipeline();

    expect(runSlashCommand({ pipeline, conversationId, name: "exit", args: [] })).toEqual({ kind: "quit" });
    expect(runSlashCommand({ pipeline, conversationId, name: "nope", args: [] })).toEqual({
      kind: "output",
      lines: ["[threadline] unknown command: /nope (try /help)"]
    });
  });
});
