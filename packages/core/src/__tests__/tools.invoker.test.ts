import { describe, expect, it } from "vitest";
import { z } from "zod";
import { RuntimeEventLog } from "../observability.js";
import { defineTool } from "../tools/definition.js";
import { ToolInvoker, parseToolArguments, serializeEnvelope } from "../tools/invoker.js";

const context = { conversationId: "asst_1:alice", runId: "run_1" };

const lookupTool = defineTool({
  name: "lookup",
  description: "Look up a widget",
  parameters: z.object({
    id: z.number()
  }),
  execute: async ({ id }) => ({ id, name: "widget" })
});

describe("tool invoker", () => {
  it("wraps a successful result", async () => {
    const invoker = new ToolInvoker({ tools: [lookupTool] });
    const envelope = await invoker.invoke({ callId: "call_1", toolName: "lookup", arguments: '{"id":42}' }, context);
    expect(envelope).toEqual({ status: true, message: "Success", result: { id: 42, name: "widget" } });
  });

  it("reports unknown tools", async () => {
    const invoker = new ToolInvoker({ tools: [lookupTool] });
    const envelope = await invoker.invoke({ callId: "call_1", toolName: "nope", arguments: "{}" }, context);
    expect(envelope).toEqual({ status: false, message: "unknown tool: nope", result: null });
  });

  it("reports malformed JSON arguments", async () => {
    const invoker = new ToolInvoker({ tools: [lookupTool] });
    const envelope = await invoker.invoke({ callId: "call_1", toolName: "lookup", arguments: "{id:" }, context);
    expect(envelope).toEqual({
      status: false,
      message: "invalid arguments for lookup: arguments are not valid JSON",
      result: null
    });
  });

  it("reports the first schema issue", async () => {
    const invoker = new ToolInvoker({ tools: [lookupTool] });
    const envelope = await invoker.invoke({ callId: "call_1", toolName: "lookup", arguments: '{"id":"x"}' }, context);
    expect(envelope.status).toBe(false);
    expect(envelope.message).toBe("invalid arguments for lookup: id: Expected number, received string");
  });

  it("turns a thrown error into a failure envelope and logs it", async () => {
    const runtimeEvents = new RuntimeEventLog();
    const invoker = new ToolInvoker({
      tools: {
        explode: () => {
          throw new Error("kaboom");
        }
      },
      runtimeEvents
    });
    const envelope = await invoker.invoke({ callId: "call_7", toolName: "explode", arguments: "" }, context);
    expect(envelope).toEqual({ status: false, message: "kaboom", result: null });
    expect(runtimeEvents.list().map((event) => event.type)).toEqual(["tool.call.started", "tool.call.failed"]);
    expect(runtimeEvents.list()[1]?.payload).toMatchObject({
      conversationId: "asst_1:alice",
      runId: "run_1",
      callId: "call_7",
      toolName: "explode",
      message: "kaboom"
    });
  });

  it("accepts a plain function map and normalizes results to JSON", async () => {
    const invoker = new ToolInvoker({
      tools: {
        echo: (args) => args,
        nothing: () => undefined
      }
    });
    expect(invoker.listNames()).toEqual(["echo", "nothing"]);
    await expect(
      invoker.invoke({ callId: "c1", toolName: "echo", arguments: '{"a":[1,2]}' }, context)
    ).resolves.toEqual({ status: true, message: "Success", result: { a: [1, 2] } });
    await expect(
      invoker.invoke({ callId: "c2", toolName: "nothing", arguments: "{}" }, context)
    ).resolves.toEqual({ status: true, message: "Success", result: null });
  });

  it("times out slow tools", async () => {
    const invoker = new ToolInvoker({
      tools: {
        stall: () => new Promise(() => undefined)
      },
      timeoutMs: 20
    });
    const envelope = await invoker.invoke({ callId: "c1", toolName: "stall", arguments: "{}" }, context);
    expect(envelope).toEqual({ status: false, message: "tool stall timed out after 20ms", result: null });
  });

  it("truncates results over the output budget", async () => {
    const invoker = new ToolInvoker({
      tools: {
        dump: () => "abcdefghij".repeat(10)
      },
      maxOutputTokens: 10,
      charsPerToken: 4
    });
    const envelope = await invoker.invoke({ callId: "c1", toolName: "dump", arguments: "{}" }, context);
    expect(envelope).toEqual({
      status: true,
      message: "Success (truncated)",
      result: "[truncated 81 chars]\nbcdefghijabcdefghij"
    });
  });

  it("rejects duplicate tool names", () => {
    expect(() => new ToolInvoker({ tools: [lookupTool, lookupTool] })).toThrow("Duplicate tool name: lookup");
  });
});

describe("tool argument helpers", () => {
  it("parses JSON strings and passes objects through", () => {
    expect(parseToolArguments('{"id":1}')).toEqual({ ok: true, value: { id: 1 } });
    expect(parseToolArguments("")).toEqual({ ok: true, value: {} });
    expect(parseToolArguments({ id: 2 })).toEqual({ ok: true, value: { id: 2 } });
    expect(parseToolArguments("{")).toEqual({ ok: false, raw: "{" });
  });

  it("serializes envelopes with a fixed key order", () => {
    expect(serializeEnvelope({ result: null, message: "unknown tool: x", status: false })).toBe(
      '{"status":false,"message":"unknown tool: x","result":null}'
    );
  });
});
