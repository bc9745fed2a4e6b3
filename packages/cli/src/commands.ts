import { conversationIdFor, type PipelineRuntime } from "@threadline/core";
import { renderCommandHints, renderSessionSummary } from "@threadline/tui";
import { formatRuntimeEvent } from "./runtime-common.js";

export type CommandResult =
  | { kind: "quit" }
  | { kind: "output"; lines: string[] }
  | { kind: "switch"; conversationId: string; lines: string[] };

const DEFAULT_EVENT_LINES = 10;

export function parseSlashCommand(raw: string): { name: string; args: string[] } | null {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("/")) {
    return null;
  }
  const [head = "", ...args] = trimmed.slice(1).split(/\s+/);
  return { name: head.toLowerCase(), args };
}

export function runSlashCommand(params: {
  pipeline: PipelineRuntime;
  conversationId: string;
  name: string;
  args: string[];
}): CommandResult {
  const { pipeline, conversationId, name, args } = params;

  switch (name) {
    case "quit":
    case "exit":
      return { kind: "quit" };
    case "help":
      return { kind: "output", lines: [renderCommandHints()] };
    case "status": {
      const status = pipeline.getStatus();
      return {
        kind: "output",
        lines: [
          `[threadline] pipeline: ${status.state} agent=${status.agentId} conversation=${conversationId} sessions=${status.sessions} activeRuns=${status.activeRuns}${status.pushUrl ? ` push=${status.pushUrl}` : ""}`
        ]
      };
    }
    case "sessions":
      return { kind: "output", lines: renderSessionSummary(pipeline.listSessions(), conversationId) };
    case "channels": {
      const diagnostics = pipeline.channelDiagnostics();
      if (diagnostics.length === 0) {
        return { kind: "output", lines: ["[threadline] channels: (none)"] };
      }
      return {
        kind: "output",
        lines: diagnostics.map(
          (entry) =>
            `[threadline] channel ${entry.channelId} delivered=${entry.delivered} failed=${entry.failed}${entry.lastError ? ` lastError=${entry.lastError}` : ""}`
        )
      };
    }
    case "events": {
      const requested = Number.parseInt(args[0] ?? "", 10);
      const limit = Number.isFinite(requested) && requested > 0 ? requested : DEFAULT_EVENT_LINES;
      const events = pipeline.listRuntimeEvents(limit);
      return {
        kind: "output",
        lines: events.length > 0 ? events.map(formatRuntimeEvent) : ["[threadline] events: (none)"]
      };
    }
    case "user": {
      const userId = args[0]?.trim();
      if (!userId) {
        return { kind: "output", lines: ["[threadline] usage: /user <id>"] };
      }
      try {
        const next = conversationIdFor(pipeline.config.upstream.agentId, userId);
        return { kind: "switch", conversationId: next, lines: [`[threadline] conversation: ${next}`] };
      } catch (error) {
        return { kind: "output", lines: [`[threadline] ${error instanceof Error ? error.message : String(error)}`] };
      }
    }
    default:
      return { kind: "output", lines: [`[threadline] unknown command: /${name} (try /help)`] };
  }
}
