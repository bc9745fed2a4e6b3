import type { ConversationSnapshot, PipelineEvent } from "@threadline/core";

export interface TuiBootSnapshot {
  state: string;
  agentId: string;
  userId: string;
  channels: string[];
  pushUrl?: string;
  historyCapacity?: number;
}

export type TuiTranscriptRole = "user" | "assistant" | "tool" | "system" | "error";

export interface TuiTranscriptEntry {
  id: string;
  role: TuiTranscriptRole;
  conversationId: string;
  /** Upstream message id for assistant entries. */
  messageId?: string;
  text: string;
  streaming?: boolean;
}

const LINE_PREFIX = "[threadline] ";

function line(text: string): string {
  return `${LINE_PREFIX}${text}`;
}

export function stripLinePrefix(value: string): string {
  return value.startsWith(LINE_PREFIX) ? value.slice(LINE_PREFIX.length) : value;
}

function stripInlineMarkdown(value: string): string {
  return value
    .replace(/!\[([^\]]*)\]\(([^)]+)\)/g, "$1 ($2)")
    .replace(/\[([^\]]+)\]\(([^)]+)\)/g, "$1 ($2)")
    .replace(/`([^`]+)`/g, "$1")
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/__([^_]+)__/g, "$1")
    .replace(/\*([^*]+)\*/g, "$1")
    .replace(/_([^_]+)_/g, "$1")
    .replace(/~~([^~]+)~~/g, "$1");
}

function renderMarkdownLine(rawLine: string): string {
  const heading = rawLine.match(/^\s{0,3}#{1,6}\s+(.*)$/);
  if (heading) {
    return stripInlineMarkdown(heading[1] ?? "").toUpperCase();
  }
  if (/^\s*([-*_])\1{2,}\s*$/.test(rawLine)) {
    return "----";
  }
  const quote = rawLine.match(/^\s*>\s?(.*)$/);
  if (quote) {
    return `| ${stripInlineMarkdown(quote[1] ?? "")}`;
  }
  const bullet = rawLine.match(/^(\s*)[-*+]\s+(.*)$/);
  if (bullet) {
    const depth = Math.min(3, Math.floor((bullet[1] ?? "").length / 2));
    return `${"  ".repeat(depth)}- ${stripInlineMarkdown(bullet[2] ?? "")}`;
  }
  const numbered = rawLine.match(/^(\s*)(\d+)[.)]\s+(.*)$/);
  if (numbered) {
    const depth = Math.min(3, Math.floor((numbered[1] ?? "").length / 2));
    return `${"  ".repeat(depth)}${numbered[2]}. ${stripInlineMarkdown(numbered[3] ?? "")}`;
  }
  return stripInlineMarkdown(rawLine);
}

/** Flattens assistant markdown into plain terminal text; fenced code is indented, blank runs collapse to one. */
export function renderMarkdownToTerminal(markdown: string): string {
  const normalized = markdown.replace(/\r\n?/g, "\n");
  if (!normalized.trim()) {
    return "";
  }

  const output: string[] = [];
  let inFence = false;
  for (const rawLine of normalized.split("\n")) {
    if (/^\s*```/.test(rawLine)) {
      inFence = !inFence;
      if (!inFence) {
        output.push("");
      }
      continue;
    }
    output.push(inFence ? (rawLine ? `    ${rawLine}` : "") : renderMarkdownLine(rawLine));
  }

  const collapsed: string[] = [];
  for (const text of output) {
    const blank = text.trim().length === 0;
    if (blank && (collapsed.length === 0 || collapsed[collapsed.length - 1] === "")) {
      continue;
    }
    collapsed.push(blank ? "" : text);
  }
  while (collapsed[collapsed.length - 1] === "") {
    collapsed.pop();
  }
  return collapsed.join("\n");
}

export function renderPipelineBoot(snapshot: TuiBootSnapshot): string[] {
  const rule = line("========================================");
  const lines = [rule];
  lines.push(line(`pipeline: ${snapshot.state} | agent=${snapshot.agentId} | user=${snapshot.userId}`));
  lines.push(line(`channels: ${snapshot.channels.length > 0 ? snapshot.channels.join(", ") : "(none)"}`));
  if (snapshot.pushUrl) {
    lines.push(line(`push: ${snapshot.pushUrl}`));
  }
  if (snapshot.historyCapacity !== undefined) {
    lines.push(line(`history: ${snapshot.historyCapacity} events per conversation`));
  }
  lines.push(rule);
  return lines;
}

export function renderSessionSummary(sessions: ConversationSnapshot[], activeConversationId?: string): string[] {
  if (sessions.length === 0) {
    return [line("conversations: (none)")];
  }
  const lines = [line("conversations:")];
  for (const session of sessions) {
    const marker = session.conversationId === activeConversationId ? "*" : " ";
    lines.push(
      line(
        `${marker} ${session.conversationId} thread=${session.threadId ?? "(none)"} seq=${session.lastSequenceNo} consumers=${session.attachedConsumers}${session.runState === "idle" ? "" : ` [${session.runState}]`}`
      )
    );
  }
  return lines;
}

export function renderCommandHints(): string {
  return line("commands: /help /status /sessions /channels /events [n] /user <id> /quit");
}

/** One signal line per event; fragments stream into the transcript instead. */
export function renderPipelineEvent(event: PipelineEvent): string | null {
  const scope = `[${event.conversationId}#${event.sequenceNo}]`;
  switch (event.kind) {
    case "fragment":
      return null;
    case "finalized":
      return line(`${scope} message ${event.messageId} finalized (${event.payload.text.length} chars)`);
    case "tool_call":
      return line(
        `${scope} tool ${event.payload.toolName}: ${event.payload.ok ? "ok" : `failed (${event.payload.message})`}`
      );
    case "status":
      return line(`${scope} run ${event.payload.runId}: ${event.payload.status}`);
    case "error":
      return line(`${scope} error ${event.payload.code}: ${event.payload.message}`);
    case "gap":
      return line(
        `${scope} gap: events ${event.payload.requestedWatermark + 1}-${event.payload.oldestRetained - 1} dropped`
      );
  }
}
