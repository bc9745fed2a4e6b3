import type { PipelineStatus } from "@threadline/core";
import { renderMarkdownToTerminal, type TuiTranscriptEntry } from "@threadline/tui";

export type Theme = {
  accent: string;
  muted: string;
  faint: string;
  border: string;
  warn: string;
  error: string;
  ok: string;
};

export const TERMINAL_THEME: Theme = {
  accent: "#38BDF8",
  muted: "#A1A1AA",
  faint: "#71717A",
  border: "#3F3F46",
  warn: "#FBBF24",
  error: "#F87171",
  ok: "#4ADE80"
};

export function pipelineStateColor(theme: Theme, status: PipelineStatus): string {
  if (status.state === "running") {
    return theme.ok;
  }
  if (status.state === "idle" || status.state === "stopping") {
    return theme.warn;
  }
  return theme.error;
}

export function eventThemeColor(theme: Theme, line: string): string {
  const lower = line.toLowerCase();
  if (lower.includes("error") || lower.includes("failed")) {
    return theme.error;
  }
  if (lower.includes("gap") || lower.includes("cancelled") || lower.includes("expired") || lower.includes("overflow")) {
    return theme.warn;
  }
  return theme.muted;
}

/** Last `maxEntries` transcript entries, with assistant markdown flattened for the terminal. */
export function toTranscriptLines(entries: TuiTranscriptEntry[], maxEntries: number): TuiTranscriptEntry[] {
  return entries.slice(-maxEntries).map((entry) => {
    const text = (entry.text || (entry.streaming ? "" : "(empty)")).replace(/\r/g, "");
    return {
      ...entry,
      text: entry.role === "assistant" || entry.role === "user" ? renderMarkdownToTerminal(text) : text
    };
  });
}
