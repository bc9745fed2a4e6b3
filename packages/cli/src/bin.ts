#!/usr/bin/env -S node --import tsx

import { loadCliConfig } from "./config.js";
import { runPlainChat } from "./plain-chat.js";
import { runServe } from "./serve.js";
import { runTuiInk } from "./tui-ink-cycle.js";

type ChatUiMode = "plain" | "tui";

function printHelp(): void {
  process.stdout.write(
    [
      "threadline commands:",
      "  threadline chat [--ui <plain|tui>] [--events]",
      "  threadline serve",
      "  threadline help"
    ].join("\n") + "\n"
  );
}

function parseChatOptions(args: string[]): { uiMode: ChatUiMode; showEvents: boolean; ok: boolean } {
  let uiMode: ChatUiMode = "plain";
  let showEvents = false;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token) {
      continue;
    }
    if (token === "--events") {
      showEvents = true;
      continue;
    }
    let candidate: string | undefined;
    if (token === "--ui") {
      candidate = args[i + 1];
      i += 1;
    } else if (token.startsWith("--ui=")) {
      candidate = token.slice("--ui=".length);
    } else {
      process.stderr.write(`Unknown chat option: ${token}\n`);
      return { uiMode, showEvents, ok: false };
    }

    if (candidate === "plain" || candidate === "tui") {
      uiMode = candidate;
      continue;
    }

    process.stderr.write(`Invalid --ui value: ${candidate ?? ""}. Expected plain|tui.\n`);
    return { uiMode, showEvents, ok: false };
  }

  return { uiMode, showEvents, ok: true };
}

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  if (command === "chat") {
    const parsed = parseChatOptions(args);
    if (!parsed.ok) {
      return 1;
    }
    const loaded = await loadCliConfig();
    if (parsed.uiMode === "tui") {
      if (process.stdin.isTTY && process.stdout.isTTY) {
        return await runTuiInk({ loaded });
      }
      process.stderr.write("--ui tui needs a terminal; falling back to plain\n");
    }
    return await runPlainChat({ loaded, showEvents: parsed.showEvents });
  }

  if (command === "serve") {
    if (args.length > 0) {
      process.stderr.write(`Unknown serve option: ${args[0] ?? ""}\n`);
      return 1;
    }
    return await runServe({ loaded: await loadCliConfig() });
  }

  printHelp();
  return 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
