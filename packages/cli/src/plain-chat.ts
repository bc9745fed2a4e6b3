import readline from "node:readline";
import { conversationIdFor, type PipelineRuntime } from "@threadline/core";
import { renderCommandHints, renderPipelineBoot } from "@threadline/tui";
import { parseSlashCommand, runSlashCommand } from "./commands.js";
import type { LoadedCliConfig } from "./config.js";
import { createCliPipeline, formatRuntimeEvent, print } from "./runtime-common.js";

export function printBoot(pipeline: PipelineRuntime, warnings: string[]): void {
  const status = pipeline.getStatus();
  for (const line of renderPipelineBoot({
    state: status.state,
    agentId: status.agentId,
    userId: pipeline.config.userId,
    channels: status.channels,
    pushUrl: status.pushUrl,
    historyCapacity: pipeline.config.history.capacity
  })) {
    print(line);
  }
  for (const warning of warnings) {
    print(`[threadline] warning: ${warning}`);
  }
}

/** Line-oriented chat; input lines are handled one at a time, so a line typed mid-run waits for it. */
export async function runPlainChat(params: { loaded: LoadedCliConfig; showEvents: boolean }): Promise<number> {
  const { pipeline, warnings } = createCliPipeline(params.loaded, { mode: "plain" });
  let conversationId = conversationIdFor(pipeline.config.upstream.agentId, pipeline.config.userId);
  let settled = false;
  let pending: Promise<void> = Promise.resolve();

  let resolveExit: (code: number) => void = () => undefined;
  const exitPromise = new Promise<number>((resolve) => {
    resolveExit = resolve;
  });

  const unsubscribe = params.showEvents
    ? pipeline.onRuntimeEvent((event) => {
        print(formatRuntimeEvent(event));
      })
    : null;

  await pipeline.start();
  printBoot(pipeline, warnings);
  print(`[threadline] conversation: ${conversationId}`);
  print(renderCommandHints());

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "you> "
  });

  const shutdown = async (code: number): Promise<void> => {
    if (settled) {
      return;
    }
    settled = true;
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    rl.close();
    try {
      await pipeline.stop();
      resolveExit(code);
    } catch (error) {
      print(`[threadline] shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      resolveExit(1);
    } finally {
      unsubscribe?.();
    }
  };

  const handleLine = async (raw: string): Promise<void> => {
    const text = raw.trim();
    if (!text || settled) {
      return;
    }

    const command = parseSlashCommand(text);
    if (command) {
      const result = runSlashCommand({ pipeline, conversationId, ...command });
      if (result.kind === "quit") {
        await shutdown(0);
        return;
      }
      if (result.kind === "switch") {
        conversationId = result.conversationId;
      }
      for (const line of result.lines) {
        print(line);
      }
      return;
    }

    try {
      const outcome = await pipeline.handleUserMessage(conversationId, text);
      if (outcome.error) {
        print(`[threadline] run ${outcome.status}: ${outcome.error.code}: ${outcome.error.message}`);
      }
    } catch (error) {
      print(`[threadline] ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  function onSignal(): void {
    void shutdown(0);
  }

  const runLine = (line: string): void => {
    pending = pending
      .then(() => handleLine(line))
      .catch((error) => {
        print(`[threadline] ${error instanceof Error ? error.message : String(error)}`);
      })
      .finally(() => {
        if (!settled) {
          rl.prompt();
        }
      });
  };

  rl.on("line", runLine);
  rl.on("close", () => {
    void pending.then(() => shutdown(0));
  });
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  rl.prompt();

  return await exitPromise;
}
