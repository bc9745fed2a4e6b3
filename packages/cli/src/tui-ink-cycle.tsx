import { render, type Instance } from "ink";
import React from "react";
import { conversationIdFor } from "@threadline/core";
import type { LoadedCliConfig } from "./config.js";
import { createCliPipeline, print } from "./runtime-common.js";
import { ThreadlineInkApp } from "./tui-ink/app.js";

export async function runTuiInk(params: { loaded: LoadedCliConfig }): Promise<number> {
  const { pipeline, warnings } = createCliPipeline(params.loaded, { mode: "tui" });
  let settled = false;
  let inkApp: Instance | null = null;

  let resolveExit: (code: number) => void = () => undefined;
  const exitPromise = new Promise<number>((resolve) => {
    resolveExit = resolve;
  });

  const shutdown = async (): Promise<void> => {
    if (settled) {
      return;
    }
    settled = true;
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);

    let code = 0;
    try {
      await pipeline.stop();
    } catch (error) {
      code = 1;
      print(`[threadline] shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (inkApp) {
      inkApp.unmount();
      inkApp = null;
    }
    resolveExit(code);
  };

  function onSignal(): void {
    void shutdown();
  }

  await pipeline.start();
  for (const warning of warnings) {
    print(`[threadline] warning: ${warning}`);
  }

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  inkApp = render(
    <ThreadlineInkApp
      pipeline={pipeline}
      initialConversationId={conversationIdFor(pipeline.config.upstream.agentId, pipeline.config.userId)}
      onInterrupt={onSignal}
    />,
    {
      patchConsole: false,
      exitOnCtrlC: false
    }
  );

  return await exitPromise;
}
