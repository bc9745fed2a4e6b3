import type { LoadedCliConfig } from "./config.js";
import { printBoot } from "./plain-chat.js";
import { createCliPipeline, formatRuntimeEvent, print } from "./runtime-common.js";

/** Headless mode: push server plus configured channels, runtime events on stdout, stops on SIGINT/SIGTERM. */
export async function runServe(params: { loaded: LoadedCliConfig }): Promise<number> {
  const { pipeline, warnings } = createCliPipeline(params.loaded, { mode: "serve" });
  let settled = false;

  let resolveExit: (code: number) => void = () => undefined;
  const exitPromise = new Promise<number>((resolve) => {
    resolveExit = resolve;
  });

  const unsubscribe = pipeline.onRuntimeEvent((event) => {
    print(formatRuntimeEvent(event));
  });

  const shutdown = async (): Promise<void> => {
    if (settled) {
      return;
    }
    settled = true;
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    try {
      await pipeline.stop();
      resolveExit(0);
    } catch (error) {
      print(`[threadline] shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      resolveExit(1);
    } finally {
      unsubscribe();
    }
  };

  function onSignal(): void {
    void shutdown();
  }

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  await pipeline.start();
  printBoot(pipeline, warnings);
  print("[threadline] serving. POST /v1/conversations/:id/messages, stream /v1/conversations/:id/events");
  return await exitPromise;
}
