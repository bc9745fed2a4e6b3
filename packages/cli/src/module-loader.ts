import path from "node:path";
import { pathToFileURL } from "node:url";

const MAX_UNWRAP_DEPTH = 8;
const TYPESCRIPT_EXTENSIONS = new Set([".ts", ".mts", ".cts"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}

/** Follows `default` chains left by CommonJS/ESM interop until a real export appears. */
export function unwrapModuleDefault(value: unknown): unknown {
  let current = value;
  for (let depth = 0; depth < MAX_UNWRAP_DEPTH && isRecord(current) && "default" in current; depth += 1) {
    const keys = Object.keys(current).filter((key) => key !== "__esModule");
    if (keys.length !== 1) {
      break;
    }
    const next = current.default;
    if (next === undefined || next === current) {
      break;
    }
    current = next;
  }
  return current;
}

async function importTypeScriptModule(filePath: string): Promise<unknown> {
  const { tsImport } = await import("tsx/esm/api");
  const moduleUrl = pathToFileURL(filePath).href;
  return await tsImport(moduleUrl, { parentURL: moduleUrl });
}

/** Loads a config module and returns its `config` export, else its default export. */
export async function importConfigModule(filePath: string): Promise<unknown> {
  const loaded: unknown = TYPESCRIPT_EXTENSIONS.has(path.extname(filePath).toLowerCase())
    ? await importTypeScriptModule(filePath)
    : await import(pathToFileURL(filePath).href);
  if (!isRecord(loaded)) {
    return loaded;
  }
  return unwrapModuleDefault(loaded.config ?? loaded.default ?? loaded);
}
