import fs from "node:fs";
import path from "node:path";
import type { Channel, PipelineConfig, ToolSource } from "@threadline/core";
import { parseChannelList } from "@threadline/core";
import { parse as parseDotEnv } from "dotenv";
import { z } from "zod";
import { importConfigModule } from "./module-loader.js";

export interface LoadedCliConfig {
  projectRoot: string;
  configPath: string | null;
  pipelineConfig: PipelineConfig;
  redisUrl?: string;
}

export type CliEnvironment = Record<string, string | undefined>;

const CONFIG_CANDIDATES = [
  "threadline.config.ts",
  "threadline.config.mts",
  "threadline.config.js",
  "threadline.config.mjs",
  "threadline.config.json"
];

const STATE_DIRECTORY = ".threadline";

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isChannel(value: unknown): value is Channel {
  return isRecord(value) && typeof value.id === "string" && typeof value.publish === "function";
}

function isHook(value: unknown): value is () => Promise<void> | void {
  return typeof value === "function";
}

const integer = z.number().int();

const configFileSchema = z.object({
  upstream: z
    .object({
      agentId: z.string().optional(),
      apiKey: z.string().optional(),
      baseUrl: z.string().optional(),
      requestTimeoutMs: integer.optional(),
      knownThreads: z.record(z.string()).optional()
    })
    .optional(),
  userId: z.string().optional(),
  history: z.object({ capacity: integer.optional() }).optional(),
  tools: z
    .object({
      definitions: z.custom<ToolSource>((value) => Array.isArray(value) || isRecord(value)).optional(),
      timeoutMs: integer.optional(),
      maxOutputTokens: integer.optional(),
      charsPerToken: integer.optional()
    })
    .optional(),
  channels: z
    .object({
      active: z.array(z.string()).optional(),
      custom: z.array(z.custom<Channel>(isChannel, "custom channels need an id and a publish function")).optional(),
      publishTimeoutMs: integer.optional()
    })
    .optional(),
  push: z
    .object({
      enabled: z.boolean().optional(),
      host: z.string().optional(),
      port: integer.optional(),
      token: z.string().optional(),
      maxQueued: integer.optional(),
      pingMs: integer.optional(),
      maxBodyBytes: integer.optional()
    })
    .optional(),
  runs: z
    .object({
      busyPolicy: z.enum(["reject", "queue"]).optional(),
      maxQueued: integer.optional()
    })
    .optional(),
  observability: z
    .object({
      enabled: z.boolean().optional(),
      directory: z.string().optional(),
      ringSize: integer.optional()
    })
    .optional(),
  hooks: z
    .object({
      onStart: z.custom<() => Promise<void> | void>(isHook).optional(),
      onShutdown: z.custom<() => Promise<void> | void>(isHook).optional()
    })
    .optional()
});

type ConfigFile = z.infer<typeof configFileSchema>;

const integerString = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform((value) => Number.parseInt(value, 10));

const envSchema = z.object({
  THREADLINE_AGENT_ID: z.string().optional(),
  THREADLINE_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  THREADLINE_API_BASE_URL: z.string().url("must be a URL").optional(),
  THREADLINE_ACTIVE_CHANNELS: z.string().optional(),
  THREADLINE_HISTORY_CAPACITY: integerString.optional(),
  THREADLINE_PUSH_PORT: integerString
    .refine((port) => port <= 65_535, "must be a port number")
    .optional(),
  THREADLINE_PUSH_HOST: z.string().optional(),
  THREADLINE_PUSH_TOKEN: z.string().optional(),
  THREADLINE_REDIS_URL: z.string().url("must be a URL").optional(),
  THREADLINE_USER_ID: z.string().optional(),
  THREADLINE_TOOL_TIMEOUT_MS: integerString.optional()
});

type CliEnv = z.infer<typeof envSchema>;

function formatIssues(source: string, error: z.ZodError): string {
  const details = error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where} ${issue.message}`;
  });
  return `Invalid ${source}: ${details.join("; ")}`;
}

/** Shell variables win over `.env`, and `.env.local` over `.env`. */
export function loadProjectEnvFiles(projectRoot: string, env: CliEnvironment = process.env): void {
  const shellDefined = new Set(Object.keys(env));
  const merged: Record<string, string> = {};
  for (const candidate of [".env", ".env.local"]) {
    const filePath = path.join(projectRoot, candidate);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      continue;
    }
    Object.assign(merged, parseDotEnv(fs.readFileSync(filePath, "utf8")));
  }
  for (const [key, value] of Object.entries(merged)) {
    if (!shellDefined.has(key)) {
      env[key] = value;
    }
  }
}

export function parseCliEnvironment(env: CliEnvironment): CliEnv {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      present[key] = value;
    }
  }
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(formatIssues("environment", parsed.error));
  }
  return parsed.data;
}

async function readConfigFile(configPath: string): Promise<ConfigFile> {
  const raw: unknown = configPath.endsWith(".json")
    ? JSON.parse(fs.readFileSync(configPath, "utf8"))
    : await importConfigModule(configPath);
  if (!isRecord(raw)) {
    throw new Error(`Invalid config export from ${configPath}`);
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(formatIssues(path.basename(configPath), parsed.error));
  }
  return parsed.data;
}

function findConfigFile(projectRoot: string): string | null {
  for (const candidate of CONFIG_CANDIDATES) {
    const absolute = path.join(projectRoot, candidate);
    if (fs.existsSync(absolute) && fs.statSync(absolute).isFile()) {
      return absolute;
    }
  }
  return null;
}

function resolveMaybePath(projectRoot: string, filePath: string | undefined): string | undefined {
  if (!filePath) {
    return undefined;
  }
  return path.isAbsolute(filePath) ? filePath : path.resolve(projectRoot, filePath);
}

function mergeConfig(projectRoot: string, file: ConfigFile, env: CliEnv): PipelineConfig {
  const agentId = env.THREADLINE_AGENT_ID ?? file.upstream?.agentId?.trim();
  if (!agentId) {
    throw new Error("Missing agent id: set THREADLINE_AGENT_ID or upstream.agentId in threadline.config.*");
  }

  return {
    upstream: {
      ...file.upstream,
      agentId,
      apiKey: env.THREADLINE_API_KEY ?? env.OPENAI_API_KEY ?? file.upstream?.apiKey,
      baseUrl: env.THREADLINE_API_BASE_URL ?? file.upstream?.baseUrl
    },
    userId: env.THREADLINE_USER_ID ?? file.userId,
    history: { capacity: env.THREADLINE_HISTORY_CAPACITY ?? file.history?.capacity },
    tools: { ...file.tools, timeoutMs: env.THREADLINE_TOOL_TIMEOUT_MS ?? file.tools?.timeoutMs },
    channels: {
      ...file.channels,
      active: env.THREADLINE_ACTIVE_CHANNELS
        ? parseChannelList(env.THREADLINE_ACTIVE_CHANNELS)
        : file.channels?.active
    },
    push: {
      ...file.push,
      host: env.THREADLINE_PUSH_HOST ?? file.push?.host,
      port: env.THREADLINE_PUSH_PORT ?? file.push?.port,
      token: env.THREADLINE_PUSH_TOKEN ?? file.push?.token
    },
    runs: file.runs,
    observability: {
      enabled: file.observability?.enabled ?? true,
      directory:
        resolveMaybePath(projectRoot, file.observability?.directory) ??
        path.join(projectRoot, STATE_DIRECTORY, "observability"),
      ringSize: file.observability?.ringSize
    },
    hooks: file.hooks
  };
}

export async function loadCliConfig(
  projectRoot = process.cwd(),
  env: CliEnvironment = process.env
): Promise<LoadedCliConfig> {
  const resolvedRoot = path.resolve(projectRoot);
  loadProjectEnvFiles(resolvedRoot, env);
  const parsedEnv = parseCliEnvironment(env);

  const configPath = findConfigFile(resolvedRoot);
  const file: ConfigFile = configPath ? await readConfigFile(configPath) : {};

  return {
    projectRoot: resolvedRoot,
    configPath,
    pipelineConfig: mergeConfig(resolvedRoot, file, parsedEnv),
    ...(parsedEnv.THREADLINE_REDIS_URL ? { redisUrl: parsedEnv.THREADLINE_REDIS_URL } : {})
  };
}
