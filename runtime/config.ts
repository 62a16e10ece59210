/**
 * Server configuration, read once from the environment at start-up.
 */

import path from "node:path";
import { z, ZodError } from "zod";
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from "./logger.js";

export const SERVER_NAME = "StoryServer";
export const SERVER_VERSION = "2.1.0";
export const SERVER_INSTRUCTIONS =
  "StoryServer exposes simple tools to list characters, fetch backstories, " +
  "and save/read markdown stories. Intended for demo and testing.";

export interface ServerConfig {
  port: number;
  host: string;
  mcpPath: string;
  storiesDir: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFile?: string;
  sessionTtlMs: number;
}

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const envSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(8082)),
  HOST: z.preprocess(blankToUndefined, z.string().default("0.0.0.0")),
  MCP_PATH: z.preprocess(blankToUndefined, z.string().default("/mcp")),
  STORIES_DIR: z.preprocess(blankToUndefined, z.string().default("stories")),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === "string" ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(LOG_LEVELS).default("info"),
  ),
  LOG_FORMAT: z.preprocess(blankToUndefined, z.enum(LOG_FORMATS).default("pretty")),
  LOG_FILE: z.preprocess(blankToUndefined, z.string().optional()),
  SESSION_TTL_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(30 * 60 * 1000)),
});

function formatEnvError(err: ZodError): string {
  const issues = err.issues.map((issue) => `  ${issue.path.join(".") || "env"}: ${issue.message}`);
  return `Invalid server configuration:\n${issues.join("\n")}`;
}

/**
 * Build the frozen server config from `env`. Throws with every offending
 * variable listed when a value does not parse.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Readonly<ServerConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new Error(formatEnvError(parsed.error));

  const e = parsed.data;
  const mcpPath = e.MCP_PATH.startsWith("/") ? e.MCP_PATH : `/${e.MCP_PATH}`;

  const config: ServerConfig = {
    port: e.PORT,
    host: e.HOST,
    mcpPath,
    storiesDir: path.resolve(cwd, e.STORIES_DIR),
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
    sessionTtlMs: e.SESSION_TTL_MS,
  };
  if (e.LOG_FILE) config.logFile = path.resolve(cwd, e.LOG_FILE);

  return Object.freeze(config);
}
