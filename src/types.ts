import type { z } from "zod";
import type { Logger } from "../runtime/logger.js";
import type { CharacterRegistry } from "./characters.js";
import type { StoryRepository } from "./stories.js";

// ── Domain ───────────────────────────────────────────────────

export type CharacterRecord = {
  name: string;
  backstory: string;
  superpower: string;
};

export type StoredLocation = {
  filename: string;
  /** Absolute path of the written file. */
  path: string;
};

// ── Tools ────────────────────────────────────────────────────

/** Everything a tool handler may touch. Built once per process. */
export type ToolCtx = {
  characters: CharacterRegistry;
  stories: StoryRepository;
  logger: Logger;
};

export type ToolOutput = string | string[];

export type ToolDef<S extends z.ZodRawShape> = {
  name: string;
  description: string;
  input_schema: z.ZodObject<S>;
  handler: (ctx: ToolCtx, input: z.infer<z.ZodObject<S>>) => Promise<ToolOutput>;
};

/** A tool with its input type erased, so heterogeneous tools share one list. */
export type StoryTool = {
  name: string;
  description: string;
  shape: z.ZodRawShape;
  call: (ctx: ToolCtx, args: unknown) => Promise<ToolOutput>;
};

// ── Prompts ──────────────────────────────────────────────────

export type PromptKind = {
  name: string;
  description: string;
  /** Name of the single argument the prompt accepts. */
  argument: string;
  argumentDescription: string;
  defaultValue: string;
  /** Markdown body with `{{argument}}` placeholders. */
  template: string;
};
