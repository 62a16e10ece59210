import { z, ZodError } from "zod";
import { ValidationError, formatZodError } from "./errors.js";
import type { StoryTool, ToolDef } from "./types.js";

/**
 * Erase a tool's input type behind a parse step so every tool fits in one
 * list. Arguments are validated against `input_schema` before the handler runs.
 */
export function defineTool<S extends z.ZodRawShape>(def: ToolDef<S>): StoryTool {
  return {
    name: def.name,
    description: def.description,
    shape: def.input_schema.shape,
    call: async (ctx, args) => {
      let input: z.infer<z.ZodObject<S>>;
      try {
        input = def.input_schema.parse(args ?? {});
      } catch (err) {
        if (err instanceof ZodError) throw new ValidationError(formatZodError(err, def.name));
        throw err;
      }
      return def.handler(ctx, input);
    },
  };
}

// ── Story Tools ──────────────────────────────────────────────

export const tools: readonly StoryTool[] = [
  // ── get_characters ─────────────────────────────────────
  defineTool({
    name: "get_characters",
    description: "Get the list of all available character names.",
    input_schema: z.object({}),
    handler: async (ctx) => ctx.characters.listNames(),
  }),

  // ── get_backstory ──────────────────────────────────────
  defineTool({
    name: "get_backstory",
    description: "Get the backstory of a specified character.",
    input_schema: z.object({
      character: z.string().describe("Character name, e.g. Jack (case-insensitive)"),
    }),
    handler: async (ctx, input) => ctx.characters.getBackstory(input.character),
  }),

  // ── get_superpower ─────────────────────────────────────
  defineTool({
    name: "get_superpower",
    description: "Get the superpower of a specified character.",
    input_schema: z.object({
      character: z.string().describe("Character name, e.g. Jack (case-insensitive)"),
    }),
    handler: async (ctx, input) => ctx.characters.getSuperpower(input.character),
  }),

  // ── save_story ─────────────────────────────────────────
  defineTool({
    name: "save_story",
    description: `Save a story to a markdown file with title and creation date.
The filename is derived from the title (lowercase, underscores), e.g. "Jack's Adventure" → jacks_adventure.md.
Saving a title that maps to an existing file replaces it.`,
    input_schema: z.object({
      title: z.string().describe("Story title, used as the heading and to derive the filename"),
      content: z.string().describe("Story body in markdown"),
    }),
    handler: async (ctx, input) => {
      const saved = await ctx.stories.saveStory(input.title, input.content);
      return `Story has been saved at: ${saved.path}`;
    },
  }),

  // ── list_stories ───────────────────────────────────────
  defineTool({
    name: "list_stories",
    description: "List all saved story files in markdown format.",
    input_schema: z.object({
      reason: z.string().describe("Why the stories are being listed (logged only)"),
    }),
    handler: async (ctx, input) => ctx.stories.listStories(input.reason),
  }),

  // ── get_story ──────────────────────────────────────────
  defineTool({
    name: "get_story",
    description: "Read the content of a specific story file. Pass a filename exactly as returned by list_stories.",
    input_schema: z.object({
      filename: z.string().describe("Story filename, e.g. jacks_adventure.md"),
    }),
    handler: async (ctx, input) => ctx.stories.getStory(input.filename),
  }),
];

export function findTool(name: string): StoryTool | undefined {
  return tools.find((t) => t.name === name);
}
