/**
 * MCP server for the story tools.
 *
 * 6 tools: get_characters, get_backstory, get_superpower,
 *          save_story, list_stories, get_story
 * 3 prompts: adventure-writing-master, mystery-writing-master,
 *            character-driven-master
 *
 * One McpServer is built per client session; all of them share the
 * same ToolCtx (registry, repository, logger).
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { StoryServerError } from "../src/errors.js";
import { PROMPTS, renderPrompt } from "../src/prompts.js";
import { tools } from "../src/tools.js";
import type { PromptKind, StoryTool, ToolCtx, ToolOutput } from "../src/types.js";
import { SERVER_INSTRUCTIONS, SERVER_NAME, SERVER_VERSION } from "./config.js";

// ── Helpers ────────────────────────────────────────────────

type TextResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function textResult(text: string, isError = false): TextResult {
  const result: TextResult = { content: [{ type: "text", text }] };
  if (isError) result.isError = true;
  return result;
}

/** Lists go out as one JSON array so clients can parse them back. */
export function formatToolOutput(output: ToolOutput): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}

export function formatToolError(err: unknown): string {
  if (err instanceof StoryServerError) return `${err.name}: ${err.message}`;
  return `Internal error: ${err instanceof Error ? err.message : String(err)}`;
}

async function runTool(tool: StoryTool, ctx: ToolCtx, args: unknown): Promise<TextResult> {
  const log = ctx.logger.child("mcp");
  log.debug(`Tool call: ${tool.name}`, args);
  try {
    const output = await tool.call(ctx, args);
    return textResult(formatToolOutput(output));
  } catch (err) {
    if (err instanceof StoryServerError) {
      log.warn(`Tool ${tool.name} failed: ${err.message}`);
    } else {
      log.error(`Tool ${tool.name} crashed`, err);
    }
    return textResult(formatToolError(err), true);
  }
}

const promptArgs = z.record(z.string().optional());

function registerPrompt(server: McpServer, kind: PromptKind, ctx: ToolCtx): void {
  const shape = {
    [kind.argument]: z
      .string()
      .optional()
      .describe(`${kind.argumentDescription} (default: "${kind.defaultValue}")`),
  };

  server.prompt(kind.name, kind.description, shape, async (args) => {
    const value = promptArgs.parse(args)[kind.argument];
    ctx.logger.child("mcp").debug(`Prompt: ${kind.name}`, { [kind.argument]: value ?? kind.defaultValue });
    return {
      description: kind.description,
      messages: [
        {
          role: "user" as const,
          content: { type: "text" as const, text: renderPrompt(kind, value) },
        },
      ],
    };
  });
}

// ── MCP Server ─────────────────────────────────────────────

export function createMcpServer(ctx: ToolCtx): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: SERVER_INSTRUCTIONS },
  );

  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.shape, async (args) => runTool(tool, ctx, args));
  }

  for (const kind of PROMPTS) {
    registerPrompt(server, kind, ctx);
  }

  return server;
}

// ── Catalogue (GET /tools) ─────────────────────────────────

export function getToolList() {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: zodToJsonSchema(z.object(t.shape)),
  }));
}

export function getPromptList() {
  return PROMPTS.map((p) => ({
    name: p.name,
    description: p.description,
    argument: p.argument,
    default: p.defaultValue,
  }));
}
