/**
 * HTTP runtime for the story server.
 * Streamable HTTP MCP endpoint with one transport per client session,
 * plus a health route and a tool catalogue for humans poking at it.
 */

import { randomUUID } from "node:crypto";
import http from "node:http";
import express from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { CharacterRegistry, DEFAULT_CHARACTERS } from "../src/characters.js";
import { StoryRepository } from "../src/stories.js";
import type { ToolCtx } from "../src/types.js";
import { SERVER_NAME, SERVER_VERSION, type ServerConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { createMcpServer, getPromptList, getToolList } from "./mcp.js";

// ── Types ──────────────────────────────────────────────────

interface SessionInfo {
  transport: StreamableHTTPServerTransport;
  createdAt: number;
  lastActivity: number;
}

export interface StoryApp {
  app: express.Express;
  sessions: Map<string, SessionInfo>;
  /** Close sessions idle for longer than `ttlMs`. Returns how many were closed. */
  reapIdleSessions(ttlMs: number, now?: number): Promise<number>;
  closeAllSessions(): Promise<void>;
}

export interface RunningServer {
  server: http.Server;
  ctx: ToolCtx;
  close(): Promise<void>;
}

// ── Helpers ────────────────────────────────────────────────

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: "2.0" as const, error: { code, message }, id: null };
}

/** express.json() rejects a body that is not valid JSON with this error type. */
function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

function seconds(ms: number): number {
  return Math.round(ms / 1000);
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" && header ? header : undefined;
}

/** Build the shared tool context: registry, repository and logger. */
export function createToolCtx(config: Pick<ServerConfig, "storiesDir">, logger: Logger): ToolCtx {
  return {
    characters: new CharacterRegistry(DEFAULT_CHARACTERS, logger.child("characters")),
    stories: new StoryRepository({ directory: config.storiesDir, logger: logger.child("stories") }),
    logger,
  };
}

// ── Express app ────────────────────────────────────────────

export function createApp(config: Pick<ServerConfig, "mcpPath">, ctx: ToolCtx): StoryApp {
  const log = ctx.logger.child("http");
  const sessions = new Map<string, SessionInfo>();

  const app = express();
  app.use(express.json({ limit: "4mb" }));

  // CORS for browser-based MCP clients
  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type,Accept,Authorization,mcp-session-id,mcp-protocol-version,Last-Event-ID",
    );
    res.setHeader("Access-Control-Expose-Headers", "mcp-session-id");
    if (req.method === "OPTIONS") { res.sendStatus(200); return; }
    next();
  });

  // ── Health ───────────────────────────────────────────────

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", name: SERVER_NAME, version: SERVER_VERSION, sessions: sessions.size });
  });

  // ── Catalogue ────────────────────────────────────────────

  app.get("/tools", (_req, res) => {
    res.json({ tools: getToolList(), prompts: getPromptList() });
  });

  // ── MCP: POST (initialize or message) ────────────────────

  app.post(config.mcpPath, async (req, res, next) => {
    const sessionId = sessionIdOf(req);
    try {
      const existing = sessionId ? sessions.get(sessionId) : undefined;
      if (existing) {
        existing.lastActivity = Date.now();
        await existing.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!sessionId && isInitializeRequest(req.body)) {
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            const now = Date.now();
            sessions.set(sid, { transport, createdAt: now, lastActivity: now });
            log.info(`Session initialized: ${sid} (active: ${sessions.size})`);
          },
        });

        transport.onclose = () => {
          const sid = transport.sessionId;
          if (sid && sessions.delete(sid)) {
            log.info(`Session closed: ${sid} (active: ${sessions.size})`);
          }
        };

        const server = createMcpServer(ctx);
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
        return;
      }

      res.status(400).json(jsonRpcError(-32000, "Bad Request: No valid session ID provided"));
    } catch (err) {
      next(err);
    }
  });

  // ── MCP: GET (SSE stream) / DELETE (terminate) ───────────

  const handleSessionRequest = async (req: express.Request, res: express.Response, next: express.NextFunction) => {
    const sessionId = sessionIdOf(req);
    const info = sessionId ? sessions.get(sessionId) : undefined;
    if (!info) {
      res.status(400).json(jsonRpcError(-32000, "Bad Request: Invalid or missing session ID"));
      return;
    }
    try {
      info.lastActivity = Date.now();
      if (req.method === "DELETE") log.info(`Session termination requested: ${sessionId}`);
      await info.transport.handleRequest(req, res);
    } catch (err) {
      next(err);
    }
  };

  app.get(config.mcpPath, handleSessionRequest);
  app.delete(config.mcpPath, handleSessionRequest);

  // ── Errors ───────────────────────────────────────────────

  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (!isBodyParseError(err)) { next(err); return; }
    log.warn(`Malformed JSON body on ${req.method} ${req.path}`);
    res.status(400).json(jsonRpcError(-32700, "Parse error"));
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    log.error(`Unhandled error on ${req.method} ${req.path}`, err);
    if (res.headersSent) return;
    res.status(500).json(jsonRpcError(-32603, "Internal server error"));
  });

  async function closeSession(sid: string, info: SessionInfo): Promise<void> {
    try {
      await info.transport.close();
    } catch (err) {
      log.error(`Error closing session ${sid}`, err);
    }
    sessions.delete(sid);
  }

  return {
    app,
    sessions,
    async reapIdleSessions(ttlMs, now = Date.now()) {
      let reaped = 0;
      for (const [sid, info] of [...sessions]) {
        if (now - info.lastActivity > ttlMs) {
          log.info(
            `Reaping idle session ${sid} (idle ${seconds(now - info.lastActivity)}s, age ${seconds(now - info.createdAt)}s)`,
          );
          await closeSession(sid, info);
          reaped++;
        }
      }
      return reaped;
    },
    async closeAllSessions() {
      for (const [sid, info] of [...sessions]) {
        await closeSession(sid, info);
      }
    },
  };
}

// ── Start server ───────────────────────────────────────────

export async function startServer(config: Readonly<ServerConfig>): Promise<RunningServer> {
  const logger = createLogger({ level: config.logLevel, format: config.logFormat, file: config.logFile });
  const boot = logger.child("boot");
  const ctx = createToolCtx(config, logger);
  const story = createApp(config, ctx);

  const server = http.createServer(story.app);
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const reaper = setInterval(() => {
    story.reapIdleSessions(config.sessionTtlMs).catch((err: unknown) => boot.error("Session reaper failed", err));
  }, Math.min(config.sessionTtlMs, 60_000));
  reaper.unref();

  boot.info(`${SERVER_NAME} ${SERVER_VERSION} listening on http://${config.host}:${config.port}`);
  boot.info(`  MCP endpoint: http://${config.host}:${config.port}${config.mcpPath}`);
  boot.info(`  Health check: http://${config.host}:${config.port}/health`);
  boot.info(`  Stories:      ${ctx.stories.directory}`);

  return {
    server,
    ctx,
    async close() {
      clearInterval(reaper);
      await story.closeAllSessions();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      boot.info("Server stopped");
    },
  };
}
