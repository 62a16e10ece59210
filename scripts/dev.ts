/**
 * Server entry point.
 *
 * Usage:
 *   npm run dev                           # tsx, port 8082
 *   PORT=9000 STORIES_DIR=./out npm run dev
 *   npm run build && npm start            # compiled output
 */

import "dotenv/config";
import { loadConfig } from "../runtime/config.js";
import { startServer } from "../runtime/server.js";

async function main() {
  const config = loadConfig();
  const running = await startServer(config);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`\n${signal} received, shutting down...`);
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Failed to start story server:", err instanceof Error ? err.message : err);
  process.exit(1);
});
