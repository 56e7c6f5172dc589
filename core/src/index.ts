/**
 * Server Entry Point - MCP + REST over the same handlers
 *
 * Modes:
 *   - MODE=mcp   - MCP server only (stdio)
 *   - MODE=http  - REST HTTP server only
 *   - MODE=both  - HTTP server plus MCP on stdio (default)
 *
 * See core/config.ts for the remaining environment variables.
 */
import { getConfig } from "./core/config.js";
import { makeHttpServer } from "./server/http-server.js";
import { startMcpHost } from "./server/server.js";

async function main() {
  const config = getConfig();
  console.error(`Starting in ${config.mode} mode...`);

  if (config.mode === "http" || config.mode === "both") {
    makeHttpServer(config.port);
    console.error(`✓ HTTP REST server running at http://localhost:${config.port}`);
    console.error(`  POST /v1/evaluate - Evaluate an expression`);
    console.error(`  POST /v1/explain  - Evaluate with the reduction trace`);
  }

  if (config.mode === "mcp" || config.mode === "both") {
    await startMcpHost();
  }

  console.error("\nServer ready. Press Ctrl+C to stop.");
}

// Graceful shutdown
process.on("SIGINT", () => {
  console.error("\nShutting down...");
  process.exit(0);
});

process.on("SIGTERM", () => {
  console.error("\nShutting down...");
  process.exit(0);
});

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
