/**
 * MCP Server - thin adapter over core handlers
 * Wires tools to the FastMCP host
 */
import { FastMCP } from "fastmcp";
import { registerTools } from "../core/tools.js";

/**
 * Create, configure and start the MCP server on stdio
 * This is a thin adapter - all business logic lives in core/handlers.ts
 */
export async function startMcpHost(): Promise<FastMCP> {
  const server = new FastMCP({
    name: "stackcalc",
    version: "0.1.0"
  });

  registerTools(server);

  await server.start({ transportType: "stdio" });
  console.error("MCP Server running on stdio");

  return server;
}
