/**
 * REST HTTP Server - thin adapter over core handlers
 * Provides REST API endpoints that call the same handlers as MCP tools
 */
import { createServer, type Server } from "node:http";
import { randomUUID } from "node:crypto";
import { evaluate, explain } from "../core/handlers.js";
import type { EvalOutputT } from "../core/schema.js";

const START_TIME = Date.now();
const VERSION = "0.1.0";

export interface RouteRequest {
  method: string;
  pathname: string;
  contentType?: string;
  body: string;
  reqId: string;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

const endpoints: Record<string, typeof evaluate> = {
  "/v1/evaluate": evaluate,
  "/v1/explain": explain
};

/**
 * Route one request. Kept free of sockets so tests can call it directly.
 */
export async function route(req: RouteRequest): Promise<RouteResponse> {
  if (req.pathname === "/health" && req.method === "GET") {
    return {
      status: 200,
      body: {
        status: "ok",
        version: VERSION,
        uptimeSec: Math.floor((Date.now() - START_TIME) / 1000)
      }
    };
  }

  const handler = endpoints[req.pathname];
  if (!handler || req.method !== "POST") {
    return { status: 404, body: { error: "Not found" } };
  }

  if (!req.contentType || !req.contentType.includes("application/json")) {
    return failure(415, "Content-Type must be application/json");
  }

  let payload: unknown;
  try {
    payload = JSON.parse(req.body);
  } catch (error) {
    return failure(400, `Invalid JSON body: ${error instanceof Error ? error.message : String(error)}`);
  }

  // Handlers never throw; errors arrive as diagnostics
  const result = await handler(payload, { reqId: req.reqId });
  const status = result.diagnostics.some((d) => d.severity === "error") ? 400 : 200;
  return { status, body: result };
}

function failure(status: number, message: string): RouteResponse {
  const body: EvalOutputT = {
    value: null,
    diagnostics: [{ code: "schema_error", message, severity: "error" }],
    perf: { durationMs: 0 }
  };
  return { status, body };
}

export const MAX_BODY_BYTES = 64 * 1024;

export class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

/**
 * Collect a request body, giving up once it passes `limit` bytes.
 */
export async function readBody(req: AsyncIterable<unknown>, limit = MAX_BODY_BYTES): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) throw new BodyTooLargeError(limit);
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Create HTTP server with REST endpoints
 */
export function makeHttpServer(port: number): Server {
  const server = createServer((req, res) => {
    const reqId = randomUUID();
    const url = new URL(req.url ?? "/", "http://localhost");
    const headers = {
      "Content-Type": "application/json",
      "X-Request-ID": reqId
    };

    readBody(req)
      .then((body) =>
        route({
          method: req.method ?? "GET",
          pathname: url.pathname,
          contentType: req.headers["content-type"],
          body,
          reqId
        })
      )
      .then(({ status, body }) => {
        res.writeHead(status, headers);
        res.end(JSON.stringify(body, null, 2));
      })
      .catch((error: unknown) => {
        if (error instanceof BodyTooLargeError) {
          res.writeHead(413, { ...headers, Connection: "close" });
          res.end(JSON.stringify(failure(413, error.message).body, null, 2));
          return;
        }
        console.error(`[HTTP] ${reqId} failed:`, error);
        res.writeHead(500, headers);
        res.end(JSON.stringify({ error: "internal" }));
      });
  });

  server.listen(port);
  return server;
}
