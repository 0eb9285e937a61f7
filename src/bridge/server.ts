import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { tryParseJson } from "../protocols/jsonrpc/codec.js";
import type { RpcResponse } from "../protocols/jsonrpc/types.js";
import { isRecord } from "../protocols/jsonrpc/validate.js";
import { VERSION } from "../shared/constants.js";
import { EXIT, RequestValidationError, exit } from "../shared/errors.js";
import { errorMessage, log } from "../shared/logging.js";
import { isToolResult } from "../upstream/normalize.js";
import type { SessionClient } from "../upstream/session-client.js";

export interface BridgeHandle {
  port: number;
  host: string;
  close: () => Promise<void>;
}

export interface ToolCallBody {
  tool: string;
  arguments: Record<string, unknown>;
}

/** Validate a parsed /call body. */
export function parseToolCallBody(body: unknown): ToolCallBody {
  if (!isRecord(body) || typeof body.tool !== "string" || body.tool === "") {
    throw new RequestValidationError("Missing tool parameter");
  }
  const args = body.arguments ?? {};
  if (!isRecord(args)) {
    throw new RequestValidationError("Invalid arguments");
  }
  return { tool: body.tool, arguments: args };
}

function jsonResponse(payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Render a tool call result: the text content as JSON when it parses,
 * otherwise as plain text; error envelopes and odd shapes verbatim.
 */
export function renderToolResponse(response: RpcResponse): Response {
  if (response.error === undefined && isToolResult(response.result)) {
    const content = response.result.content;
    const parsed = tryParseJson(content);
    if (parsed.ok) return jsonResponse(parsed.value);
    return new Response(content, {
      status: 200,
      headers: { "Content-Type": "text/plain; charset=UTF-8" },
    });
  }
  return jsonResponse(response);
}

export function createBridgeApp(client: SessionClient): Hono {
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    })
  );

  app.get("/", (c) =>
    c.json({
      name: "SSE RPC Bridge",
      version: VERSION,
      description: "HTTP bridge for a session-based JSON-RPC device server",
      upstream: client.baseUrl,
      sessionId: client.sessionId,
      endpoints: {
        "/": "This info page",
        "/health": "Health check",
        "/tools": "List available tools",
        "/call": "Call a tool (POST)",
      },
    })
  );

  app.get("/health", (c) =>
    c.json({
      status: "healthy",
      upstream: client.baseUrl,
      sessionEstablished: client.isEstablished,
    })
  );

  app.get("/tools", async (c) => {
    try {
      return jsonResponse(await client.listTools());
    } catch (err) {
      log.error(`Error listing tools: ${errorMessage(err)}`);
      return c.json({ error: errorMessage(err) }, 500);
    }
  });

  app.post("/call", async (c) => {
    const raw = await c.req.text();
    const parsed = tryParseJson(raw);
    if (!parsed.ok) {
      return c.json({ error: "Invalid JSON" }, 400);
    }

    try {
      const { tool, arguments: args } = parseToolCallBody(parsed.value);
      log.info(`Calling tool: ${tool}`);
      const response = await client.callTool(tool, args);
      return renderToolResponse(response);
    } catch (err) {
      if (err instanceof RequestValidationError) {
        return c.json({ error: err.message }, 400);
      }
      log.error({ err }, "Error handling tool call");
      return c.json({ error: errorMessage(err) }, 500);
    }
  });

  return app;
}

export interface BridgeServeOptions {
  host: string;
  port: number;
}

/** Listener errors end the process. */
export function onServerError(err: NodeJS.ErrnoException, host: string, port: number): never {
  if (err.code === "EADDRINUSE") {
    exit(
      EXIT.SERVER_FAILURE,
      `Cannot listen on ${host}:${port} (EADDRINUSE). Choose a different port with --listen ${host}:<port>`
    );
  }
  exit(EXIT.GENERIC_ERROR, `Bridge server error: ${err.message}`);
}

export async function startBridgeServer(
  options: BridgeServeOptions,
  client: SessionClient
): Promise<BridgeHandle> {
  const { host, port } = options;
  const app = createBridgeApp(client);

  const nodeServer = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  });

  nodeServer.on("error", (err: NodeJS.ErrnoException) => onServerError(err, host, port));

  return {
    host,
    port,
    close: () =>
      new Promise((resolve, reject) => {
        nodeServer.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
