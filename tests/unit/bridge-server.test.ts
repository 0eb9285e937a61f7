import { afterEach, describe, it, expect, vi } from "vitest";
import { createBridgeApp, onServerError, parseToolCallBody } from "../../src/bridge/server.js";
import { RequestValidationError } from "../../src/shared/errors.js";
import { SessionClient } from "../../src/upstream/session-client.js";
import {
  BASE_URL,
  FakeTransport,
  SESSION_ID,
  jsonBody,
  sessionAnnouncement,
  sseResponse,
  type FakeHandler,
} from "../helpers/fake-transport.js";

function createBridge(onPost: FakeHandler = () => jsonBody({})) {
  const transport = new FakeTransport((req) =>
    req.method === "GET" ? sessionAnnouncement() : onPost(req)
  );
  const client = new SessionClient({ baseUrl: BASE_URL, transport });
  return { app: createBridgeApp(client), client, transport };
}

function postCall(app: ReturnType<typeof createBridgeApp>, body: string) {
  return app.request("/call", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("bridge info routes", () => {
  it("GET / describes the bridge and the current session", async () => {
    const { app, client } = createBridge();

    const before = (await (await app.request("/")).json()) as Record<string, unknown>;
    expect(before.upstream).toBe(BASE_URL);
    expect(before.sessionId).toBeNull();

    await client.establish();
    const after = (await (await app.request("/")).json()) as Record<string, unknown>;
    expect(after.sessionId).toBe(SESSION_ID);
    expect(after.endpoints).toEqual({
      "/": "This info page",
      "/health": "Health check",
      "/tools": "List available tools",
      "/call": "Call a tool (POST)",
    });
  });

  it("GET /health reports session status", async () => {
    const { app, client } = createBridge();

    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "healthy", upstream: BASE_URL, sessionEstablished: false });

    await client.establish();
    expect(await (await app.request("/health")).json()).toEqual({
      status: "healthy",
      upstream: BASE_URL,
      sessionEstablished: true,
    });
  });

  it("GET /tools returns the listing envelope", async () => {
    const { app } = createBridge(() =>
      sseResponse([`data: {"jsonrpc":"2.0","id":1,"result":{"content":"get_result"}}`])
    );

    const res = await app.request("/tools");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ jsonrpc: "2.0", id: 1, result: { isError: false, content: "get_result" } });
  });

  it("GET /tools answers 500 when listing throws", async () => {
    const { app, client } = createBridge();
    vi.spyOn(client, "listTools").mockRejectedValue(new Error("device gone"));

    const res = await app.request("/tools");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "device gone" });
  });
});

describe("POST /call", () => {
  it("rejects a body without a tool name", async () => {
    const { app, transport } = createBridge();

    const res = await postCall(app, "{}");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Missing tool parameter" });
    expect(transport.requests).toEqual([]);
  });

  it("rejects malformed JSON", async () => {
    const { app } = createBridge();

    const res = await postCall(app, "{tool:");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON" });
  });

  it("rejects non-object arguments", async () => {
    const { app } = createBridge();

    const res = await postCall(app, JSON.stringify({ tool: "x", arguments: [1, 2] }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid arguments" });
  });

  it("renders JSON text content as a JSON body", async () => {
    const { app, transport } = createBridge(() => jsonBody({ result: { content: '{"a":1}' } }));

    const res = await postCall(app, JSON.stringify({ tool: "x", arguments: {} }));

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("application/json");
    expect(await res.json()).toEqual({ a: 1 });
    expect(transport.requests[1]?.body).toEqual({
      jsonrpc: "2.0",
      id: 1,
      method: "tools/call",
      params: { name: "x", arguments: {} },
    });
  });

  it("renders other text content as plain text", async () => {
    const { app } = createBridge(() =>
      jsonBody({ jsonrpc: "2.0", id: 1, result: { content: [{ type: "text", text: "two faces" }] } })
    );

    const res = await postCall(app, JSON.stringify({ tool: "get_result" }));

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/plain");
    expect(await res.text()).toBe("two faces");
  });

  it("renders error envelopes in full with status 200", async () => {
    const { app } = createBridge(() => new Response("boom", { status: 502 }));

    const res = await postCall(app, JSON.stringify({ tool: "x" }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32603, message: "HTTP 502" },
    });
  });

  it("answers 500 on unexpected failures", async () => {
    const { app, client } = createBridge();
    vi.spyOn(client, "callTool").mockRejectedValue(new Error("kaput"));

    const res = await postCall(app, JSON.stringify({ tool: "x" }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "kaput" });
  });
});

describe("CORS", () => {
  it("adds the allow-origin header to regular responses", async () => {
    const { app } = createBridge();

    const res = await app.request("/health");

    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("answers OPTIONS with an empty body and the CORS headers", async () => {
    const { app } = createBridge();

    const res = await app.request("/call", { method: "OPTIONS" });

    expect(res.status).toBe(204);
    expect(await res.text()).toBe("");
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(res.headers.get("access-control-allow-methods")).toBe("GET,POST,OPTIONS");
    expect(res.headers.get("access-control-allow-headers")).toBe("Content-Type");
  });
});

describe("parseToolCallBody", () => {
  it("defaults arguments to an empty object", () => {
    expect(parseToolCallBody({ tool: "t" })).toEqual({ tool: "t", arguments: {} });
  });

  it("rejects empty and non-string tool names", () => {
    expect(() => parseToolCallBody({ tool: "" })).toThrow(RequestValidationError);
    expect(() => parseToolCallBody({ tool: 3 })).toThrow("Missing tool parameter");
    expect(() => parseToolCallBody([])).toThrow("Missing tool parameter");
  });
});

describe("onServerError", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function exitCodes(): Array<string | number | null | undefined> {
    const codes: Array<string | number | null | undefined> = [];
    vi.spyOn(process, "exit").mockImplementation((code) => {
      codes.push(code);
      throw new Error("process exit");
    });
    return codes;
  }

  it("exits with SERVER_FAILURE when the port is taken", () => {
    const codes = exitCodes();
    const err = Object.assign(new Error("listen EADDRINUSE"), { code: "EADDRINUSE" });

    expect(() => onServerError(err, "127.0.0.1", 8080)).toThrow("process exit");
    expect(codes).toEqual([3]);
  });

  it("exits with GENERIC_ERROR on any other listener error", () => {
    const codes = exitCodes();
    const err = Object.assign(new Error("listen EACCES"), { code: "EACCES" });

    expect(() => onServerError(err, "127.0.0.1", 80)).toThrow("process exit");
    expect(codes).toEqual([1]);
  });
});
