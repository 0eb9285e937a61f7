import { encodeToolCall, serializeJsonRpc, tryParseJson } from "../protocols/jsonrpc/codec.js";
import { jsonRpcError } from "../protocols/jsonrpc/response.js";
import type { RpcResponse, ToolCallRequest } from "../protocols/jsonrpc/types.js";
import { decodeResponse, isRecord } from "../protocols/jsonrpc/validate.js";
import { isEventStreamBody, parseStreamLine } from "../protocols/sse/line-parser.js";
import { StreamLineReader } from "../protocols/sse/line-reader.js";
import {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_STREAM_TIMEOUT_MS,
  STREAM_PATH,
} from "../shared/constants.js";
import {
  INTERNAL_ERROR_CODE,
  ProtocolDecodeError,
  SessionError,
  TimeoutError,
  UpstreamHTTPError,
} from "../shared/errors.js";
import { errorMessage, log } from "../shared/logging.js";
import { trimTrailingSlash } from "../shared/net.js";
import { normalizeToolResponse } from "./normalize.js";
import { FetchTransport, type UpstreamTransport } from "./transport.js";

export type SessionState = "disconnected" | "connecting" | "session-pending" | "active";

export interface Session {
  /** Null when the device announced only a message path. */
  id: string | null;
  messageUrl: string;
}

export interface SessionClientOptions {
  baseUrl: string;
  transport?: UpstreamTransport;
  /** Bound on a message-endpoint POST, headers and body included. */
  callTimeoutMs?: number;
  /** Bound on a whole stream scan (session discovery or fallback reply). */
  streamTimeoutMs?: number;
}

const LIST_TOOLS_NAME = "tools";
const LIST_TOOLS_ARGS = { operation: "list" };

/**
 * Keeps one session against the device's SSE endpoint and turns tool calls
 * into normalized JSON-RPC responses. `callTool` and `listTools` never throw:
 * every failure comes back as a -32603 error envelope.
 *
 * Session lifecycle: disconnected → connecting → session-pending → active.
 * Any establishment failure drops back to disconnected.
 */
export class SessionClient {
  readonly baseUrl: string;
  private readonly transport: UpstreamTransport;
  private readonly callTimeoutMs: number;
  private readonly streamTimeoutMs: number;
  private readonly inflight = new Set<AbortController>();
  private session: Session | null = null;
  private establishing: Promise<Session> | null = null;
  private lastRequestId = 0;
  private stopped = false;
  private _state: SessionState = "disconnected";

  constructor(options: SessionClientOptions) {
    this.baseUrl = trimTrailingSlash(options.baseUrl);
    this.transport = options.transport ?? new FetchTransport();
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.streamTimeoutMs = options.streamTimeoutMs ?? DEFAULT_STREAM_TIMEOUT_MS;
  }

  get state(): SessionState {
    return this._state;
  }

  get sessionId(): string | null {
    return this.session?.id ?? null;
  }

  get messageUrl(): string | null {
    return this.session?.messageUrl ?? null;
  }

  get isEstablished(): boolean {
    return this._state === "active" && this.session !== null;
  }

  async start(): Promise<void> {
    this.stopped = false;
    await this.establish();
    log.info(`Session client started, connected to ${this.baseUrl}`);
  }

  /**
   * Open the event stream and read until the device announces a session.
   * Replaces any existing session. Concurrent callers share one attempt.
   */
  establish(): Promise<Session> {
    if (!this.establishing) {
      this.establishing = this.runEstablish().finally(() => {
        this.establishing = null;
      });
    }
    return this.establishing;
  }

  private async runEstablish(): Promise<Session> {
    this.session = null;
    this._state = "connecting";
    const url = `${this.baseUrl}${STREAM_PATH}`;

    try {
      const session = await this.withDeadline(this.streamTimeoutMs, async (signal, deadline) => {
        const res = await this.transport.send(url, { method: "GET", signal });
        if (res.status !== 200) {
          await res.body?.cancel();
          throw new UpstreamHTTPError(res.status);
        }
        this._state = "session-pending";
        return this.scanForSession(new StreamLineReader(res.body), deadline);
      });
      this.session = session;
      this._state = "active";
      log.debug({ sessionId: session.id, messageUrl: session.messageUrl }, "Session established");
      return session;
    } catch (err) {
      this._state = "disconnected";
      log.error(`Failed to establish session: ${errorMessage(err)}`);
      if (err instanceof SessionError) throw err;
      throw new SessionError(`Failed to establish session: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async scanForSession(reader: StreamLineReader, deadline: number): Promise<Session> {
    try {
      for (;;) {
        const line = await reader.next(deadline - Date.now());
        if (line === null) {
          throw new SessionError("Event stream ended before a session was announced");
        }
        const event = parseStreamLine(line);
        if (event.kind === "session-token") {
          return { id: event.sessionId, messageUrl: `${this.baseUrl}${event.path}` };
        }
        if (event.kind === "message-path") {
          return { id: null, messageUrl: `${this.baseUrl}${event.path}` };
        }
      }
    } finally {
      await reader.release();
    }
  }

  private nextRequestId(): number {
    this.lastRequestId += 1;
    return this.lastRequestId;
  }

  /** Call a tool through the session's message endpoint. */
  async callTool(name: string, args: Record<string, unknown> = {}): Promise<RpcResponse> {
    let session = this.session;
    if (!session) {
      try {
        session = await this.establish();
      } catch {
        return jsonRpcError(null, INTERNAL_ERROR_CODE, "Failed to establish session");
      }
    }

    const request = encodeToolCall(this.nextRequestId(), name, args);
    log.debug({ url: session.messageUrl, request }, "Sending tool call");

    try {
      const reply = await this.post(session.messageUrl, request);
      const response = await this.interpretReply(reply, request);
      return normalizeToolResponse(response);
    } catch (err) {
      if (err instanceof TimeoutError) {
        log.error("Request timed out");
        return jsonRpcError(request.id, INTERNAL_ERROR_CODE, "Request timeout");
      }
      if (
        err instanceof UpstreamHTTPError ||
        err instanceof ProtocolDecodeError ||
        err instanceof SessionError
      ) {
        log.error(`Tool call failed: ${err.message}`);
        return jsonRpcError(request.id, INTERNAL_ERROR_CODE, err.message);
      }
      log.error(`Error calling tool: ${errorMessage(err)}`);
      await this.recover();
      return jsonRpcError(request.id, INTERNAL_ERROR_CODE, errorMessage(err));
    }
  }

  /** List the device's tools. Listing is only served on the stream endpoint. */
  listTools(): Promise<RpcResponse> {
    return this.streamCall(encodeToolCall(this.nextRequestId(), LIST_TOOLS_NAME, LIST_TOOLS_ARGS));
  }

  /** Abort in-flight requests, drop the session and close the transport. */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const controller of this.inflight) controller.abort();
    this.inflight.clear();
    const wasStarted = this.session !== null;
    this.session = null;
    this._state = "disconnected";
    this.transport.close();
    if (wasStarted) log.info("Session client stopped");
  }

  private post(
    url: string,
    request: ToolCallRequest
  ): Promise<{ body: string; contentType: string | null }> {
    return this.withDeadline(this.callTimeoutMs, async (signal) => {
      const res = await this.transport.send(url, {
        method: "POST",
        body: serializeJsonRpc(request),
        signal,
      });
      if (res.status !== 200) {
        await res.body?.cancel();
        throw new UpstreamHTTPError(res.status);
      }
      const body = await res.text();
      return { body, contentType: res.headers.get("content-type") };
    });
  }

  /**
   * Event-stream body first, then a plain JSON object, then the stream
   * fallback for anything else (the device answers some calls with a bare
   * number on the message endpoint).
   */
  private async interpretReply(
    reply: { body: string; contentType: string | null },
    request: ToolCallRequest
  ): Promise<RpcResponse> {
    if (isEventStreamBody(reply.body, reply.contentType)) {
      for (const line of reply.body.split("\n")) {
        const event = parseStreamLine(line);
        if (event.kind === "json") return decodeResponse(event.value);
      }
      throw new SessionError("No response received");
    }

    const parsed = tryParseJson(reply.body);
    if (parsed.ok && isRecord(parsed.value)) return decodeResponse(parsed.value);

    log.debug({ body: reply.body }, "Non-JSON reply from message endpoint, using stream fallback");
    return this.streamCall(request);
  }

  /** Stream fallback with error envelopes instead of exceptions. */
  private async streamCall(request: ToolCallRequest): Promise<RpcResponse> {
    try {
      return normalizeToolResponse(await this.streamRequest(request));
    } catch (err) {
      if (err instanceof TimeoutError) {
        log.error("Stream call timed out");
        return jsonRpcError(request.id, INTERNAL_ERROR_CODE, "Request timeout");
      }
      log.error(`Stream call failed: ${errorMessage(err)}`);
      return jsonRpcError(request.id, INTERNAL_ERROR_CODE, errorMessage(err));
    }
  }

  /**
   * POST the request to the stream endpoint and scan the reply stream for the
   * object carrying the request's id.
   */
  private streamRequest(request: ToolCallRequest): Promise<RpcResponse> {
    const url = `${this.baseUrl}${STREAM_PATH}`;
    return this.withDeadline(this.streamTimeoutMs, async (signal, deadline) => {
      const res = await this.transport.send(url, {
        method: "POST",
        body: serializeJsonRpc(request),
        signal,
      });
      if (res.status !== 200) {
        await res.body?.cancel();
        throw new UpstreamHTTPError(res.status);
      }
      const reader = new StreamLineReader(res.body);
      try {
        for (;;) {
          const line = await reader.next(deadline - Date.now());
          if (line === null) break;
          const event = parseStreamLine(line);
          if (event.kind === "sentinel") break;
          if (event.kind === "json") {
            if (event.value.id === request.id) return decodeResponse(event.value);
            log.debug({ id: event.value.id }, "Skipping reply for another request");
          } else if (event.kind === "unrecognized" && event.reason === "unparseable") {
            log.debug(`Could not parse: ${event.payload}`);
          }
        }
      } finally {
        await reader.release();
      }
      throw new SessionError("No response received");
    });
  }

  /** Drop the broken session and try to open a fresh one for the next call. */
  private async recover(): Promise<void> {
    this.session = null;
    this._state = "disconnected";
    if (this.stopped) return;
    try {
      await this.establish();
    } catch (err) {
      log.warn(`Session re-establishment failed: ${errorMessage(err)}`);
    }
  }

  /**
   * Run one upstream exchange under `timeoutMs`, response headers included.
   * Expiry aborts the request and surfaces as TimeoutError; `stop()` aborts
   * it too.
   */
  private async withDeadline<T>(
    timeoutMs: number,
    fn: (signal: AbortSignal, deadline: number) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    this.inflight.add(controller);
    const deadline = Date.now() + timeoutMs;
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    try {
      return await fn(controller.signal, deadline);
    } catch (err) {
      if (timedOut) throw new TimeoutError();
      throw err;
    } finally {
      clearTimeout(timer);
      this.inflight.delete(controller);
    }
  }
}
