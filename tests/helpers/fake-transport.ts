import { ReadableStream } from "node:stream/web";
import { UpstreamTransport, type UpstreamRequestInit } from "../../src/upstream/transport.js";

export const BASE_URL = "http://device.test";
export const SESSION_ID = "3f2a-9b01";
export const MESSAGE_URL = `${BASE_URL}/message?session_id=${SESSION_ID}`;

export interface RecordedRequest {
  url: string;
  method: "GET" | "POST";
  body: unknown;
}

export type FakeHandler = (req: RecordedRequest) => Response | Promise<Response>;

/** In-process upstream: records every request and answers through `handler`. */
export class FakeTransport extends UpstreamTransport {
  readonly requests: RecordedRequest[] = [];
  closed = false;

  constructor(private readonly handler: FakeHandler) {
    super();
  }

  send(url: string, init: UpstreamRequestInit): Promise<Response> {
    if (this.closed) return Promise.reject(new Error("Upstream transport closed"));
    const req: RecordedRequest = {
      url,
      method: init.method,
      body: init.body === undefined ? undefined : (JSON.parse(init.body) as unknown),
    };
    this.requests.push(req);
    return new Promise<Response>((resolve, reject) => {
      const onAbort = () => reject(new Error("This operation was aborted"));
      if (init.signal.aborted) {
        onAbort();
        return;
      }
      init.signal.addEventListener("abort", onAbort, { once: true });
      Promise.resolve()
        .then(() => this.handler(req))
        .then(resolve, reject);
    });
  }

  close(): void {
    this.closed = true;
  }

  count(method: "GET" | "POST", url?: string): number {
    return this.requests.filter((r) => r.method === method && (url === undefined || r.url === url))
      .length;
  }
}

export function sseResponse(lines: string[]): Response {
  return new Response(lines.join("\n") + "\n", {
    status: 200,
    headers: { "Content-Type": "text/event-stream" },
  });
}

export function jsonBody(payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

export function textBody(text: string, status = 200): Response {
  return new Response(text, { status, headers: { "Content-Type": "text/plain" } });
}

/** Event stream that sends `lines` and then stays open. */
export function openStream(lines: string[] = []): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const line of lines) controller.enqueue(encoder.encode(line + "\n"));
    },
  });
  return new Response(body, { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

export function sessionAnnouncement(): Response {
  return sseResponse(["event: endpoint", `data: /message?session_id=${SESSION_ID}`, ""]);
}

export function never(): Promise<Response> {
  return new Promise<Response>(() => {});
}
