/**
 * HTTP access to the upstream device. SessionClient only talks to this
 * abstraction; tests substitute an in-process implementation.
 */
export interface UpstreamRequestInit {
  method: "GET" | "POST";
  /** Serialized JSON body (POST only). */
  body?: string;
  signal: AbortSignal;
}

export abstract class UpstreamTransport {
  /** Issue a request and return the response as soon as headers arrive. */
  abstract send(url: string, init: UpstreamRequestInit): Promise<Response>;

  /** Release the transport; later sends must fail. */
  abstract close(): void;
}

export class FetchTransport extends UpstreamTransport {
  private closed = false;

  async send(url: string, init: UpstreamRequestInit): Promise<Response> {
    if (this.closed) throw new Error("Upstream transport closed");
    const headers: Record<string, string> =
      init.method === "POST"
        ? { "Content-Type": "application/json", Accept: "application/json, text/event-stream" }
        : { Accept: "text/event-stream" };
    return fetch(url, {
      method: init.method,
      headers,
      body: init.body,
      signal: init.signal,
    });
  }

  override close(): void {
    this.closed = true;
  }
}
