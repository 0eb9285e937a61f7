import type { ReadableStream, ReadableStreamDefaultReader } from "node:stream/web";
import { TimeoutError } from "../../shared/errors.js";
import { errorMessage, log } from "../../shared/logging.js";

type ReadResult = Awaited<ReturnType<ReadableStreamDefaultReader<Uint8Array>["read"]>>;

/**
 * Pulls text lines out of a byte stream, one bounded read at a time.
 * Lines come out in arrival order with the trailing "\r" removed.
 */
export class StreamLineReader {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array> | null;
  private readonly decoder = new TextDecoder();
  private readonly pending: string[] = [];
  private buffer = "";
  private done = false;

  constructor(body: ReadableStream<Uint8Array> | null) {
    this.reader = body ? body.getReader() : null;
    if (!this.reader) this.done = true;
  }

  /**
   * Next line, or null once the stream has ended. Rejects with TimeoutError
   * when nothing arrives within `timeoutMs`.
   */
  async next(timeoutMs: number): Promise<string | null> {
    for (;;) {
      const line = this.pending.shift();
      if (line !== undefined) return line;
      if (this.done) {
        if (!this.buffer) return null;
        const rest = this.buffer;
        this.buffer = "";
        return stripCarriageReturn(rest);
      }
      const { done, value } = await this.read(timeoutMs);
      if (done) {
        this.done = true;
        this.buffer += this.decoder.decode();
        continue;
      }
      this.buffer += this.decoder.decode(value, { stream: true });
      const lines = this.buffer.split("\n");
      this.buffer = lines.pop() ?? "";
      for (const l of lines) this.pending.push(stripCarriageReturn(l));
    }
  }

  /** Cancel the underlying stream. Safe to call more than once. */
  async release(): Promise<void> {
    if (!this.reader) return;
    this.done = true;
    this.pending.length = 0;
    this.buffer = "";
    try {
      await this.reader.cancel();
    } catch (err) {
      log.debug({ err: errorMessage(err) }, "Stream cancel failed");
    }
  }

  private read(timeoutMs: number): Promise<ReadResult> {
    const reader = this.reader;
    if (!reader) return Promise.resolve({ done: true, value: undefined });
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError()), Math.max(0, timeoutMs));
    });
    return Promise.race([reader.read(), timeout]).finally(() => clearTimeout(timer));
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
