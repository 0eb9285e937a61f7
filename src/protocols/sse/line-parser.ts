/**
 * Classifies single lines of an upstream event stream.
 *
 * The device mixes several payload shapes on the same stream: session
 * announcements, message endpoint paths, JSON-RPC envelopes, bare numbers and
 * a terminal sentinel. Classification order is fixed: sentinel, JSON object,
 * session token, message path, then the unrecognized cases.
 */
import { DATA_PREFIX, MESSAGE_PATH_PREFIX, STREAM_SENTINEL } from "../../shared/constants.js";
import { tryParseJson } from "../jsonrpc/codec.js";
import { isRecord } from "../jsonrpc/validate.js";

const SESSION_ID_MARKER = "session_id=";
const SESSION_ID_PATTERN = /session_id=([a-f0-9-]+)/;

export type UnrecognizedReason = "no-data-prefix" | "numeric" | "non-object" | "unparseable";

export type StreamEvent =
  | { kind: "sentinel" }
  | { kind: "json"; value: Record<string, unknown> }
  | { kind: "session-token"; sessionId: string; path: string }
  | { kind: "message-path"; path: string }
  | { kind: "unrecognized"; reason: UnrecognizedReason; payload: string };

/** Payload of a data line, or null when the line carries no data prefix. */
export function dataPayload(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(DATA_PREFIX)) return null;
  return trimmed.slice(DATA_PREFIX.length).trim();
}

export function parseStreamLine(line: string): StreamEvent {
  const payload = dataPayload(line);
  if (payload === null) {
    return { kind: "unrecognized", reason: "no-data-prefix", payload: line.trim() };
  }
  if (payload === STREAM_SENTINEL) return { kind: "sentinel" };

  const parsed = tryParseJson(payload);
  if (parsed.ok) {
    if (isRecord(parsed.value)) return { kind: "json", value: parsed.value };
    const reason = typeof parsed.value === "number" ? "numeric" : "non-object";
    return { kind: "unrecognized", reason, payload };
  }

  if (payload.includes(SESSION_ID_MARKER)) {
    const match = SESSION_ID_PATTERN.exec(payload);
    if (match?.[1]) return { kind: "session-token", sessionId: match[1], path: payload };
    return { kind: "unrecognized", reason: "unparseable", payload };
  }
  if (payload.startsWith(MESSAGE_PATH_PREFIX)) return { kind: "message-path", path: payload };

  return { kind: "unrecognized", reason: "unparseable", payload };
}

/**
 * True when a POST reply body is an event stream rather than a plain JSON
 * document: either the content type says so, or the first non-blank line is
 * an SSE field.
 */
export function isEventStreamBody(body: string, contentType: string | null): boolean {
  if (contentType?.toLowerCase().includes("text/event-stream")) return true;
  const first = body.split("\n").find((l) => l.trim() !== "");
  if (first === undefined) return false;
  const head = first.trimStart();
  return head.startsWith("data:") || head.startsWith("event:");
}
