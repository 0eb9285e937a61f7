/**
 * JSON-RPC request encoding for the device's tool-call convention.
 */
import type { ToolCallRequest } from "./types.js";

export const TOOL_CALL_METHOD = "tools/call";

export function encodeToolCall(
  id: number,
  name: string,
  args: Record<string, unknown>
): ToolCallRequest {
  return {
    jsonrpc: "2.0",
    id,
    method: TOOL_CALL_METHOD,
    params: { name, arguments: args },
  };
}

export function serializeJsonRpc(obj: unknown): string {
  return JSON.stringify(obj);
}

/** JSON.parse that reports failure instead of throwing. */
export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}
