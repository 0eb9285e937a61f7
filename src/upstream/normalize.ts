import { jsonRpcResult } from "../protocols/jsonrpc/response.js";
import { isErrorResponse, isRecord } from "../protocols/jsonrpc/validate.js";
import type { RpcResponse, ToolResult } from "../protocols/jsonrpc/types.js";
import { log } from "../shared/logging.js";

/**
 * Flatten a tool response into `{isError, content}` where content is the
 * newline-joined text of every text item. Non-text items (images exposed as
 * resource links, mostly) are logged and left out. Error envelopes and
 * non-object results pass through untouched.
 */
export function normalizeToolResponse(response: RpcResponse): RpcResponse {
  if (isErrorResponse(response)) return response;

  const result = response.result === undefined ? {} : response.result;
  if (!isRecord(result)) return response;

  const normalized: ToolResult = {
    isError: typeof result.isError === "boolean" ? result.isError : false,
    content: collectText(result.content).join("\n"),
  };
  return jsonRpcResult(response.id ?? null, normalized);
}

function collectText(content: unknown): string[] {
  if (typeof content === "string") return [content];
  if (!Array.isArray(content)) return [];

  const parts: string[] = [];
  for (const item of content) {
    if (!isRecord(item)) continue;
    if (item.type === "text") {
      parts.push(typeof item.text === "string" ? item.text : "");
    } else if (item.type === "resource_link") {
      log.debug({ name: item.name ?? "Image", uri: item.uri ?? "" }, "Skipping resource link");
    } else {
      log.debug({ type: item.type }, "Skipping non-text content item");
    }
  }
  return parts;
}

export function isToolResult(value: unknown): value is ToolResult {
  return isRecord(value) && typeof value.isError === "boolean" && typeof value.content === "string";
}
