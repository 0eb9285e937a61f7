import { type } from "arktype";

export const JsonRpcIdSchema = type("string | number");
export type JsonRpcId = typeof JsonRpcIdSchema.infer;

export const RpcErrorSchema = type({
  code: "number",
  message: "string",
  "data?": "unknown",
});
export type RpcError = typeof RpcErrorSchema.infer;

/** Outbound tool call as sent to the device. */
export interface ToolCallRequest {
  jsonrpc: "2.0";
  id: number;
  method: string;
  params: {
    name: string;
    arguments: Record<string, unknown>;
  };
}

/**
 * Response envelope as the device sends it. The device is loose about the
 * `jsonrpc` marker and sometimes omits the id, so both are optional here.
 */
export const RpcResponseSchema = type({
  "jsonrpc?": "string",
  "id?": "string | number | null",
  "result?": "unknown",
  "error?": RpcErrorSchema,
});
export type RpcResponse = typeof RpcResponseSchema.infer;

/** Normalized tool result handed to the HTTP layer. */
export interface ToolResult {
  isError: boolean;
  content: string;
}
