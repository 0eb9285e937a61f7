import { type } from "arktype";
import { ProtocolDecodeError } from "../../shared/errors.js";
import { RpcResponseSchema, type RpcResponse } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeResponse(data: unknown): RpcResponse {
  const result = RpcResponseSchema(data);
  if (result instanceof type.errors) {
    throw new ProtocolDecodeError(`Invalid JSON-RPC response: ${result.summary}`);
  }
  return result;
}

export function isErrorResponse(
  msg: RpcResponse
): msg is RpcResponse & { error: NonNullable<RpcResponse["error"]> } {
  return msg.error !== undefined;
}
