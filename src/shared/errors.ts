import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** JSON-RPC code used for every failure synthesized by the bridge itself. */
export const INTERNAL_ERROR_CODE = -32603;

/** The upstream session could not be established, or a call got no answer on it. */
export class SessionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionError";
  }
}

/** An upstream request or stream read exceeded its time bound. */
export class TimeoutError extends Error {
  constructor(message = "Request timeout") {
    super(message);
    this.name = "TimeoutError";
  }
}

/** A stream line or body could not be interpreted as a JSON-RPC response. */
export class ProtocolDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolDecodeError";
  }
}

/** The message endpoint answered with a non-200 status. */
export class UpstreamHTTPError extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
    this.name = "UpstreamHTTPError";
  }
}

/** An inbound bridge request is malformed or incomplete. */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

/** Startup configuration failed validation. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
