export const VERSION = "0.1.0";

export const DEFAULT_UPSTREAM_URL = "http://192.168.1.161:3000";
export const DEFAULT_BRIDGE_LISTEN = "127.0.0.1:8080";

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;
export const DEFAULT_STREAM_TIMEOUT_MS = 30_000;

/** Upstream event stream endpoint; also accepts fallback calls. */
export const STREAM_PATH = "/sse";
export const MESSAGE_PATH_PREFIX = "/message";

export const DATA_PREFIX = "data: ";
export const STREAM_SENTINEL = "[DONE]";
