import { type } from "arktype";
import {
  DEFAULT_BRIDGE_LISTEN,
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_STREAM_TIMEOUT_MS,
  DEFAULT_UPSTREAM_URL,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { ConfigError } from "./shared/errors.js";
import { isLogFormat, isLogLevel } from "./shared/logging.js";
import { parseListen, trimTrailingSlash } from "./shared/net.js";

export const BridgeConfigSchema = type({
  upstreamUrl: /^https?:\/\/\S+$/,
  host: "string > 0",
  port: "0 < number.integer <= 65535",
  logLevel: "'error' | 'warn' | 'info' | 'debug'",
  logFormat: "'text' | 'json' | 'plain'",
  callTimeoutMs: "number > 0",
  streamTimeoutMs: "number > 0",
});

export type BridgeConfig = Readonly<typeof BridgeConfigSchema.infer>;

/** Raw CLI options as commander hands them over. */
export interface BridgeCliOptions {
  upstream?: string;
  listen?: string;
  host?: string;
  port?: string;
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
  callTimeout?: string;
  streamTimeout?: string;
}

function parseNumberOption(raw: string | undefined, fallback: number, flag: string): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`Invalid ${flag}: ${raw}`);
  return n;
}

function parseChoice<T extends string>(
  raw: string,
  guard: (s: string) => s is T,
  flag: string
): T {
  if (!guard(raw)) throw new ConfigError(`Invalid ${flag}: ${raw}`);
  return raw;
}

/**
 * Resolve the startup configuration: flags win over environment, environment
 * over defaults. The result is frozen.
 */
export function resolveBridgeConfig(
  opts: BridgeCliOptions,
  env: NodeJS.ProcessEnv = process.env
): BridgeConfig {
  const listen = parseListen(opts.listen ?? getEnv("LISTEN", env) ?? DEFAULT_BRIDGE_LISTEN);
  const logLevel = opts.verbose
    ? "debug"
    : parseChoice(opts.logLevel ?? getEnv("LOG_LEVEL", env) ?? "info", isLogLevel, "--log-level");

  const candidate = {
    upstreamUrl: trimTrailingSlash(opts.upstream ?? getEnv("UPSTREAM", env) ?? DEFAULT_UPSTREAM_URL),
    host: opts.host ?? listen.host,
    port: parseNumberOption(opts.port, listen.port, "--port"),
    logLevel,
    logFormat: parseChoice(opts.logFormat ?? "text", isLogFormat, "--log-format"),
    callTimeoutMs: parseNumberOption(opts.callTimeout, DEFAULT_CALL_TIMEOUT_MS, "--call-timeout"),
    streamTimeoutMs: parseNumberOption(
      opts.streamTimeout,
      DEFAULT_STREAM_TIMEOUT_MS,
      "--stream-timeout"
    ),
  };

  const out = BridgeConfigSchema(candidate);
  if (out instanceof type.errors) {
    throw new ConfigError(`Invalid configuration: ${out.summary}`);
  }
  return Object.freeze(out);
}
