/** Environment variable names read at startup. */
export const BRIDGE_ENV = {
  UPSTREAM: "BRIDGE_UPSTREAM",
  LISTEN: "BRIDGE_LISTEN",
  LOG_LEVEL: "BRIDGE_LOG_LEVEL",
} as const;

export function getEnv(
  key: keyof typeof BRIDGE_ENV,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[BRIDGE_ENV[key]];
  return value === "" ? undefined : value;
}
