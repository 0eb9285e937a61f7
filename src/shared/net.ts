/**
 * Parse --listen value (e.g. "127.0.0.1:8080" or "8080") into host and port.
 */
export function parseListen(listen: string): { host: string; port: number } {
  const defaultHost = "127.0.0.1";
  const defaultPort = 8080;
  if (!listen || listen === "") return { host: defaultHost, port: defaultPort };
  const colon = listen.lastIndexOf(":");
  if (colon === -1) {
    const port = parseInt(listen, 10);
    if (Number.isNaN(port) || port <= 0 || port > 65535)
      return { host: defaultHost, port: defaultPort };
    return { host: defaultHost, port };
  }
  const host = listen.slice(0, colon).trim() || defaultHost;
  const port = parseInt(listen.slice(colon + 1), 10);
  if (Number.isNaN(port) || port <= 0 || port > 65535)
    return { host, port: defaultPort };
  return { host, port };
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
