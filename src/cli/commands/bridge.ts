import chalk from "chalk";
import { resolveBridgeConfig, type BridgeCliOptions } from "../../config.js";
import { startBridgeServer } from "../../bridge/server.js";
import { EXIT, exit } from "../../shared/errors.js";
import { errorMessage, initLogger, log } from "../../shared/logging.js";
import { SessionClient } from "../../upstream/session-client.js";
import { getPackageJsonVersion, waitForShutdownSignal } from "../utils.js";

export async function runBridge(opts: BridgeCliOptions): Promise<void> {
  const config = resolveBridgeConfig(opts);
  initLogger(config.logLevel, config.logFormat);

  const client = new SessionClient({
    baseUrl: config.upstreamUrl,
    callTimeoutMs: config.callTimeoutMs,
    streamTimeoutMs: config.streamTimeoutMs,
  });

  try {
    await client.start();
  } catch (err) {
    // The first call retries establishment, so a device that is still booting is not fatal.
    log.warn(`Upstream not reachable yet: ${errorMessage(err)}`);
  }

  const handle = await startBridgeServer({ host: config.host, port: config.port }, client);
  const bridgeUrl = `http://${handle.host}:${handle.port}`;

  process.stderr.write("\n");
  process.stderr.write(chalk.bold("SSE RPC Bridge") + "\n");
  process.stderr.write(
    "───────────────────────────────────────────────────────────────\n"
  );
  process.stderr.write(`Version:     v${getPackageJsonVersion()}\n`);
  process.stderr.write(`Bridge URL:  ${bridgeUrl}\n`);
  process.stderr.write(`Upstream:    ${config.upstreamUrl}\n`);
  process.stderr.write(`Session:     ${client.sessionId ?? "not established"}\n`);
  process.stderr.write("\nTry:\n");
  process.stderr.write(`  curl ${bridgeUrl}/health\n`);
  process.stderr.write(
    `  curl -X POST ${bridgeUrl}/call -H 'Content-Type: application/json' -d '{"tool":"<name>","arguments":{}}'\n`
  );
  process.stderr.write(
    "───────────────────────────────────────────────────────────────\n\n"
  );

  const signal = await waitForShutdownSignal();
  log.info(`Received ${signal}, shutting down`);
  try {
    await client.stop();
    await handle.close();
  } catch (err) {
    exit(EXIT.GENERIC_ERROR, `Shutdown failed: ${errorMessage(err)}`);
  }
  exit(EXIT.SUCCESS);
}
