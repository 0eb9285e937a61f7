import { Command } from "commander";
import type { BridgeCliOptions } from "../config.js";
import { DEFAULT_BRIDGE_LISTEN } from "../shared/constants.js";
import { LOG_FORMATS, LOG_LEVELS } from "../shared/logging.js";
import { runBridge } from "./commands/bridge.js";
import { runStatus } from "./commands/status.js";
import { getPackageJsonVersion } from "./utils.js";

function withConfigOptions(cmd: Command): Command {
  return cmd
    .option("--upstream <url>", "Base URL of the upstream SSE RPC server")
    .option("--listen <host:port>", `Bridge listen address (default ${DEFAULT_BRIDGE_LISTEN})`)
    .option("--host <host>", "Bridge host (overrides --listen)")
    .option("--port <port>", "Bridge port (overrides --listen)")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", `Log level: ${LOG_LEVELS.join(", ")}`)
    .option("--log-format <format>", `Log format: ${LOG_FORMATS.join(", ")}`)
    .option("--call-timeout <ms>", "Message endpoint request timeout in ms")
    .option("--stream-timeout <ms>", "Stream read timeout in ms");
}

export function createProgram(): Command {
  // Options after `status` belong to the subcommand, not the root bridge command.
  const program = new Command().enablePositionalOptions();

  withConfigOptions(
    program
      .name("sse-rpc-bridge")
      .description("HTTP bridge for session-based JSON-RPC over SSE device servers")
      .version(getPackageJsonVersion())
  ).action((opts: BridgeCliOptions) => runBridge(opts));

  withConfigOptions(
    program.command("status").description("Print the resolved configuration")
  ).action((opts: BridgeCliOptions) => runStatus(opts));

  return program;
}
