import { resolveBridgeConfig, type BridgeCliOptions } from "../../config.js";
import { getPackageJsonVersion } from "../utils.js";

export async function runStatus(opts: BridgeCliOptions): Promise<void> {
  const config = resolveBridgeConfig(opts);
  const status = {
    version: getPackageJsonVersion(),
    ...config,
  };
  process.stdout.write(JSON.stringify(status, null, 2) + "\n");
}
