import { Config } from "../../../../config/config";
import { ToolManager } from "../../../../tools/runtime/manager";
import type { ConfigOptions } from "../../types";
import { ensureConfigExists } from "../../utils/errors";

/**
 * Tool commands work without a config file at the default location; defaults
 * are used in memory. A path given with --config must exist.
 */
export async function loadToolManager(options: ConfigOptions): Promise<ToolManager> {
  if (options.configFromFlag) {
    ensureConfigExists(options.config);
  }
  const cfg = await Config.load(options.config, { createIfMissing: false });
  return new ToolManager(cfg);
}
