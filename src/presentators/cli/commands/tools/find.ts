import type { ConfigOptions } from "../../types";
import { ensureArgument } from "../../utils/errors";
import { loadToolManager } from "./load-manager";

export async function cmdToolsFind(valueArg: string | undefined, options: ConfigOptions): Promise<void> {
  ensureArgument(valueArg, "Missing <value>. Example: python");
  const manager = await loadToolManager(options);
  for (const name of manager.findToolsSupporting(valueArg)) {
    console.log(name);
  }
}
