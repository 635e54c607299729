import { describeTool } from "../../../../tools/catalog/describe";
import type { ConfigOptions } from "../../types";
import { CliError, ensureArgument } from "../../utils/errors";
import { loadToolManager } from "./load-manager";

export async function cmdToolsShow(nameArg: string | undefined, options: ConfigOptions): Promise<void> {
  ensureArgument(nameArg, "Missing <name>. Example: code_analysis");
  const manager = await loadToolManager(options);
  const descriptor = manager.getTool(nameArg);
  if (!descriptor) {
    throw new CliError(`Unknown tool: ${nameArg}. Available: ${manager.listAvailableTools().join(", ")}`);
  }
  const output = {
    name: nameArg,
    descriptor: describeTool(descriptor),
    defaults: manager.getToolDefaults(nameArg),
  };
  console.log(JSON.stringify(output, null, 2));
}
