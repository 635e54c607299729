import type { ConfigOptions } from "../../types";
import { CliError, ensureArgument } from "../../utils/errors";
import { loadToolManager } from "./load-manager";

export async function cmdToolsValidate(nameArg: string | undefined, options: ConfigOptions): Promise<void> {
  ensureArgument(nameArg, "Missing <name>. Example: simulation");
  const manager = await loadToolManager(options);
  if (!manager.hasTool(nameArg)) {
    throw new CliError(`Unknown tool: ${nameArg}`);
  }
  if (!manager.validateToolRequirements(nameArg)) {
    throw new CliError("unmet");
  }
  console.log("ok");
}
