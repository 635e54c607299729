import type { ConfigOptions } from "../../types";
import { loadToolManager } from "./load-manager";

export async function cmdToolsList(options: ConfigOptions): Promise<void> {
  const manager = await loadToolManager(options);
  for (const name of manager.listAvailableTools()) {
    console.log(name);
  }
}
