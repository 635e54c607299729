import { Config } from "../../../config/config";
import { ToolManager } from "../../../tools/runtime/manager";
import { createToolbenchApp } from "../../http/app";
import { startHonoServer } from "../../http/server";
import type { ServeOptions } from "../types";

export async function cmdServe(options: ServeOptions): Promise<void> {
  const config = await Config.load(options.config);
  const manager = new ToolManager(config);
  const app = createToolbenchApp(manager);
  startHonoServer(app, manager, { port: options.port });
}
