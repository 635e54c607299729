import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import type { ToolManager } from "../../tools/runtime/manager";
import { logInfo } from "../../utils/logging/log";
import { extractEndpoints, formatStartupInfo } from "./utils/startup-info";

export const DEFAULT_PORT = 8090;

export function resolvePort(portFromArg?: string | number): number {
  if (typeof portFromArg === "number") return portFromArg;
  if (typeof portFromArg === "string" && portFromArg.trim()) {
    const n = parseInt(portFromArg, 10);
    if (!Number.isNaN(n)) return n;
  }
  const env = parseInt(process.env.PORT || String(DEFAULT_PORT), 10);
  return Number.isNaN(env) ? DEFAULT_PORT : env;
}

export interface ServerOptions {
  port?: number | string;
}

/**
 * Starts a Node server for the Hono app and prints the startup summary.
 */
export function startHonoServer(app: Hono, manager: ToolManager, opts: ServerOptions = {}): ReturnType<typeof serve> {
  const port = resolvePort(opts.port);

  return serve({ fetch: app.fetch, port }, (info) => {
    for (const line of formatStartupInfo(info.port, manager.config, manager, extractEndpoints(app))) {
      console.log(line);
    }
    logInfo("Server listening", { port: info.port });
  });
}
