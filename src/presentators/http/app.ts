import { Hono } from "hono";
import type { ToolManager } from "../../tools/runtime/manager";
import { requestIdMiddleware } from "./middleware/request-id";
import { createToolsRouter } from "./routes/tools/router";
import { createGlobalErrorHandler } from "./utils/global-error-handler";
import { toErrorBody } from "./utils/error-helpers";

export function createToolbenchApp(manager: ToolManager): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(createGlobalErrorHandler());
  app.notFound((c) => c.json(toErrorBody(`No route for ${c.req.method} ${c.req.path}`, "not_found"), 404));

  // Health
  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.route("/v1", createToolsRouter(manager)); // => /v1/tools, /v1/tools/:name, ...

  return app;
}
