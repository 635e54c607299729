import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { describeTool } from "../../../../tools/catalog/describe";
import { UnknownToolError } from "../../../../tools/runtime/errors";
import type { ToolManager } from "../../../../tools/runtime/manager";
import type { ToolParams } from "../../../../tools/runtime/types";
import { isRecord } from "../../../../utils/path/object-path";

async function readParams(raw: Request): Promise<ToolParams> {
  const text = await raw.text();
  if (!text.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new HTTPException(400, { message: "Request body must be valid JSON" });
  }
  if (!isRecord(parsed)) {
    throw new HTTPException(400, { message: "Request body must be a JSON object" });
  }
  return parsed;
}

export const createToolsRouter = (manager: ToolManager) => {
  const router = new Hono();

  router.get("/tools", (c) => c.json({ tools: manager.listAvailableTools() }));

  router.get("/tools/:name", (c) => {
    const name = c.req.param("name");
    const descriptor = manager.getTool(name);
    if (!descriptor) throw new UnknownToolError(name);
    return c.json({
      name,
      descriptor: describeTool(descriptor),
      defaults: manager.getToolDefaults(name),
    });
  });

  router.post("/tools/:name/validate", (c) => {
    const name = c.req.param("name");
    if (!manager.hasTool(name)) throw new UnknownToolError(name);
    return c.json({ name, satisfied: manager.validateToolRequirements(name) });
  });

  router.post("/tools/:name/execute", async (c) => {
    const name = c.req.param("name");
    const params = await readParams(c.req.raw);
    const result = await manager.executeTool(name, params, { requestId: c.get("requestId") });
    return c.json({ name, result });
  });

  return router;
};
