import type { Context, Next } from "hono";

export const REQUEST_ID_HEADER = "x-request-id";

export async function requestIdMiddleware(c: Context, next: Next) {
  const incoming = c.req.header(REQUEST_ID_HEADER);
  const requestId = incoming && incoming.trim() ? incoming.trim() : Math.random().toString(36).substring(2, 10);
  c.set("requestId", requestId);
  c.header(REQUEST_ID_HEADER, requestId);
  await next();
}

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
