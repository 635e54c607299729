import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { isToolError } from "../../../tools/runtime/errors";
import { logError, logWarn } from "../../../utils/logging/log";
import { statusForToolError, toErrorBody } from "./error-helpers";

export function createGlobalErrorHandler(): ErrorHandler {
  return (err, c) => {
    const requestId = c.get("requestId");

    if (isToolError(err)) {
      const status = statusForToolError(err.code);
      if (status >= 500) {
        logError("Tool request failed", err, { requestId, toolName: err.toolName });
      } else {
        logWarn(err.message, undefined, { requestId, toolName: err.toolName });
      }
      return c.json(toErrorBody(err.message, err.code), status);
    }

    if (err instanceof HTTPException) {
      logWarn(err.message, undefined, { requestId });
      return c.json(toErrorBody(err.message, "bad_request"), err.status);
    }

    logError("Unhandled request error", err, { requestId });
    return c.json(toErrorBody("Internal server error", "internal_error"), 500);
  };
}
