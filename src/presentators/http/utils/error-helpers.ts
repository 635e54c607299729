// Shared Hono error utilities to keep handlers DRY
import type { ToolErrorCode } from "../../../tools/runtime/errors";

export type ErrorBody = {
  error: {
    type: string;
    message: string;
  };
};

export function toErrorBody(message: string, type: string): ErrorBody {
  return { error: { type, message } };
}

export function statusForToolError(code: ToolErrorCode): 400 | 404 | 422 | 500 | 501 {
  switch (code) {
    case "unknown_tool":
      return 404;
    case "invalid_params":
      return 400;
    case "unmet_requirement":
      return 422;
    case "executor_not_configured":
      return 501;
    case "execution_failed":
      return 500;
  }
}
