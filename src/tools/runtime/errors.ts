export type ToolErrorCode =
  | "unknown_tool"
  | "invalid_params"
  | "unmet_requirement"
  | "executor_not_configured"
  | "execution_failed";

export abstract class ToolError extends Error {
  abstract readonly code: ToolErrorCode;
  readonly toolName: string;

  protected constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.toolName = toolName;
  }
}

export class UnknownToolError extends ToolError {
  readonly code = "unknown_tool";

  constructor(toolName: string) {
    super(toolName, `Tool '${toolName}' not found`);
    this.name = "UnknownToolError";
  }
}

export class InvalidToolParamsError extends ToolError {
  readonly code = "invalid_params";

  constructor(toolName: string, reason = "params rejected by handler") {
    super(toolName, `Invalid params for tool '${toolName}': ${reason}`);
    this.name = "InvalidToolParamsError";
  }
}

export class UnmetRequirementError extends ToolError {
  readonly code = "unmet_requirement";

  constructor(toolName: string) {
    super(toolName, `Requirements for tool '${toolName}' are not met`);
    this.name = "UnmetRequirementError";
  }
}

export class ExecutorNotConfiguredError extends ToolError {
  readonly code = "executor_not_configured";

  constructor(toolName: string) {
    super(toolName, `No executor configured for tool '${toolName}'`);
    this.name = "ExecutorNotConfiguredError";
  }
}

export class ToolExecutionError extends ToolError {
  readonly code = "execution_failed";

  constructor(toolName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(toolName, `Tool '${toolName}' failed: ${reason}`, { cause });
    this.name = "ToolExecutionError";
  }
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}
