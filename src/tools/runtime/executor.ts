import { ToolHandlerRegistry } from "./registry";
import { ExecutorNotConfiguredError, InvalidToolParamsError } from "./errors";
import type { ToolExecutor, ToolHandler, ToolInvocation, ToolResult } from "./types";
import type { ToolCategoryName } from "../catalog/types";

/**
 * Executor dispatching each invocation to the handler registered for its category.
 */
export class HandlerToolExecutor implements ToolExecutor {
  readonly handlers: ToolHandlerRegistry;

  constructor(handlers: ToolHandler[] = []) {
    this.handlers = new ToolHandlerRegistry();
    for (const h of handlers) this.handlers.register(h);
  }

  register<Name extends ToolCategoryName>(handler: ToolHandler<Name>): this {
    this.handlers.register(handler);
    return this;
  }

  async execute(invocation: ToolInvocation): Promise<ToolResult> {
    const handler = this.handlers.get(invocation.name);
    if (!handler) {
      throw new ExecutorNotConfiguredError(invocation.name);
    }
    if (handler.validateParams && !handler.validateParams(invocation.params)) {
      throw new InvalidToolParamsError(invocation.name);
    }
    return handler.execute(invocation);
  }
}
