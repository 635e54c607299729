import type { ToolCategoryName } from "../catalog/types";
import type { ToolHandler, ToolInvocation } from "./types";

/**
 * Handlers keyed by tool category, one per category
 */
export class ToolHandlerRegistry {
  private handlers: Map<string, ToolHandler>;

  constructor() {
    this.handlers = new Map();
  }

  register<Name extends ToolCategoryName>(handler: ToolHandler<Name>): void {
    if (this.handlers.has(handler.name)) {
      throw new Error(`Handler for '${handler.name}' is already registered`);
    }
    this.handlers.set(handler.name, widenHandler(handler));
  }

  get(name: string): ToolHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }
}

/**
 * A handler for one category, callable with any invocation whose name matches it.
 */
function widenHandler<Name extends ToolCategoryName>(handler: ToolHandler<Name>): ToolHandler {
  return {
    name: handler.name,
    description: handler.description,
    validateParams: handler.validateParams,
    execute(invocation) {
      if (!isInvocationFor(handler.name, invocation)) {
        throw new Error(`Handler '${handler.name}' cannot run '${invocation.name}'`);
      }
      return handler.execute(invocation);
    },
  };
}

function isInvocationFor<Name extends ToolCategoryName>(
  name: Name,
  invocation: ToolInvocation
): invocation is ToolInvocation & ToolInvocation<Name> {
  return invocation.name === name;
}
