/**
 * Tool runtime
 *
 * Lookup over the engineering tool catalog plus the requirement and
 * execution extension points.
 */

export * from "./types";
export * from "./errors";
export { ToolManager, type ToolManagerOptions } from "./manager";
export { ToolHandlerRegistry } from "./registry";
export { HandlerToolExecutor } from "./executor";
export { registeredToolPolicy, handlerAvailablePolicy, allOf } from "./policies";
