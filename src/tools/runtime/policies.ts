import type { Config } from "../../config/config";
import type { ToolCategoryName, ToolDescriptor } from "../catalog/types";
import type { ToolHandlerRegistry } from "./registry";
import type { ToolRequirementPolicy } from "./types";

/**
 * Default policy: a tool present in the catalog has its requirements met.
 */
export const registeredToolPolicy: ToolRequirementPolicy = {
  isSatisfied: () => true,
};

/**
 * Requirements are met when a handler is registered for the tool.
 */
export function handlerAvailablePolicy(handlers: ToolHandlerRegistry): ToolRequirementPolicy {
  return {
    isSatisfied: (name) => handlers.has(name),
  };
}

/**
 * Every policy must accept the tool. Evaluation stops at the first refusal.
 */
export function allOf(...policies: ToolRequirementPolicy[]): ToolRequirementPolicy {
  return {
    isSatisfied: (name: ToolCategoryName, descriptor: ToolDescriptor, config: Config) =>
      policies.every((p) => p.isSatisfied(name, descriptor, config)),
  };
}
