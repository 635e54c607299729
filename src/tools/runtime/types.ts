/**
 * Tool runtime types
 *
 * The manager owns lookup; what "requirements met" and "execute" mean is
 * supplied by the collaborators declared here.
 */
import type { Config } from "../../config/config";
import type { ToolDefaults } from "../../config/types";
import type { DescriptorFor, ToolCategoryName, ToolDescriptor } from "../catalog/types";

export type ToolParams = Record<string, unknown>;

export type ToolResult = Record<string, unknown>;

export type ToolContext = {
  requestId?: string;
  [key: string]: unknown;
};

export type ToolInvocation<Name extends ToolCategoryName = ToolCategoryName> = {
  name: Name;
  descriptor: DescriptorFor<Name>;
  params: ToolParams;
  /** `tools.<name>` section of the config, `{}` when absent */
  defaults: ToolDefaults;
  config: Config;
  context: ToolContext;
};

/**
 * Decides whether a registered tool can run.
 * Only called for names present in the catalog.
 */
export interface ToolRequirementPolicy {
  isSatisfied(name: ToolCategoryName, descriptor: ToolDescriptor, config: Config): boolean;
}

/**
 * Runs a tool. Called only after the requirement policy accepted the tool.
 * Rejections are wrapped in ToolExecutionError by the manager.
 */
export interface ToolExecutor {
  execute(invocation: ToolInvocation): Promise<ToolResult>;
}

export type ToolHandler<Name extends ToolCategoryName = ToolCategoryName> = {
  name: Name;
  description: string;
  execute(invocation: ToolInvocation<Name>): ToolResult | Promise<ToolResult>;
  // Optional params validation; false rejects the call with InvalidToolParamsError
  validateParams?: (params: ToolParams) => boolean;
};
