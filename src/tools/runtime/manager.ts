import type { Config } from "../../config/config";
import type { ToolDefaults } from "../../config/types";
import { isRecord } from "../../utils/path/object-path";
import { logDebug, logError } from "../../utils/logging/log";
import { initializeRegistry } from "../catalog/builtin";
import { descriptorValues } from "../catalog/describe";
import type { DescriptorFor, ToolCatalog, ToolCategoryName, ToolDescriptor } from "../catalog/types";
import {
  ExecutorNotConfiguredError,
  ToolExecutionError,
  UnknownToolError,
  UnmetRequirementError,
  isToolError,
} from "./errors";
import { registeredToolPolicy } from "./policies";
import type { ToolContext, ToolExecutor, ToolParams, ToolRequirementPolicy, ToolResult } from "./types";

export type ToolManagerOptions = {
  requirements?: ToolRequirementPolicy;
  executor?: ToolExecutor;
};

/**
 * Answers what engineering tools exist and dispatches them to the configured executor.
 *
 * Each manager builds its own catalog at construction; nothing afterwards changes it.
 */
export class ToolManager {
  readonly config: Config;
  private readonly registry: ToolCatalog;
  private readonly requirements: ToolRequirementPolicy;
  private readonly executor?: ToolExecutor;

  constructor(config: Config, options: ToolManagerOptions = {}) {
    this.config = config;
    this.registry = initializeRegistry();
    this.requirements = options.requirements ?? registeredToolPolicy;
    this.executor = options.executor;
  }

  /** Exact-name lookup; unknown names yield undefined */
  getTool<Name extends ToolCategoryName>(toolName: Name): DescriptorFor<Name>;
  getTool(toolName: string): ToolDescriptor | undefined;
  getTool(toolName: string): ToolDescriptor | undefined {
    return this.registry.get(toolName);
  }

  hasTool(toolName: string): toolName is ToolCategoryName {
    return this.registry.has(toolName);
  }

  listAvailableTools(): string[] {
    return this.registry.names();
  }

  /**
   * Categories whose descriptor lists `value` (a language, engine, format, ...).
   */
  findToolsSupporting(value: string): ToolCategoryName[] {
    return this.registry
      .entries()
      .filter((entry) => descriptorValues(entry.descriptor).includes(value))
      .map((entry) => entry.name);
  }

  getToolDefaults(toolName: string): ToolDefaults {
    const section = this.config.get(`tools.${toolName}`);
    return isRecord(section) ? { ...section } : {};
  }

  validateToolRequirements(toolName: string): boolean {
    if (!this.registry.has(toolName)) return false;
    return this.requirements.isSatisfied(toolName, this.registry.get(toolName), this.config);
  }

  async executeTool(toolName: string, params: ToolParams = {}, context: ToolContext = {}): Promise<ToolResult> {
    if (!this.registry.has(toolName)) {
      throw new UnknownToolError(toolName);
    }
    const descriptor = this.registry.get(toolName);
    if (!this.requirements.isSatisfied(toolName, descriptor, this.config)) {
      throw new UnmetRequirementError(toolName);
    }
    if (!this.executor) {
      throw new ExecutorNotConfiguredError(toolName);
    }

    const logContext = { toolName, requestId: context.requestId };
    logDebug("Executing tool", { params }, logContext);
    try {
      return await this.executor.execute({
        name: toolName,
        descriptor,
        params,
        defaults: this.getToolDefaults(toolName),
        config: this.config,
        context,
      });
    } catch (error) {
      if (isToolError(error)) throw error;
      logError("Tool execution failed", error, logContext);
      throw new ToolExecutionError(toolName, error);
    }
  }
}
