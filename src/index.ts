export {
  Config,
  ConfigError,
  defaultConfig,
  resolveConfigPath,
  resolveProviderSettings,
  type AppConfig,
  type LlmProviderSettings,
  type LoadOptions,
  type ResolvedProvider,
} from "./config";
export {
  initializeRegistry,
  describeTool,
  isToolCategoryName,
  type DescriptorFor,
  type ToolCatalog,
  type ToolCategoryName,
  type ToolDescriptor,
} from "./tools/catalog";
export * from "./tools/runtime";
export { createToolbenchApp } from "./presentators/http/app";
export { startHonoServer } from "./presentators/http/server";
export { configureLogger } from "./utils/logging/logger";
export { VERSION } from "./version";
