// Barrel export for configuration

export { Config } from "./config";
export { ConfigError } from "./errors";
export { defaultConfig } from "./defaults";
export { resolveConfigPath, CONFIG_PATH_ENV } from "./paths";
export { resolveProviderSettings, type ResolvedProvider } from "./providers";
export type { LoadOptions } from "./loader";
export type {
  AppConfig,
  LlmProviderSettings,
  LoggingConfig,
  SecurityConfig,
  ToolDefaults,
} from "./types";
