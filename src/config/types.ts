import type { z } from "zod";
import type { appConfigSchema, llmProviderSettingsSchema } from "./schema";

export type AppConfig = z.infer<typeof appConfigSchema>;

export type LlmProviderSettings = z.infer<typeof llmProviderSettingsSchema>;

export type LoggingConfig = NonNullable<AppConfig["logging"]>;

export type SecurityConfig = NonNullable<AppConfig["security"]>;

/** Per-category defaults, keyed by tool category name */
export type ToolDefaults = Record<string, unknown>;
