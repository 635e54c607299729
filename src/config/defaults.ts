import type { AppConfig } from "./types";

const DEFAULT_TEMPERATURE = 0.7;

/**
 * Document written by `config init` and when no config file exists yet.
 */
export function defaultConfig(): AppConfig {
  return {
    llm: {
      defaultProvider: "openai",
      providers: {
        openai: { model: "gpt-4", temperature: DEFAULT_TEMPERATURE },
        anthropic: { model: "claude-2", temperature: DEFAULT_TEMPERATURE },
        mistral: { model: "mistral-large", temperature: DEFAULT_TEMPERATURE },
        groq: { model: "groq-large", temperature: DEFAULT_TEMPERATURE },
        gemini: { model: "gemini-pro", temperature: DEFAULT_TEMPERATURE },
      },
    },
    tools: {
      code_analysis: { defaultLanguage: "python", lintingRules: "strict" },
      simulation: { defaultEngine: "numpy", precision: "double" },
      documentation: { defaultFormat: "markdown", autoGenerate: true },
    },
    security: { apiKeyEnvPrefix: "SEA_", encryptionEnabled: true },
    logging: { level: "info", enabled: true },
  };
}
