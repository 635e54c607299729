import type { Config } from "./config";
import type { LlmProviderSettings } from "./types";

export type ResolvedProvider = LlmProviderSettings & {
  id: string;
  /** Where the api key came from, if one was found */
  apiKeySource?: "config" | "env";
};

function envKeyName(prefix: string, providerId: string): string {
  return `${prefix}${providerId.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_API_KEY`;
}

/**
 * Settings for one LLM provider, with its api key resolved from the config
 * or from `<apiKeyEnvPrefix><ID>_API_KEY`, then `<ID>_API_KEY`.
 *
 * Without an id, `llm.defaultProvider` is used. Unknown providers yield undefined.
 */
export function resolveProviderSettings(
  config: Config,
  providerId?: string,
  env: NodeJS.ProcessEnv = process.env
): ResolvedProvider | undefined {
  const id = providerId ?? config.data.llm?.defaultProvider;
  if (!id) return undefined;
  const settings = config.data.llm?.providers?.[id];
  if (!settings) return undefined;

  if (settings.apiKey) {
    return { ...settings, id, apiKeySource: "config" };
  }

  const prefix = config.data.security?.apiKeyEnvPrefix ?? "";
  const candidates = prefix ? [envKeyName(prefix, id), envKeyName("", id)] : [envKeyName("", id)];
  for (const name of candidates) {
    const value = env[name];
    if (value) {
      return { ...settings, id, apiKey: value, apiKeySource: "env" };
    }
  }
  return { ...settings, id };
}
