import { ConfigError } from "./errors";

/**
 * Expands environment variables in configuration values
 * Supports:
 * - ${ENV_VAR} - Simple environment variable expansion
 * - ${ENV_VAR:-default} - With default value if not set
 * - ${ENV_VAR:?error message} - Throws error if not set
 */
export function expandValue(value: string, env: NodeJS.ProcessEnv = process.env): string {
  const pattern = /\$\{([^}]+)\}/g;

  return value.replace(pattern, (match: string, expr: string) => {
    const defaultMatch = expr.match(/^([^:]+):-(.*)$/);
    if (defaultMatch) {
      const [, varName, defaultValue] = defaultMatch;
      return env[varName.trim()] || defaultValue;
    }

    const errorMatch = expr.match(/^([^:]+):\?(.*)$/);
    if (errorMatch) {
      const [, varName, errorMessage] = errorMatch;
      const resolved = env[varName.trim()];
      if (!resolved) {
        throw new ConfigError(errorMessage || `Environment variable ${varName.trim()} is not set`);
      }
      return resolved;
    }

    // Unknown variables are left as written
    return env[expr.trim()] || match;
  });
}

/**
 * Recursively expands all string values in a JSON document
 */
export function expandConfig(config: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof config === "string") {
    return expandValue(config, env);
  }

  if (Array.isArray(config)) {
    return config.map((item) => expandConfig(item, env));
  }

  if (config && typeof config === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      result[key] = expandConfig(value, env);
    }
    return result;
  }

  return config;
}
