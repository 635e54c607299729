import { existsSync } from "node:fs";
import { readConfigRaw, writeConfigRaw } from "../utils/json/config-io";
import { logInfo } from "../utils/logging/log";
import { isRecord } from "../utils/path/object-path";
import { defaultConfig } from "./defaults";
import { ConfigError } from "./errors";
import { expandConfig } from "./expansion";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./types";

export type ConfigDocument = {
  /** As written on disk, before env expansion */
  raw: Record<string, unknown>;
  /** Expanded and validated */
  data: AppConfig;
};

export type LoadOptions = {
  /** Write the default document when the file does not exist (default: true) */
  createIfMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

/**
 * Expand and validate a raw document. Throws ConfigError, never returns a partial result.
 */
export function parseConfigDocument(
  raw: unknown,
  options: { filePath?: string; env?: NodeJS.ProcessEnv } = {}
): ConfigDocument {
  if (!isRecord(raw)) {
    const where = options.filePath ? ` in ${options.filePath}` : "";
    throw new ConfigError(`Invalid configuration${where}: expected a JSON object at the top level`, {
      filePath: options.filePath,
    });
  }
  const document = structuredClone(raw);
  let expanded: unknown;
  try {
    expanded = expandConfig(document, options.env);
  } catch (error) {
    if (error instanceof ConfigError && options.filePath) {
      throw new ConfigError(`${error.message} (in ${options.filePath})`, {
        filePath: options.filePath,
        cause: error,
      });
    }
    throw error;
  }
  const result = appConfigSchema.safeParse(expanded);
  if (!result.success) {
    throw ConfigError.fromZod(result.error, options.filePath);
  }
  return { raw: document, data: result.data };
}

export async function loadConfigDocument(filePath: string, options: LoadOptions = {}): Promise<ConfigDocument> {
  if (!existsSync(filePath)) {
    const defaults = defaultConfig();
    if (options.createIfMissing !== false) {
      await writeConfigRaw(filePath, defaults);
      logInfo("Wrote default configuration", { filePath });
    }
    return parseConfigDocument(defaults, { filePath, env: options.env });
  }

  const raw = await readConfigFile(filePath);
  return parseConfigDocument(raw, { filePath, env: options.env });
}

/**
 * Read a config file as JSON without validating it. IO and parse failures become ConfigError.
 */
export async function readConfigFile(filePath: string): Promise<unknown> {
  try {
    return await readConfigRaw(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read configuration ${filePath}: ${reason}`, {
      filePath,
      cause: error,
    });
  }
}
