import { writeConfigRaw } from "../utils/json/config-io";
import { configureLogger } from "../utils/logging/logger";
import { getByPath, setByPath } from "../utils/path/object-path";
import { ConfigError } from "./errors";
import { loadConfigDocument, parseConfigDocument, type ConfigDocument, type LoadOptions } from "./loader";
import { resolveConfigPath } from "./paths";
import type { AppConfig } from "./types";

/**
 * Nested configuration with dotted-path access.
 *
 * Reads go against the expanded document; writes are applied to the
 * document as written on disk and persisted when the Config came from a file.
 */
export class Config {
  private document: ConfigDocument;
  private readonly env?: NodeJS.ProcessEnv;
  readonly filePath?: string;

  private constructor(document: ConfigDocument, filePath?: string, env?: NodeJS.ProcessEnv) {
    this.document = document;
    this.filePath = filePath;
    this.env = env;
  }

  /**
   * Load from a JSON file. The path defaults to {@link resolveConfigPath}.
   * A missing file is created from the defaults; an unreadable or invalid one throws ConfigError.
   */
  static async load(filePath?: string, options: LoadOptions = {}): Promise<Config> {
    const target = filePath ?? resolveConfigPath();
    const document = await loadConfigDocument(target, options);
    const logging = document.data.logging;
    if (logging) {
      configureLogger({ level: logging.level, enabled: logging.enabled });
    }
    return new Config(document, target, options.env);
  }

  static fromObject(raw: unknown, options: { env?: NodeJS.ProcessEnv } = {}): Config {
    return new Config(parseConfigDocument(raw, { env: options.env }), undefined, options.env);
  }

  get data(): Readonly<AppConfig> {
    return this.document.data;
  }

  /**
   * Read a value by dotted path. Missing keys (and stored nulls) yield `defaultValue`.
   */
  get(key: string, defaultValue?: unknown): unknown {
    const value = getByPath(this.document.data, key);
    return value ?? defaultValue;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Set a value by dotted path. The whole document is re-validated first;
   * on failure nothing changes.
   */
  async set(key: string, value: unknown): Promise<void> {
    const nextRaw = structuredClone(this.document.raw);
    try {
      setByPath(nextRaw, key, value);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(message, { filePath: this.filePath, cause: error });
    }
    const next = parseConfigDocument(nextRaw, { filePath: this.filePath, env: this.env });
    if (this.filePath) {
      await writeConfigRaw(this.filePath, next.raw);
    }
    this.document = next;
  }

  /** Deep copy of the expanded document */
  toJSON(): AppConfig {
    return structuredClone(this.document.data);
  }
}
