import type { ZodError } from "zod";

/**
 * Raised when a configuration source cannot be turned into a valid Config.
 * Construction never yields a partially initialized Config.
 */
export class ConfigError extends Error {
  readonly filePath?: string;
  readonly issues: string[];

  constructor(message: string, options: { filePath?: string; issues?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.filePath = options.filePath;
    this.issues = options.issues ?? [];
  }

  static fromZod(error: ZodError, filePath?: string): ConfigError {
    const issues = error.issues.map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${at}: ${issue.message}`;
    });
    const where = filePath ? ` in ${filePath}` : "";
    return new ConfigError(`Invalid configuration${where}: ${issues.join("; ")}`, {
      filePath,
      issues,
      cause: error,
    });
  }
}
