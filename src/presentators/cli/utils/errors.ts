import { existsSync } from "node:fs";

/**
 * Error reported to the user as-is, ending the command with `exitCode`
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

/**
 * Exits the process with an error message
 */
export function exitWithError(message: string, code: number = 1): never {
  console.error(message);
  process.exit(code);
}

/**
 * Ensures a config file exists
 */
export function ensureConfigExists(filePath: string): void {
  if (!existsSync(filePath)) {
    throw new CliError(`Config file not found: ${filePath}`);
  }
}

/**
 * Ensures a required argument is provided
 */
export function ensureArgument<T>(
  arg: T | undefined,
  errorMessage: string
): asserts arg is T {
  if (arg === undefined || arg === null) {
    throw new CliError(errorMessage);
  }
}

/**
 * Checks if a file exists with force option support
 */
export function checkFileExistsWithForce(
  filePath: string,
  force: boolean = false,
  errorMessage?: string
): void {
  if (existsSync(filePath) && !force) {
    throw new CliError(errorMessage || `File already exists: ${filePath} (use --force to overwrite)`);
  }
}
