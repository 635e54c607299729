#!/usr/bin/env node
import { runCli } from "./presentators/cli/cli";
import { CliError, exitWithError } from "./presentators/cli/utils/errors";
import { ConfigError } from "./config/errors";

runCli(process.argv).catch((err: unknown) => {
  if (err instanceof CliError) {
    exitWithError(err.message, err.exitCode);
  }
  if (err instanceof ConfigError) {
    exitWithError(err.message);
  }
  console.error(err);
  process.exit(1);
});
