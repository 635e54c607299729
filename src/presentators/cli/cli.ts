import { cmdServe } from "./commands/serve";
import { cmdConfigInit } from "./commands/config/init";
import { cmdConfigShow } from "./commands/config/show";
import { cmdConfigList } from "./commands/config/list";
import { cmdConfigGet } from "./commands/config/get";
import { cmdConfigSet } from "./commands/config/set";
import { cmdToolsList } from "./commands/tools/list";
import { cmdToolsShow } from "./commands/tools/show";
import { cmdToolsValidate } from "./commands/tools/validate";
import { cmdToolsFind } from "./commands/tools/find";
import { positionals } from "./commands/utils";
import { parseServeOptions, parseConfigOptions, VALUE_FLAGS } from "./parse-options";
import { CliError } from "./utils/errors";
import { VERSION } from "../../version";

export function usage(): string {
  const base = "toolbench";
  return `
toolbench CLI

Usage:
  ${base} serve [--port <number>] [--config <path>]
  ${base} config init [--config ./toolbench.config.json] [--force]
  ${base} config show [--config ./toolbench.config.json] [--expanded]
  ${base} config list [--config ./toolbench.config.json]
  ${base} config get <path> [--config ./toolbench.config.json]
  ${base} config set <path> <value> [--config ./toolbench.config.json]
  ${base} tools list [--config <path>]
  ${base} tools show <name> [--config <path>]
  ${base} tools validate <name> [--config <path>]
  ${base} tools find <value> [--config <path>]
  ${base} version

Options:
  --port <number>     Port to listen on (default: 8090, or PORT)
  --config <path>     Path to toolbench config JSON (auto-detected if omitted)
  --expanded          Expand env vars in config output (for "config show")
  --force             Overwrite existing config (for "config init")

Examples:
  ${base} config init
  ${base} config get llm.providers.openai.model
  ${base} config set logging.level debug
  ${base} tools show code_analysis
  ${base} tools find python
`;
}

/**
 * Run one CLI invocation. `argv` is the full process argv (node, script, ...args).
 * Failures surface as CliError or ConfigError; the caller decides how to exit.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const args = argv.slice(2);
  const [cmd, subcmd, ...rest] = positionals(args, VALUE_FLAGS);
  if (cmd === undefined) {
    console.log(usage());
    return;
  }
  switch (cmd) {
    case "serve":
      await cmdServe(parseServeOptions(args));
      return;
    case "version":
      console.log(`toolbench v${VERSION}`);
      return;
    case "config": {
      const configOptions = parseConfigOptions(args);
      switch (subcmd) {
        case "init":
          await cmdConfigInit(configOptions);
          return;
        case "show":
          await cmdConfigShow(configOptions);
          return;
        case "list":
          await cmdConfigList(configOptions);
          return;
        case "get":
          await cmdConfigGet(rest[0], configOptions);
          return;
        case "set":
          await cmdConfigSet(rest[0], rest[1], configOptions);
          return;
        default:
          throw new CliError(usage());
      }
    }
    case "tools": {
      const configOptions = parseConfigOptions(args);
      switch (subcmd) {
        case "list":
          await cmdToolsList(configOptions);
          return;
        case "show":
          await cmdToolsShow(rest[0], configOptions);
          return;
        case "validate":
          await cmdToolsValidate(rest[0], configOptions);
          return;
        case "find":
          await cmdToolsFind(rest[0], configOptions);
          return;
        default:
          throw new CliError(usage());
      }
    }
    default:
      throw new CliError(usage());
  }
}
