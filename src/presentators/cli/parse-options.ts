import { getArgFlag, hasFlag, resolveCliPath } from "./commands/utils";
import { resolveConfigPath } from "../../config/paths";
import type { ServeOptions, ConfigOptions } from "./types";

export const VALUE_FLAGS = ["config", "port"] as const;

function configPath(args: readonly string[]): string {
  const configArg = getArgFlag(args, "config");
  return configArg ? resolveCliPath(configArg) : resolveConfigPath();
}

export function parseServeOptions(args: readonly string[]): ServeOptions {
  return {
    port: getArgFlag(args, "port"),
    config: configPath(args),
  };
}

export function parseConfigOptions(args: readonly string[]): ConfigOptions {
  return {
    config: configPath(args),
    configFromFlag: Boolean(getArgFlag(args, "config")),
    expanded: hasFlag(args, "expanded"),
    force: hasFlag(args, "force"),
  };
}
