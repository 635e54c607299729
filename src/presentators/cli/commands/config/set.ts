import { Config } from "../../../../config/config";
import { parseValueLiteral } from "../../../../utils/json/parse";
import type { ConfigOptions } from "../../types";
import { ensureArgument, ensureConfigExists } from "../../utils/errors";

export async function cmdConfigSet(
  pathArg: string | undefined,
  valueArg: string | undefined,
  options: ConfigOptions
): Promise<void> {
  ensureArgument(pathArg, "Usage: config set <path> <value>");
  ensureArgument(valueArg, "Usage: config set <path> <value>");
  const filePath = options.config;
  ensureConfigExists(filePath);
  const cfg = await Config.load(filePath, { createIfMissing: false });
  await cfg.set(pathArg, parseValueLiteral(valueArg));
  console.log(`Updated ${pathArg} in ${filePath}`);
}
