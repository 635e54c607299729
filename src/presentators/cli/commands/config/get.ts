import { Config } from "../../../../config/config";
import type { ConfigOptions } from "../../types";
import { ensureArgument, ensureConfigExists } from "../../utils/errors";

export async function cmdConfigGet(pathArg: string | undefined, options: ConfigOptions): Promise<void> {
  ensureArgument(pathArg, "Missing <path>. Example: llm.providers.openai.model");
  const filePath = options.config;
  ensureConfigExists(filePath);
  const cfg = await Config.load(filePath, { createIfMissing: false });
  const value = cfg.get(pathArg);
  console.log(JSON.stringify(value ?? null, null, 2));
}
