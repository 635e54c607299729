import { Config } from "../../../../config/config";
import type { ConfigOptions } from "../../types";
import { ensureConfigExists } from "../../utils/errors";

function listSummary(cfg: Config): Record<string, unknown> {
  const { llm, tools, logging } = cfg.data;
  return {
    llm: {
      defaultProvider: llm?.defaultProvider,
      providers: Object.keys(llm?.providers ?? {}),
    },
    tools: Object.keys(tools ?? {}),
    logging: logging ? { ...logging } : undefined,
  };
}

export async function cmdConfigList(options: ConfigOptions): Promise<void> {
  const filePath = options.config;
  ensureConfigExists(filePath);
  const cfg = await Config.load(filePath, { createIfMissing: false });
  console.log(JSON.stringify(listSummary(cfg), null, 2));
}
