import { expandConfig } from "../../../../config/expansion";
import { readConfigFile } from "../../../../config/loader";
import { maskSecrets } from "../../../../utils/security/mask-sensitive";
import type { ConfigOptions } from "../../types";
import { ensureConfigExists } from "../../utils/errors";

export async function cmdConfigShow(options: ConfigOptions): Promise<void> {
  const filePath = options.config;
  ensureConfigExists(filePath);
  const raw = await readConfigFile(filePath);
  const output = options.expanded ? expandConfig(raw) : raw;
  console.log(JSON.stringify(maskSecrets(output), null, 2));
}
