import { defaultConfig } from "../../../../config/defaults";
import { writeConfigRaw } from "../../../../utils/json/config-io";
import type { ConfigOptions } from "../../types";
import { checkFileExistsWithForce } from "../../utils/errors";

export async function cmdConfigInit(options: ConfigOptions): Promise<void> {
  const filePath = options.config;
  checkFileExistsWithForce(
    filePath,
    options.force,
    `Config already exists: ${filePath} (use --force to overwrite)`
  );
  await writeConfigRaw(filePath, defaultConfig());
  console.log(`Initialized config at ${filePath}`);
}
