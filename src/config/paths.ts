import { existsSync } from "node:fs";
import path from "node:path";

export const CONFIG_PATH_ENV = "TOOLBENCH_CONFIG_PATH";

export function resolveConfigPath(cwd: string = process.cwd()): string {
  const fromEnv = process.env[CONFIG_PATH_ENV];
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }
  const candidates = [
    path.join(cwd, "toolbench.config.json"),
    path.join(cwd, "config", "toolbench.config.json"),
  ];
  for (const p of candidates) {
    if (existsSync(p)) {
      return p;
    }
  }
  return candidates[0];
}
