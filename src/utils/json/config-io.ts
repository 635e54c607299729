import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Read a JSON configuration file from disk
 *
 * @throws If the file cannot be read or parsed as JSON
 */
export async function readConfigRaw(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

/**
 * Write a configuration document to disk, creating the parent directory
 */
export async function writeConfigRaw(filePath: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const json = JSON.stringify(data, null, 2) + "\n";
  await writeFile(filePath, json, "utf8");
}
