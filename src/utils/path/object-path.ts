/**
 * Get a value from an object using a dot-notation path
 *
 * Walking stops at the first segment whose parent is not a plain object.
 *
 * @example
 * const config = { llm: { providers: { openai: { model: "gpt-4" } } } };
 * getByPath(config, "llm.providers.openai.model") // returns "gpt-4"
 * getByPath(config, "llm.defaultProvider.name") // returns undefined
 */
export function getByPath<T extends object>(obj: T, dotPath: string): unknown {
  return splitPath(dotPath).reduce<unknown>((acc, key) => {
    if (!isRecord(acc)) {
      return undefined;
    }
    return Object.prototype.hasOwnProperty.call(acc, key) ? acc[key] : undefined;
  }, obj);
}

/**
 * Set a value in an object using a dot-notation path
 * Creates intermediate objects as needed, replacing non-object values on the way.
 * Only own properties are descended into; prototype-related segments are rejected.
 *
 * @example
 * const config = {};
 * setByPath(config, "tools.code_analysis.lintingRules", "strict");
 * // config is now { tools: { code_analysis: { lintingRules: "strict" } } }
 */
export function setByPath(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const parts = splitPath(dotPath);
  const unsafe = parts.find((p) => UNSAFE_SEGMENTS.has(p));
  if (unsafe !== undefined) {
    throw new Error(`Invalid path: "${dotPath}" (segment "${unsafe}" is not allowed)`);
  }
  let cur = obj;
  for (let i = 0; i < parts.length - 1; i++) {
    const k = parts[i];
    const next = Object.prototype.hasOwnProperty.call(cur, k) ? cur[k] : undefined;
    if (isRecord(next)) {
      cur = next;
    } else {
      const created: Record<string, unknown> = {};
      cur[k] = created;
      cur = created;
    }
  }
  cur[parts[parts.length - 1]] = value;
}

const UNSAFE_SEGMENTS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function splitPath(dotPath: string): string[] {
  const parts = dotPath.split(".");
  if (parts.some((p) => p.length === 0)) {
    throw new Error(`Invalid path: "${dotPath}"`);
  }
  return parts;
}
