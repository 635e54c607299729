import { isRecord } from "../path/object-path";

export function maskApiKey(
  apiKey: string | undefined,
  displayRate = 0.15
): string {
  if (!apiKey) return "not set";
  const displayLength = Math.floor(apiKey.length * displayRate);
  if (apiKey.length <= displayLength) return "***";
  const prefix = apiKey.substring(0, displayLength);
  const masked = "*".repeat(Math.min(apiKey.length - displayLength, 32));

  return `${prefix}${masked}`;
}

const SENSITIVE_KEY = /(apiKey|secret|token|password)$/i;

/**
 * Deep copy of a config document with every secret-looking string masked.
 */
export function maskSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => maskSecrets(item));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] =
        SENSITIVE_KEY.test(key) && typeof inner === "string"
          ? maskApiKey(inner)
          : maskSecrets(inner);
    }
    return out;
  }
  return value;
}
