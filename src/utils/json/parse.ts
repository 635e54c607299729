/**
 * Parse a CLI value argument: JSON literals (`true`, `42`, `null`, `{"a":1}`)
 * become their JSON value, anything else stays a string.
 */
export function parseValueLiteral(input: string): unknown {
  const trimmed = input.trim();
  if (trimmed === "") return input;
  try {
    const value: unknown = JSON.parse(trimmed);
    return value;
  } catch {
    return input;
  }
}
