import type { DescribedTool, ToolDescriptor } from "./types";

function assertNever(value: never): never {
  throw new Error(`Unhandled descriptor: ${JSON.stringify(value)}`);
}

/**
 * Plain JSON view of a descriptor, for the CLI and HTTP surfaces.
 */
export function describeTool(descriptor: ToolDescriptor): DescribedTool {
  switch (descriptor.kind) {
    case "catalog":
      return {
        kind: descriptor.kind,
        languages: [...descriptor.languages],
        capabilities: [...descriptor.capabilities],
      };
    case "engine":
      return {
        kind: descriptor.kind,
        types: [...descriptor.types],
        engines: [...descriptor.engines],
      };
    case "format":
      return {
        kind: descriptor.kind,
        formats: [...descriptor.formats],
        templates: [...descriptor.templates],
      };
    case "operational":
      return {
        kind: descriptor.kind,
        systems: [...descriptor.systems],
        operations: [...descriptor.operations],
      };
    case "tracking":
      return {
        kind: descriptor.kind,
        integrations: [...descriptor.integrations],
        features: [...descriptor.features],
      };
    default:
      return assertNever(descriptor);
  }
}

/**
 * Every value a descriptor lists, in field order. Used for tag-style search.
 */
export function descriptorValues(descriptor: ToolDescriptor): string[] {
  const { kind: _kind, ...fields } = describeTool(descriptor);
  return Object.values(fields).flatMap((value) => (Array.isArray(value) ? value : [value]));
}
