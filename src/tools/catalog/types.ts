/**
 * Tool catalog types
 *
 * A descriptor says what a tool category supports. Each category is bound
 * to exactly one descriptor kind.
 */

export type CatalogDescriptor = {
  kind: "catalog";
  languages: ReadonlySet<string>;
  capabilities: readonly string[];
};

export type EngineDescriptor = {
  kind: "engine";
  types: ReadonlySet<string>;
  engines: ReadonlySet<string>;
};

export type FormatDescriptor = {
  kind: "format";
  formats: ReadonlySet<string>;
  templates: readonly string[];
};

export type OperationalDescriptor = {
  kind: "operational";
  systems: ReadonlySet<string>;
  operations: readonly string[];
};

export type TrackingDescriptor = {
  kind: "tracking";
  integrations: ReadonlySet<string>;
  features: readonly string[];
};

export type ToolDescriptor =
  | CatalogDescriptor
  | EngineDescriptor
  | FormatDescriptor
  | OperationalDescriptor
  | TrackingDescriptor;

export type DescriptorKind = ToolDescriptor["kind"];

// Category -> descriptor kind binding
export type ToolCategoryKinds = {
  code_analysis: "catalog";
  simulation: "engine";
  documentation: "format";
  version_control: "operational";
  project_management: "tracking";
};

export type ToolCategoryName = keyof ToolCategoryKinds;

export type DescriptorFor<Name extends ToolCategoryName> = Extract<
  ToolDescriptor,
  { kind: ToolCategoryKinds[Name] }
>;

export type ToolCategory<Name extends ToolCategoryName = ToolCategoryName> = {
  name: Name;
  descriptor: DescriptorFor<Name>;
};

export type ToolCatalog = {
  get<Name extends ToolCategoryName>(name: Name): DescriptorFor<Name>;
  get(name: string): ToolDescriptor | undefined;
  has(name: string): name is ToolCategoryName;
  names(): ToolCategoryName[];
  entries(): ToolCategory[];
  readonly size: number;
};

/** JSON view of a descriptor; sets become arrays */
export type DescribedTool = {
  kind: DescriptorKind;
  [field: string]: string | string[];
};
