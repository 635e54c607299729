import type {
  CatalogDescriptor,
  DescriptorFor,
  EngineDescriptor,
  FormatDescriptor,
  OperationalDescriptor,
  ToolCatalog,
  ToolCategory,
  ToolCategoryName,
  ToolDescriptor,
  TrackingDescriptor,
} from "./types";

export type CatalogEntries = { readonly [Name in ToolCategoryName]: DescriptorFor<Name> };

// Listing order; a new category does not compile until it is placed here
const CATEGORY_ORDER: { readonly [Name in ToolCategoryName]: number } = {
  code_analysis: 0,
  simulation: 1,
  documentation: 2,
  version_control: 3,
  project_management: 4,
};

export function isToolCategoryName(name: string): name is ToolCategoryName {
  return Object.prototype.hasOwnProperty.call(CATEGORY_ORDER, name);
}

const ORDERED_NAMES: readonly ToolCategoryName[] = Object.freeze(
  Object.keys(CATEGORY_ORDER)
    .filter(isToolCategoryName)
    .sort((a, b) => CATEGORY_ORDER[a] - CATEGORY_ORDER[b])
);

/**
 * Set whose contents are fixed at construction; mutators throw
 */
export class ReadonlySetView<T> extends Set<T> {
  constructor(values: Iterable<T>) {
    super();
    for (const value of values) super.add(value);
    Object.freeze(this);
  }

  add(value: T): this {
    throw new TypeError(`Cannot add "${String(value)}" to a read-only set`);
  }

  delete(value: T): boolean {
    throw new TypeError(`Cannot delete "${String(value)}" from a read-only set`);
  }

  clear(): void {
    throw new TypeError("Cannot clear a read-only set");
  }
}

function frozenList(values: readonly string[]): readonly string[] {
  return Object.freeze([...values]);
}

// Copies every field so callers never hold the catalog's own collections
function freezeCatalog(d: CatalogDescriptor): CatalogDescriptor {
  return Object.freeze({
    kind: d.kind,
    languages: new ReadonlySetView(d.languages),
    capabilities: frozenList(d.capabilities),
  });
}

function freezeEngine(d: EngineDescriptor): EngineDescriptor {
  return Object.freeze({
    kind: d.kind,
    types: new ReadonlySetView(d.types),
    engines: new ReadonlySetView(d.engines),
  });
}

function freezeFormat(d: FormatDescriptor): FormatDescriptor {
  return Object.freeze({
    kind: d.kind,
    formats: new ReadonlySetView(d.formats),
    templates: frozenList(d.templates),
  });
}

function freezeOperational(d: OperationalDescriptor): OperationalDescriptor {
  return Object.freeze({
    kind: d.kind,
    systems: new ReadonlySetView(d.systems),
    operations: frozenList(d.operations),
  });
}

function freezeTracking(d: TrackingDescriptor): TrackingDescriptor {
  return Object.freeze({
    kind: d.kind,
    integrations: new ReadonlySetView(d.integrations),
    features: frozenList(d.features),
  });
}

/**
 * Immutable catalog over the full set of categories
 */
export class FrozenToolCatalog implements ToolCatalog {
  private readonly byName: CatalogEntries;

  constructor(entries: CatalogEntries) {
    this.byName = Object.freeze({
      code_analysis: freezeCatalog(entries.code_analysis),
      simulation: freezeEngine(entries.simulation),
      documentation: freezeFormat(entries.documentation),
      version_control: freezeOperational(entries.version_control),
      project_management: freezeTracking(entries.project_management),
    });
    Object.freeze(this);
  }

  get size(): number {
    return ORDERED_NAMES.length;
  }

  get<Name extends ToolCategoryName>(name: Name): DescriptorFor<Name>;
  get(name: string): ToolDescriptor | undefined;
  get(name: string): ToolDescriptor | undefined {
    return isToolCategoryName(name) ? this.byName[name] : undefined;
  }

  has(name: string): name is ToolCategoryName {
    return isToolCategoryName(name);
  }

  names(): ToolCategoryName[] {
    return [...ORDERED_NAMES];
  }

  entries(): ToolCategory[] {
    return ORDERED_NAMES.map((name): ToolCategory => ({ name, descriptor: this.byName[name] }));
  }
}
