import { describe, it, expect } from "vitest";
import { initializeRegistry } from "./builtin";
import { describeTool, descriptorValues } from "./describe";
import { FrozenToolCatalog, ReadonlySetView, isToolCategoryName } from "./registry";
import type { CatalogEntries } from "./registry";
import type { ToolCatalog } from "./types";

function entriesOf(catalog: ToolCatalog): CatalogEntries {
  return {
    code_analysis: catalog.get("code_analysis"),
    simulation: catalog.get("simulation"),
    documentation: catalog.get("documentation"),
    version_control: catalog.get("version_control"),
    project_management: catalog.get("project_management"),
  };
}

describe("initializeRegistry", () => {
  it("lists every category once, in declaration order", () => {
    const catalog = initializeRegistry();
    expect(catalog.names()).toEqual([
      "code_analysis",
      "simulation",
      "documentation",
      "version_control",
      "project_management",
    ]);
    expect(catalog.size).toBe(5);
  });

  it("binds each category to its descriptor kind", () => {
    const catalog = initializeRegistry();
    expect(catalog.entries().map((e) => [e.name, e.descriptor.kind])).toEqual([
      ["code_analysis", "catalog"],
      ["simulation", "engine"],
      ["documentation", "format"],
      ["version_control", "operational"],
      ["project_management", "tracking"],
    ]);
  });

  it("exposes typed descriptors for known names", () => {
    const codeAnalysis = initializeRegistry().get("code_analysis");
    expect([...codeAnalysis.languages]).toEqual(["python", "java", "cpp", "matlab"]);
    expect(codeAnalysis.capabilities).toEqual(["linting", "formatting", "static_analysis"]);
  });

  it("returns undefined for unknown names", () => {
    const catalog = initializeRegistry();
    expect(catalog.get("nonexistent_tool")).toBeUndefined();
    expect(catalog.get("Code_Analysis")).toBeUndefined();
    expect(catalog.has("toString")).toBe(false);
  });

  it("freezes descriptors and their ordered fields", () => {
    const docs = initializeRegistry().get("documentation");
    expect(Object.isFrozen(docs)).toBe(true);
    expect(Object.isFrozen(docs.templates)).toBe(true);
  });

  it("rejects writes through set-valued fields", () => {
    const catalog = initializeRegistry();
    const languages = catalog.get("code_analysis").languages;
    expect(languages).toBeInstanceOf(ReadonlySetView);
    expect(languages.has("python")).toBe(true);
    expect(() => (languages instanceof Set ? languages.add("cobol") : undefined)).toThrow(TypeError);
    expect(() => (languages instanceof Set ? languages.delete("python") : undefined)).toThrow(
      TypeError
    );
    expect(() => (languages instanceof Set ? languages.clear() : undefined)).toThrow(TypeError);
    expect([...catalog.get("code_analysis").languages]).toEqual(["python", "java", "cpp", "matlab"]);
  });

  it("copies the entries it is given", () => {
    const systems = new Set(["git"]);
    const catalog = new FrozenToolCatalog({
      ...entriesOf(initializeRegistry()),
      version_control: { kind: "operational", systems, operations: ["commit"] },
    });
    systems.add("svn");
    expect([...catalog.get("version_control").systems]).toEqual(["git"]);
  });

  it("builds a fresh catalog on every call", () => {
    const a = initializeRegistry();
    const b = initializeRegistry();
    expect(a.get("simulation")).not.toBe(b.get("simulation"));
    expect(a.get("simulation")).toEqual(b.get("simulation"));
  });
});

describe("isToolCategoryName", () => {
  it("matches exact names only", () => {
    expect(isToolCategoryName("version_control")).toBe(true);
    expect(isToolCategoryName("version-control")).toBe(false);
    expect(isToolCategoryName("hasOwnProperty")).toBe(false);
  });
});

describe("describeTool", () => {
  it("turns sets into arrays", () => {
    const catalog = initializeRegistry();
    expect(describeTool(catalog.get("simulation"))).toEqual({
      kind: "engine",
      types: ["finite_element", "numerical", "control_systems"],
      engines: ["numpy", "scipy", "control"],
    });
    expect(describeTool(catalog.get("project_management"))).toEqual({
      kind: "tracking",
      integrations: ["jira", "trello", "azure_devops"],
      features: ["task_tracking", "timeline_management"],
    });
  });

  it("collects descriptor values in field order", () => {
    expect(descriptorValues(initializeRegistry().get("version_control"))).toEqual([
      "git",
      "commit",
      "branch",
      "merge",
      "review",
    ]);
  });
});
