import { FrozenToolCatalog } from "./registry";
import type { ToolCatalog } from "./types";

/**
 * Build the engineering tool catalog.
 *
 * Pure: every call returns a new, frozen catalog with the same contents.
 */
export function initializeRegistry(): ToolCatalog {
  return new FrozenToolCatalog({
    code_analysis: {
      kind: "catalog",
      languages: new Set(["python", "java", "cpp", "matlab"]),
      capabilities: ["linting", "formatting", "static_analysis"],
    },
    simulation: {
      kind: "engine",
      types: new Set(["finite_element", "numerical", "control_systems"]),
      engines: new Set(["numpy", "scipy", "control"]),
    },
    documentation: {
      kind: "format",
      formats: new Set(["markdown", "pdf", "html"]),
      templates: ["technical_spec", "design_doc", "api_doc"],
    },
    version_control: {
      kind: "operational",
      systems: new Set(["git"]),
      operations: ["commit", "branch", "merge", "review"],
    },
    project_management: {
      kind: "tracking",
      integrations: new Set(["jira", "trello", "azure_devops"]),
      features: ["task_tracking", "timeline_management"],
    },
  });
}
