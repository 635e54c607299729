export { initializeRegistry } from "./builtin";
export { describeTool, descriptorValues } from "./describe";
export { isToolCategoryName } from "./registry";
export type {
  CatalogDescriptor,
  DescribedTool,
  DescriptorFor,
  DescriptorKind,
  EngineDescriptor,
  FormatDescriptor,
  OperationalDescriptor,
  ToolCatalog,
  ToolCategory,
  ToolCategoryName,
  ToolDescriptor,
  TrackingDescriptor,
} from "./types";
