import type { EngineClient } from "../engine/types.js";
import { createGeometryTools } from "./geometry-tools.js";
import { createModelTools } from "./model-tools.js";
import { createNodeTools } from "./node-tools.js";
import { getPhysicsCatalog, type PhysicsCatalog } from "./physics-catalog.js";
import { createPhysicsTools } from "./physics-tools.js";
import { createResultTools } from "./result-tools.js";
import { createStudyTools } from "./study-tools.js";
import { ToolRegistry } from "./tool-registry.js";

export interface ToolRegistryOptions {
  engine: EngineClient;
  catalog?: PhysicsCatalog;
  maxResultChars?: number;
}

/** Build the full, frozen tool catalogue. */
export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const registry = new ToolRegistry({ maxResultChars: options.maxResultChars });
  const tools = [
    ...createModelTools(options.engine),
    ...createGeometryTools(),
    ...createPhysicsTools(options.catalog ?? getPhysicsCatalog()),
    ...createStudyTools(),
    ...createResultTools(),
    ...createNodeTools(),
  ];
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry.freeze();
}

export { ToolRegistry } from "./tool-registry.js";
