// ============================================
// Tools: components and geometry
// ============================================

import { z } from "zod";
import { EngineOperationError } from "../core/errors.js";
import type { EngineSession, PropertyValue } from "../engine/types.js";
import { formatPropertyValue, parsePropertyValue, propertyInput } from "./arguments.js";
import { defineTool } from "./define-tool.js";
import { alreadyExists, chooseParent, nextFreeName, withNote } from "./naming.js";
import type { Tool } from "./types.js";

/** Normalize a property map from the model into engine values. */
export function normalizeProperties(
  input: Record<string, unknown> | undefined,
): Record<string, PropertyValue> {
  const out: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(input ?? {})) {
    out[key] = parsePropertyValue(value);
  }
  return out;
}

export function describeProperties(properties: Record<string, PropertyValue>): string {
  const entries = Object.entries(properties);
  if (entries.length === 0) return "";
  return ` with ${entries.map(([k, v]) => `${k}=${formatPropertyValue(v)}`).join(", ")}`;
}

export async function ensureBuildTarget(
  session: EngineSession,
  group: "geometries" | "meshes",
  name: string,
): Promise<void> {
  if (!(await session.exists([group, name]))) {
    const label = group === "geometries" ? "Geometry" : "Mesh";
    throw new EngineOperationError(`${label} "${name}" does not exist`);
  }
}

export function createGeometryTools(): Tool[] {
  const createComponent = defineTool({
    name: "create_component",
    description: "Add a model component. Components hold geometry, physics, materials and meshes.",
    args: z.object({
      name: z.string().min(1).optional().describe('Component name (default "Component N")'),
    }),
    async handler(session, { name }) {
      const existing = await session.list("components");
      const componentName = name ?? nextFreeName(existing, "Component");
      if (existing.includes(componentName)) {
        throw alreadyExists("component", componentName);
      }
      const node = await session.createNode(["components"], {
        type: "Component",
        name: componentName,
      });
      return `Created component "${componentName}" (tag ${node.tag}).`;
    },
  });

  const createGeometry = defineTool({
    name: "create_geometry",
    description: "Add a geometry sequence to a component.",
    args: z.object({
      component: z.string().min(1).optional().describe("Component to attach to (default: the first component)"),
      name: z.string().min(1).optional().describe('Geometry name (default "Geometry N")'),
      dimension: z.number().int().min(1).max(3).optional().describe("Space dimension 1, 2 or 3 (default 3)"),
    }),
    async handler(session, { component, name, dimension }) {
      const parent = await chooseParent(session, "components", component);
      const existing = await session.list("geometries");
      const geometryName = name ?? nextFreeName(existing, "Geometry");
      if (existing.includes(geometryName)) {
        throw alreadyExists("geometry", geometryName);
      }
      const dim = dimension ?? 3;
      await session.createNode(["geometries"], {
        type: "Geometry",
        name: geometryName,
        properties: { component: parent.name, dimension: String(dim) },
      });
      return withNote(
        `Created ${dim}D geometry "${geometryName}" in component "${parent.name}".`,
        parent.note,
      );
    },
  });

  const addGeometryFeature = defineTool({
    name: "add_geometry_feature",
    description:
      "Add a geometry primitive or operation (Block, Sphere, Cylinder, Rectangle, Circle, Union, Difference, ...) to a geometry sequence.",
    args: z.object({
      type: z.string().min(1).describe("Feature type, e.g. 'Block'"),
      geometry: z.string().min(1).optional().describe("Geometry sequence (default: the first geometry)"),
      name: z.string().min(1).optional().describe('Feature name (default "<type> N")'),
      properties: z
        .record(propertyInput)
        .optional()
        .describe("Feature properties, e.g. {\"size\": [1, 2, 3], \"pos\": \"0 0 0\"}"),
    }),
    async handler(session, { type, geometry, name, properties }) {
      const parent = await chooseParent(session, "geometries", geometry);
      const siblings = (await session.children(["geometries", parent.name])).map((c) => c.name);
      const featureName = name ?? nextFreeName(siblings, type);
      if (siblings.includes(featureName)) {
        throw alreadyExists("feature", featureName, `geometry "${parent.name}"`);
      }
      const props = normalizeProperties(properties);
      await session.createNode(["geometries", parent.name], {
        type,
        name: featureName,
        properties: props,
      });
      return withNote(
        `Added ${type} "${featureName}" to geometry "${parent.name}"${describeProperties(props)}.`,
        parent.note,
      );
    },
  });

  const buildGeometry = defineTool({
    name: "build_geometry",
    description: "Build geometry. Run this after changing geometric parameters or features.",
    args: z.object({
      geometry: z.string().min(1).optional().describe("Geometry to build (default: all)"),
    }),
    async handler(session, { geometry }) {
      if (geometry) {
        await ensureBuildTarget(session, "geometries", geometry);
        await session.build(geometry);
        return `Geometry "${geometry}" built successfully.`;
      }
      await session.build();
      const all = await session.list("geometries");
      return `All geometries built successfully (${all.join(", ")}).`;
    },
  });

  return [createComponent, createGeometry, addGeometryFeature, buildGeometry];
}
