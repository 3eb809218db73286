// ============================================
// Tools: physics interfaces, physics features, materials
// ============================================

import { z } from "zod";
import { EngineOperationError } from "../core/errors.js";
import { formatSelection, parseSelection, propertyInput, selectionInput } from "./arguments.js";
import { defineTool } from "./define-tool.js";
import { describeProperties, normalizeProperties } from "./geometry-tools.js";
import { alreadyExists, chooseParent, createConfigured, nextFreeName, withNote } from "./naming.js";
import type { PhysicsCatalog } from "./physics-catalog.js";
import type { Tool } from "./types.js";

export function createPhysicsTools(catalog: PhysicsCatalog): Tool[] {
  const addPhysics = defineTool({
    name: "add_physics",
    description:
      "Attach a physics interface to a geometry. Accepts display names such as 'Laminar Flow' or " +
      "'Heat Transfer in Solids', or engine interface ids such as 'LaminarFlow'.",
    args: z.object({
      interface: z.string().min(1).describe("Physics interface name or id"),
      geometry: z
        .string()
        .min(1)
        .optional()
        .describe("Geometry to attach to. If omitted the first geometry is used and the result says so."),
      name: z.string().min(1).optional().describe("Interface name (default: the display name)"),
      tag: z.string().min(1).optional().describe("Interface tag (default: the catalogue tag, e.g. 'spf')"),
    }),
    async handler(session, args) {
      const physics = catalog.resolve(args.interface);
      const geometry = await chooseParent(session, "geometries", args.geometry);

      const existing = await session.children(["physics"]);
      const physicsName = args.name ?? physics.displayName;
      if (existing.some((p) => p.name === physicsName)) {
        throw alreadyExists("physics interface", physicsName, "the model (pass a different name to add another)");
      }

      const wantedTag = args.tag ?? physics.defaultTag;
      if (args.tag && existing.some((p) => p.tag === args.tag)) {
        throw new EngineOperationError(`Physics tag "${args.tag}" is already in use`);
      }
      const tag = wantedTag && !existing.some((p) => p.tag === wantedTag) ? wantedTag : undefined;

      const node = await session.createNode(["physics"], {
        type: physics.interfaceId,
        name: physicsName,
        tag,
        properties: { geometry: geometry.name },
      });

      let message =
        `Added physics interface "${physicsName}" (${physics.interfaceId}, tag ${node.tag}) ` +
        `on geometry "${geometry.name}".`;
      if (!physics.known) {
        message += ` "${args.interface}" is not in the physics catalogue and was passed through as an interface id.`;
      }
      return withNote(message, geometry.note);
    },
  });

  const addPhysicsFeature = defineTool({
    name: "add_physics_feature",
    description:
      "Add a feature (boundary condition, domain setting, source) to a physics interface, e.g. 'Inlet', 'Outlet', " +
      "'Wall', 'HeatFluxBoundary', 'TemperatureBoundary', 'FixedConstraint'.",
    args: z.object({
      physics: z.string().min(1).describe("Physics interface name"),
      type: z.string().min(1).describe("Feature type"),
      name: z.string().min(1).optional().describe('Feature name (default "<type> N")'),
      selection: selectionInput.optional(),
      properties: z.record(propertyInput).optional().describe("Feature properties"),
    }),
    async handler(session, args) {
      if (!(await session.exists(["physics", args.physics]))) {
        throw new EngineOperationError(`Physics interface "${args.physics}" does not exist`);
      }
      // Validate everything before the first mutation.
      const selection = args.selection === undefined ? undefined : parseSelection(args.selection);
      const props = normalizeProperties(args.properties);

      const siblings = (await session.children(["physics", args.physics])).map((c) => c.name);
      const featureName = args.name ?? nextFreeName(siblings, args.type);
      if (siblings.includes(featureName)) {
        throw alreadyExists("feature", featureName, `physics "${args.physics}"`);
      }

      await createConfigured(
        session,
        ["physics", args.physics],
        { type: args.type, name: featureName, properties: props },
        async (feature) => {
          if (selection) await session.select(feature, selection);
        },
      );

      const selected = selection ? ` on selection ${formatSelection(selection)}` : "";
      return `Added ${args.type} "${featureName}" to physics "${args.physics}"${selected}${describeProperties(props)}.`;
    },
  });

  const addMaterial = defineTool({
    name: "add_material",
    description: "Add a material with property values, optionally limited to a selection of domains.",
    args: z.object({
      name: z.string().min(1).describe("Material name, e.g. 'Water' or 'Copper'"),
      component: z.string().min(1).optional().describe("Component (default: the first component)"),
      properties: z
        .record(propertyInput)
        .optional()
        .describe("Material properties, e.g. {\"density\": \"1000[kg/m^3]\"}"),
      selection: selectionInput.optional(),
    }),
    async handler(session, args) {
      const component = await chooseParent(session, "components", args.component);
      const selection = args.selection === undefined ? undefined : parseSelection(args.selection);
      const props = normalizeProperties(args.properties);

      if (await session.exists(["materials", args.name])) {
        throw alreadyExists("material", args.name);
      }

      await createConfigured(
        session,
        ["materials"],
        { type: "Common", name: args.name, properties: { component: component.name, ...props } },
        async (material) => {
          if (selection) await session.select(material, selection);
        },
      );

      const selected = selection ? ` on selection ${formatSelection(selection)}` : "";
      return withNote(
        `Added material "${args.name}" to component "${component.name}"${selected}${describeProperties(props)}.`,
        component.note,
      );
    },
  });

  return [addPhysics, addPhysicsFeature, addMaterial];
}
