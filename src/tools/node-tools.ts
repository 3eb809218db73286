// ============================================
// Tools: path-addressed node edits
// ============================================
//
// Paths name a node from its category down, separated by "/":
//   physics/Laminar Flow/Inlet 1
//   geometries/Geometry 1/Block 1
// ============================================

import { z } from "zod";
import { EngineOperationError } from "../core/errors.js";
import { formatNodePath, parseNodePath } from "../engine/node-path.js";
import type { EngineSession, NodePath } from "../engine/types.js";
import {
  formatPropertyValue,
  formatSelection,
  parsePropertyValue,
  parseSelection,
  propertyInput,
  selectionInput,
} from "./arguments.js";
import { defineTool } from "./define-tool.js";
import type { Tool } from "./types.js";

const pathArg = z
  .string()
  .min(1)
  .describe("Node path from its category, e.g. 'physics/Laminar Flow/Inlet 1'");

async function existingNode(session: EngineSession, raw: string): Promise<NodePath> {
  const path = parseNodePath(raw);
  if (!(await session.exists(path))) {
    throw new EngineOperationError(`No node at "${formatNodePath(path)}"`);
  }
  return path;
}

export function createNodeTools(): Tool[] {
  const setSelection = defineTool({
    name: "set_selection",
    description: "Set which geometric entities (domains, boundaries, edges, points) a node applies to.",
    args: z.object({
      path: pathArg,
      selection: selectionInput,
    }),
    async handler(session, args) {
      const selection = parseSelection(args.selection);
      const path = await existingNode(session, args.path);
      await session.select(path, selection);
      return `Selection of "${formatNodePath(path)}" set to ${formatSelection(selection)}.`;
    },
  });

  const setProperty = defineTool({
    name: "set_property",
    description: "Set one property of a node, e.g. the inlet velocity 'U0in' of 'physics/Laminar Flow/Inlet 1'.",
    args: z.object({
      path: pathArg,
      property: z.string().min(1).describe("Property name"),
      value: propertyInput,
    }),
    async handler(session, args) {
      const value = parsePropertyValue(args.value);
      const path = await existingNode(session, args.path);
      await session.setProperty(path, args.property, value);
      return `Property "${args.property}" of "${formatNodePath(path)}" set to ${formatPropertyValue(value)}.`;
    },
  });

  const getProperties = defineTool({
    name: "get_properties",
    description: "Read all properties of a node and list its child nodes.",
    args: z.object({ path: pathArg }),
    async handler(session, args) {
      const path = await existingNode(session, args.path);
      const lines = [`Properties of "${formatNodePath(path)}":`];

      const properties = Object.entries(await session.properties(path));
      if (properties.length === 0) {
        lines.push("  (no properties)");
      }
      for (const [name, value] of properties) {
        lines.push(`  ${name} = ${formatPropertyValue(value)}`);
      }

      const children = await session.children(path);
      if (children.length > 0) {
        lines.push(`Children: ${children.map((c) => `${c.name} (${c.type})`).join(", ")}`);
      }
      return lines.join("\n");
    },
  });

  const removeNode = defineTool({
    name: "remove_node",
    description: "Remove a node and everything below it.",
    args: z.object({ path: pathArg }),
    async handler(session, args) {
      const path = await existingNode(session, args.path);
      await session.removeNode(path);
      return `Removed "${formatNodePath(path)}".`;
    },
  });

  return [setSelection, setProperty, getProperties, removeNode];
}
