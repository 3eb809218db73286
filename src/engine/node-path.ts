import { ArgumentError } from "../core/errors.js";
import { NODE_GROUPS, type NodeGroup, type NodePath } from "./types.js";

const GROUP_ALIASES: Record<string, NodeGroup> = {
  component: "components",
  geometry: "geometries",
  geom: "geometries",
  mesh: "meshes",
  study: "studies",
  dataset: "datasets",
  material: "materials",
  selection: "selections",
  function: "functions",
  plot: "plots",
  export: "exports",
};

export function isNodeGroup(value: string): value is NodeGroup {
  return (NODE_GROUPS as readonly string[]).includes(value);
}

export function toNodeGroup(value: string): NodeGroup | undefined {
  const lower = value.trim().toLowerCase();
  if (isNodeGroup(lower)) return lower;
  return GROUP_ALIASES[lower];
}

/**
 * Parse `group/name/child` into a path. The group accepts singular
 * aliases (`study/Study 1`). At least one node name must follow it.
 */
export function parseNodePath(raw: string): NodePath {
  const segments = raw.split("/").map((s) => s.trim());
  const [head, ...names] = segments;
  const group = head ? toNodeGroup(head) : undefined;

  if (!group) {
    throw new ArgumentError(
      `Invalid node path "${raw}": must start with one of ${NODE_GROUPS.join(", ")}`,
    );
  }
  if (names.length === 0 || names.some((n) => n === "")) {
    throw new ArgumentError(
      `Invalid node path "${raw}": expected "${group}/<name>[/<child>...]"`,
    );
  }

  return [group, ...names];
}

export function formatNodePath(path: NodePath): string {
  return path.join("/");
}

export function childPath(parent: NodePath, name: string): NodePath {
  return [...parent, name];
}
