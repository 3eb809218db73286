import { EngineOperationError } from "../core/errors.js";
import { childPath, formatNodePath } from "../engine/node-path.js";
import type { CreateNodeRequest, EngineSession, NodeGroup, NodeInfo, NodePath } from "../engine/types.js";
import { errorMessage } from "../types.js";

const SINGULAR: Record<NodeGroup, string> = {
  components: "component",
  geometries: "geometry",
  physics: "physics interface",
  multiphysics: "multiphysics coupling",
  meshes: "mesh",
  studies: "study",
  datasets: "dataset",
  materials: "material",
  selections: "selection",
  functions: "function",
  plots: "plot group",
  exports: "export",
};

export function singular(group: NodeGroup): string {
  return SINGULAR[group];
}

/** First `"<base> N"` not in `existing`, counting from 1. */
export function nextFreeName(existing: readonly string[], base: string): string {
  const taken = new Set(existing);
  let n = 1;
  while (taken.has(`${base} ${n}`)) n++;
  return `${base} ${n}`;
}

export interface ParentChoice {
  name: string;
  /** Set when the parent was defaulted rather than given. */
  note?: string;
}

/**
 * Use the requested parent if it exists. With none requested, default to
 * the only candidate, or to the first of several and say so in `note`.
 */
export async function chooseParent(
  session: EngineSession,
  group: NodeGroup,
  requested: string | undefined,
): Promise<ParentChoice> {
  const label = singular(group);

  if (requested) {
    if (!(await session.exists([group, requested]))) {
      throw new EngineOperationError(`${capitalize(label)} "${requested}" does not exist`);
    }
    return { name: requested };
  }

  const candidates = await session.list(group);
  const [first] = candidates;
  if (first === undefined) {
    throw new EngineOperationError(`The model has no ${label}; create one first`);
  }
  if (candidates.length === 1) {
    return { name: first, note: `using the only ${label} "${first}"` };
  }
  return {
    name: first,
    note:
      `no ${label} given; ${candidates.length} exist (${candidates.join(", ")}), ` +
      `defaulted to the first, "${first}"`,
  };
}

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function withNote(message: string, note: string | undefined): string {
  return note ? `${message} (${note})` : message;
}

/** Rejection for a create call that targets a name already in use. */
export function alreadyExists(label: string, name: string, where?: string): EngineOperationError {
  const location = where ? ` in ${where}` : "";
  return new EngineOperationError(
    `${capitalize(label)} "${name}" already exists${location}; nothing was changed.`,
  );
}

/**
 * Create a node and finish setting it up. If `configure` fails the node is
 * removed again and the original error is rethrown.
 */
export async function createConfigured(
  session: EngineSession,
  parent: NodePath,
  request: CreateNodeRequest,
  configure: (path: NodePath) => Promise<void>,
): Promise<NodeInfo> {
  const node = await session.createNode(parent, request);
  const path = childPath(parent, request.name);
  try {
    await configure(path);
  } catch (err) {
    try {
      await session.removeNode(path);
    } catch (cleanupErr) {
      console.warn(`[Tool] Could not remove "${formatNodePath(path)}" after a failed create: ${errorMessage(cleanupErr)}`);
    }
    throw err;
  }
  return node;
}
