// ============================================
// In-Memory Engine — offline stand-in for the engine bridge
// ============================================
//
// Keeps a model tree in process so the agent can run without a bridge
// service. Operations enforce the same preconditions a real engine does
// (unique names per parent, existing references, solved studies before
// evaluation) and reject with EngineOperationError.
// ============================================

import { EngineOperationError } from "../core/errors.js";
import { formatNodePath } from "./node-path.js";
import {
  NODE_GROUPS,
  type CreateNodeRequest,
  type EngineClient,
  type EngineSession,
  type EntityCategory,
  type EvaluateRequest,
  type EvaluationResult,
  type NodeGroup,
  type NodeInfo,
  type NodePath,
  type PropertyValue,
  type Selection,
} from "./types.js";

interface MemoryNode {
  name: string;
  type: string;
  tag: string;
  properties: Map<string, PropertyValue>;
  children: MemoryNode[];
}

interface ModelState {
  name: string;
  parameters: Map<string, { value: string; description: string }>;
  groups: Map<NodeGroup, MemoryNode>;
  /** study name → solution name */
  solutions: Map<string, string>;
  /** Paths of geometries and meshes whose last build is current. */
  built: Set<string>;
}

const TAG_PREFIX: Record<NodeGroup, string> = {
  components: "comp",
  geometries: "geom",
  physics: "phys",
  multiphysics: "mphys",
  meshes: "mesh",
  studies: "std",
  datasets: "dset",
  materials: "mat",
  selections: "sel",
  functions: "func",
  plots: "pg",
  exports: "img",
};

function emptyState(name: string): ModelState {
  const groups = new Map<NodeGroup, MemoryNode>();
  for (const group of NODE_GROUPS) {
    groups.set(group, {
      name: group,
      type: "Group",
      tag: group,
      properties: new Map(),
      children: [],
    });
  }
  return {
    name,
    parameters: new Map(),
    groups,
    solutions: new Map(),
    built: new Set(),
  };
}

function info(node: MemoryNode): NodeInfo {
  return { name: node.name, type: node.type, tag: node.tag };
}

/** Leading numeric part of an expression such as `2.5[mm]`. */
function numericValue(expression: string): number | undefined {
  const match = expression.trim().match(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?/);
  if (!match) return undefined;
  const rest = expression.trim().slice(match[0].length).trim();
  if (rest !== "" && !/^\[[^\]]*\]$/.test(rest)) return undefined;
  return Number(match[0]);
}

function checkSolutionIndex(label: string, index: number | undefined): void {
  if (index !== undefined && index !== 1) {
    throw new EngineOperationError(
      `${label} solution index ${index} is out of range; the solution has 1`,
    );
  }
}

export class InMemoryModel implements EngineSession {
  constructor(
    readonly id: string,
    private state: ModelState,
    private readonly modules: string[],
    private readonly onSave: (path: string, state: ModelState) => void,
  ) {}

  async ping(): Promise<void> {}

  async name(): Promise<string> {
    return this.state.name;
  }

  async list(category: EntityCategory): Promise<string[]> {
    switch (category) {
      case "modules":
        return [...this.modules];
      case "solutions":
        return [...new Set(this.state.solutions.values())];
      default:
        return this.group(category).children.map((c) => c.name);
    }
  }

  async parameters(): Promise<Record<string, string>> {
    const out: Record<string, string> = {};
    for (const [name, p] of this.state.parameters) out[name] = p.value;
    return out;
  }

  async setParameter(name: string, value: string, description?: string): Promise<void> {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new EngineOperationError(`Invalid parameter name "${name}"`);
    }
    const previous = this.state.parameters.get(name);
    this.state.parameters.set(name, {
      value,
      description: description ?? previous?.description ?? "",
    });
    this.state.built.clear();
  }

  async exists(path: NodePath): Promise<boolean> {
    return this.find(path) !== undefined;
  }

  async children(path: NodePath): Promise<NodeInfo[]> {
    return this.resolve(path).children.map(info);
  }

  async properties(path: NodePath): Promise<Record<string, PropertyValue>> {
    return Object.fromEntries(this.resolveNode(path).properties);
  }

  async setProperty(path: NodePath, name: string, value: PropertyValue): Promise<void> {
    this.resolveNode(path).properties.set(name, value);
    this.invalidate(path);
  }

  async createNode(parent: NodePath, request: CreateNodeRequest): Promise<NodeInfo> {
    const parentNode = this.resolve(parent);
    const location = formatNodePath(parent);

    if (parentNode.children.some((c) => c.name === request.name)) {
      throw new EngineOperationError(`"${request.name}" already exists in ${location}`);
    }
    if (request.tag && parentNode.children.some((c) => c.tag === request.tag)) {
      throw new EngineOperationError(`Tag "${request.tag}" is already used in ${location}`);
    }

    const properties = new Map(Object.entries(request.properties ?? {}));
    this.checkReferences(properties);

    const node: MemoryNode = {
      name: request.name,
      type: request.type,
      tag: request.tag ?? this.nextTag(parent, parentNode, request.type),
      properties,
      children: [],
    };
    parentNode.children.push(node);
    this.invalidate(parent);
    return info(node);
  }

  async removeNode(path: NodePath): Promise<void> {
    if (path.length < 2) {
      throw new EngineOperationError(`Cannot remove the ${path[0]} group`);
    }
    const [group, ...names] = path;
    const name = names[names.length - 1];
    const parentNode = this.resolve([group, ...names.slice(0, -1)]);
    const index = parentNode.children.findIndex((c) => c.name === name);
    if (index === -1) {
      throw new EngineOperationError(`No node at "${formatNodePath(path)}"`);
    }
    parentNode.children.splice(index, 1);
    this.invalidate(path);
  }

  async select(path: NodePath, selection: Selection): Promise<void> {
    const node = this.resolveNode(path);
    node.properties.set(
      "selection",
      selection.kind === "all" ? "all" : selection.indices.map(String),
    );
    this.invalidate(path);
  }

  async build(geometry?: string): Promise<void> {
    for (const node of this.targets("geometries", geometry)) {
      this.state.built.add(`geometries/${node.name}`);
    }
  }

  async mesh(mesh?: string): Promise<void> {
    for (const node of this.targets("meshes", mesh)) {
      const geometry = node.properties.get("geometry");
      if (typeof geometry === "string") {
        this.state.built.add(`geometries/${geometry}`);
      }
      this.state.built.add(`meshes/${node.name}`);
    }
  }

  async solve(study: string): Promise<void> {
    const node = this.resolveNode(["studies", study]);
    if (node.children.length === 0) {
      throw new EngineOperationError(`Study "${study}" has no study steps`);
    }

    let solution = this.state.solutions.get(study);
    if (!solution) {
      solution = `Solution ${this.state.solutions.size + 1}`;
      this.state.solutions.set(study, solution);
      const datasets = this.group("datasets");
      const dataset = `${study}//${solution}`;
      if (!datasets.children.some((c) => c.name === dataset)) {
        datasets.children.push({
          name: dataset,
          type: "Solution",
          tag: `dset${datasets.children.length + 1}`,
          properties: new Map([["solution", solution]]),
          children: [],
        });
      }
    }
  }

  async evaluate(request: EvaluateRequest): Promise<EvaluationResult> {
    if (this.state.solutions.size === 0) {
      throw new EngineOperationError("No solution available; solve a study first");
    }
    if (request.dataset && !(await this.exists(["datasets", request.dataset]))) {
      throw new EngineOperationError(`Dataset "${request.dataset}" does not exist`);
    }
    // Every stored solution has exactly one inner and one outer solution.
    checkSolutionIndex("Inner", request.inner);
    checkSolutionIndex("Outer", request.outer);

    const parameter = this.state.parameters.get(request.expression.trim());
    const value = numericValue(parameter ? parameter.value : request.expression);
    if (value === undefined) {
      throw new EngineOperationError(`Cannot evaluate expression "${request.expression}"`);
    }
    return { value, unit: request.unit };
  }

  async save(path: string): Promise<void> {
    if (!path.trim()) {
      throw new EngineOperationError("Save path must not be empty");
    }
    this.onSave(path, structuredClone(this.state));
  }

  async exportImage(plot: string, path: string): Promise<void> {
    this.resolveNode(["plots", plot]);
    if (!path.trim()) {
      throw new EngineOperationError("Export path must not be empty");
    }
  }

  async problems(): Promise<string[]> {
    const out: string[] = [];
    for (const group of ["geometries", "meshes"] as const) {
      for (const node of this.group(group).children) {
        if (!this.state.built.has(`${group}/${node.name}`)) {
          out.push(`${group === "geometries" ? "Geometry" : "Mesh"} "${node.name}" is not built`);
        }
      }
    }
    return out;
  }

  // ---- Internal ----

  private group(group: NodeGroup): MemoryNode {
    const node = this.state.groups.get(group);
    if (!node) {
      throw new EngineOperationError(`Unknown category "${group}"`);
    }
    return node;
  }

  private find(path: NodePath): MemoryNode | undefined {
    let node: MemoryNode | undefined = this.group(path[0]);
    for (const name of path.slice(1)) {
      node = node.children.find((c) => c.name === name);
      if (!node) return undefined;
    }
    return node;
  }

  private resolve(path: NodePath): MemoryNode {
    const node = this.find(path);
    if (!node) {
      throw new EngineOperationError(`No node at "${formatNodePath(path)}"`);
    }
    return node;
  }

  /** Resolve a path that must name a node, not a group. */
  private resolveNode(path: NodePath): MemoryNode {
    if (path.length < 2) {
      throw new EngineOperationError(`"${path[0]}" is a category, not a node`);
    }
    return this.resolve(path);
  }

  private targets(group: "geometries" | "meshes", name?: string): MemoryNode[] {
    if (name) return [this.resolveNode([group, name])];
    const all = this.group(group).children;
    if (all.length === 0) {
      throw new EngineOperationError(`Model has no ${group}`);
    }
    return all;
  }

  private checkReferences(properties: Map<string, PropertyValue>): void {
    const refs: Array<[string, NodeGroup]> = [
      ["component", "components"],
      ["geometry", "geometries"],
      ["dataset", "datasets"],
    ];
    for (const [key, group] of refs) {
      const value = properties.get(key);
      if (typeof value === "string" && !this.find([group, value])) {
        throw new EngineOperationError(`Referenced ${key} "${value}" does not exist`);
      }
    }
  }

  private nextTag(parent: NodePath, parentNode: MemoryNode, type: string): string {
    const prefix =
      parent.length === 1
        ? TAG_PREFIX[parent[0]]
        : type.replace(/[^A-Za-z]/g, "").slice(0, 3).toLowerCase() || "node";
    const used = new Set(parentNode.children.map((c) => c.tag));
    let n = 1;
    while (used.has(`${prefix}${n}`)) n++;
    return `${prefix}${n}`;
  }

  /** Edits under a geometry or mesh make its last build stale. */
  private invalidate(path: NodePath): void {
    const [group, name] = path;
    if ((group === "geometries" || group === "meshes") && name) {
      this.state.built.delete(`${group}/${name}`);
    }
  }
}

export interface InMemoryEngineOptions {
  /** Module names reported by `list("modules")`. */
  modules?: string[];
}

export class InMemoryEngine implements EngineClient {
  private readonly saved = new Map<string, ModelState>();
  private readonly modules: string[];
  private counter = 0;

  constructor(options: InMemoryEngineOptions = {}) {
    this.modules = options.modules ?? [];
  }

  async createModel(name: string): Promise<InMemoryModel> {
    return this.open(emptyState(name));
  }

  async loadModel(path: string): Promise<InMemoryModel> {
    const state = this.saved.get(path);
    if (!state) {
      throw new EngineOperationError(`Model file "${path}" not found`);
    }
    return this.open(structuredClone(state));
  }

  private open(state: ModelState): InMemoryModel {
    this.counter += 1;
    return new InMemoryModel(`mem-${this.counter}`, state, this.modules, (path, s) => {
      this.saved.set(path, s);
    });
  }
}
