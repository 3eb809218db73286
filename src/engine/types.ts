// ============================================
// Engine Boundary — Type Definitions
// ============================================
//
// The modeling engine is an opaque, stateful service. The agent only
// addresses its entities through name paths and never owns them.
// ============================================

/** Structural categories the engine can list. */
export const ENTITY_CATEGORIES = [
  "modules",
  "components",
  "geometries",
  "physics",
  "multiphysics",
  "meshes",
  "studies",
  "solutions",
  "datasets",
  "materials",
  "selections",
  "functions",
  "plots",
  "exports",
] as const;

export type EntityCategory = (typeof ENTITY_CATEGORIES)[number];

/** Categories that own a node group addressable by path. */
export const NODE_GROUPS = [
  "components",
  "geometries",
  "physics",
  "multiphysics",
  "meshes",
  "studies",
  "datasets",
  "materials",
  "selections",
  "functions",
  "plots",
  "exports",
] as const satisfies readonly EntityCategory[];

export type NodeGroup = (typeof NODE_GROUPS)[number];

/**
 * Address of a node: a group followed by node names, outermost first.
 * `["physics", "Laminar Flow", "Wall 1"]` is a feature within a physics
 * interface.
 */
export type NodePath = readonly [NodeGroup, ...string[]];

export type PropertyValue = string | boolean | readonly string[];

/** Either an ordered list of entity numbers or every entity. */
export type Selection =
  | { readonly kind: "indices"; readonly indices: readonly number[] }
  | { readonly kind: "all" };

export interface NodeInfo {
  name: string;
  type: string;
  tag: string;
}

export interface CreateNodeRequest {
  /** Engine feature type, e.g. `Block`, `LaminarFlow`, `Stationary`. */
  type: string;
  name: string;
  /** Preferred tag; the engine picks one when omitted. */
  tag?: string;
  /** Initial properties, including creation arguments such as `geometry`. */
  properties?: Record<string, PropertyValue>;
}

export interface EvaluateRequest {
  expression: string;
  unit?: string;
  dataset?: string;
  /** Inner solution index (time step) */
  inner?: number;
  /** Outer solution index (parametric sweep step) */
  outer?: number;
}

export type EvaluationValue = number | string | readonly (number | string)[];

export interface EvaluationResult {
  value: EvaluationValue;
  unit?: string;
}

/** One live model inside the engine. All calls mutate or read the same state. */
export interface EngineSession {
  readonly id: string;

  /** Cheap round trip proving the session responds. */
  ping(): Promise<void>;
  name(): Promise<string>;

  list(category: EntityCategory): Promise<string[]>;
  parameters(): Promise<Record<string, string>>;
  setParameter(name: string, value: string, description?: string): Promise<void>;

  exists(path: NodePath): Promise<boolean>;
  children(path: NodePath): Promise<NodeInfo[]>;
  properties(path: NodePath): Promise<Record<string, PropertyValue>>;
  setProperty(path: NodePath, name: string, value: PropertyValue): Promise<void>;
  createNode(parent: NodePath, request: CreateNodeRequest): Promise<NodeInfo>;
  removeNode(path: NodePath): Promise<void>;
  select(path: NodePath, selection: Selection): Promise<void>;

  /** Build one geometry, or all when omitted. */
  build(geometry?: string): Promise<void>;
  /** Build one mesh, or all when omitted. */
  mesh(mesh?: string): Promise<void>;
  solve(study: string): Promise<void>;
  evaluate(request: EvaluateRequest): Promise<EvaluationResult>;

  save(path: string): Promise<void>;
  exportImage(plot: string, path: string): Promise<void>;

  /** Warnings and errors the engine reports for the model tree. */
  problems(): Promise<string[]>;
}

/** Process-level handle that opens sessions. */
export interface EngineClient {
  createModel(name: string): Promise<EngineSession>;
  loadModel(path: string): Promise<EngineSession>;
}
