// ============================================
// Context Snapshotter
// ============================================
//
// Renders the model's current structure as the text block injected into
// the system turn. Each category is fetched on its own; a failure shows
// up as "(error fetching <category>)" and the rest still renders. Fetches
// run one after another since the engine session is a single resource.
// ============================================

import { childPath } from "../engine/node-path.js";
import { formatPropertyValue } from "../tools/arguments.js";
import type { EngineSession, EntityCategory, NodeGroup, NodeInfo, NodePath, PropertyValue } from "../engine/types.js";
import { settle } from "../types.js";

export const NO_SESSION_CONTEXT = "No model session is active.";

const OVERVIEW_CATEGORIES: readonly EntityCategory[] = [
  "modules",
  "components",
  "geometries",
  "physics",
  "multiphysics",
  "materials",
  "meshes",
  "studies",
  "solutions",
  "datasets",
  "plots",
  "exports",
  "selections",
  "functions",
];

/** The two capabilities the tree walk needs from a node. */
export interface TreeNode {
  readonly label: string;
  children(): Promise<TreeNode[]>;
  properties(): Promise<Record<string, PropertyValue>>;
}

export function engineTreeNode(session: EngineSession, path: NodePath, info: NodeInfo): TreeNode {
  return {
    label: `[${info.name}] (${info.type})`,
    async children() {
      const infos = await session.children(path);
      return infos.map((child) => engineTreeNode(session, childPath(path, child.name), child));
    },
    properties: () => session.properties(path),
  };
}

export interface SnapshotOptions {
  /** Deepest level rendered below a top-level node (default 4). */
  maxDepth?: number;
  /** Longer property values are shortened (default 120). */
  maxValueChars?: number;
}

export class ContextSnapshotter {
  private readonly maxDepth: number;
  private readonly maxValueChars: number;

  constructor(options: SnapshotOptions = {}) {
    this.maxDepth = options.maxDepth ?? 4;
    this.maxValueChars = options.maxValueChars ?? 120;
  }

  async snapshot(session: EngineSession | null): Promise<string> {
    if (!session) return NO_SESSION_CONTEXT;

    const lines: string[] = ["=== Model Overview ==="];

    const name = await settle(session.name());
    lines.push(`Model: ${name.ok ? name.value : "(error fetching model name)"}`);

    for (const category of OVERVIEW_CATEGORIES) {
      const names = await settle(session.list(category));
      const label = category.charAt(0).toUpperCase() + category.slice(1);
      const value = !names.ok
        ? `(error fetching ${category})`
        : names.value.length === 0
          ? "(none)"
          : names.value.join(", ");
      lines.push(`${label}: ${value}`);
    }

    lines.push("", "=== Parameters ===");
    const params = await settle(session.parameters());
    if (!params.ok) {
      lines.push("(error fetching parameters)");
    } else if (Object.keys(params.value).length === 0) {
      lines.push("(none)");
    } else {
      for (const [key, value] of Object.entries(params.value)) {
        lines.push(`${key} = ${value}`);
      }
    }

    lines.push("", "=== Physics Settings ===");
    lines.push(...(await this.renderGroup(session, "physics")));

    lines.push("", "=== Materials ===");
    lines.push(...(await this.renderGroup(session, "materials")));

    lines.push("", "=== Diagnostics ===");
    const problems = await settle(session.problems());
    if (!problems.ok) {
      lines.push("(error fetching diagnostics)");
    } else if (problems.value.length === 0) {
      lines.push("(no problems reported)");
    } else {
      lines.push(...problems.value.map((p) => `- ${p}`));
    }

    return lines.join("\n");
  }

  private async renderGroup(session: EngineSession, group: NodeGroup): Promise<string[]> {
    const roots = await settle(session.children([group]));
    if (!roots.ok) return [`(error fetching ${group})`];
    if (roots.value.length === 0) return ["(none)"];
    return this.renderTree(roots.value.map((info) => engineTreeNode(session, [group, info.name], info)));
  }

  /**
   * Depth-first walk with an explicit stack. Each level indents two
   * spaces. A node whose properties cannot be read is left out together
   * with its subtree.
   */
  async renderTree(roots: readonly TreeNode[]): Promise<string[]> {
    const lines: string[] = [];
    const stack: Array<{ node: TreeNode; depth: number }> = [...roots]
      .reverse()
      .map((node) => ({ node, depth: 0 }));

    while (stack.length > 0) {
      const next = stack.pop();
      if (!next) break;
      const { node, depth } = next;
      const indent = "  ".repeat(depth);

      const props = await settle(node.properties());
      if (!props.ok) continue;

      lines.push(`${indent}${node.label}`);
      for (const [key, value] of Object.entries(props.value)) {
        lines.push(`${indent}  ${key} = ${this.shorten(formatPropertyValue(value))}`);
      }

      if (depth >= this.maxDepth) continue;

      const children = await settle(node.children());
      if (!children.ok) {
        lines.push(`${indent}  (error fetching children)`);
        continue;
      }
      for (let i = children.value.length - 1; i >= 0; i--) {
        stack.push({ node: children.value[i], depth: depth + 1 });
      }
    }

    return lines;
  }

  private shorten(value: string): string {
    if (value.length <= this.maxValueChars) return value;
    return `${value.slice(0, this.maxValueChars)}...`;
  }
}
