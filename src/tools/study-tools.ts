// ============================================
// Tools: meshes and studies
// ============================================

import { z } from "zod";
import { EngineOperationError } from "../core/errors.js";
import { defineTool } from "./define-tool.js";
import { ensureBuildTarget } from "./geometry-tools.js";
import { alreadyExists, chooseParent, createConfigured, nextFreeName, withNote } from "./naming.js";
import type { Tool } from "./types.js";

export function createStudyTools(): Tool[] {
  const createMesh = defineTool({
    name: "create_mesh",
    description: "Add a mesh sequence for a geometry.",
    args: z.object({
      name: z.string().min(1).optional().describe('Mesh name (default "Mesh N")'),
      geometry: z.string().min(1).optional().describe("Geometry to mesh (default: the first geometry)"),
    }),
    async handler(session, { name, geometry }) {
      const parent = await chooseParent(session, "geometries", geometry);
      const existing = await session.list("meshes");
      const meshName = name ?? nextFreeName(existing, "Mesh");
      if (existing.includes(meshName)) {
        throw alreadyExists("mesh", meshName);
      }
      await session.createNode(["meshes"], {
        type: "Mesh",
        name: meshName,
        properties: { geometry: parent.name },
      });
      return withNote(`Created mesh "${meshName}" for geometry "${parent.name}".`, parent.note);
    },
  });

  const buildMesh = defineTool({
    name: "build_mesh",
    description: "Build the mesh. Run this after geometry changes or mesh setting changes.",
    args: z.object({
      mesh: z.string().min(1).optional().describe("Mesh to build (default: all)"),
    }),
    async handler(session, { mesh }) {
      if (mesh) {
        await ensureBuildTarget(session, "meshes", mesh);
        await session.mesh(mesh);
        return `Mesh "${mesh}" built successfully.`;
      }
      await session.mesh();
      const all = await session.list("meshes");
      return `All meshes built successfully (${all.join(", ")}).`;
    },
  });

  const createStudy = defineTool({
    name: "create_study",
    description: "Add a study with one or more study steps.",
    args: z.object({
      name: z.string().min(1).describe("Study name, e.g. 'Study 1'"),
      steps: z
        .array(z.string().min(1))
        .min(1)
        .optional()
        .describe("Ordered step types, e.g. ['Stationary'] or ['Stationary', 'Transient'] (default ['Stationary'])"),
    }),
    async handler(session, { name, steps }) {
      if (await session.exists(["studies", name])) {
        throw alreadyExists("study", name);
      }
      const stepTypes = steps ?? ["Stationary"];

      await createConfigured(session, ["studies"], { type: "Study", name }, async (study) => {
        const created: string[] = [];
        for (const type of stepTypes) {
          const stepName = nextFreeName(created, type);
          await session.createNode(study, { type, name: stepName });
          created.push(stepName);
        }
      });
      return `Created study "${name}" with step(s): ${stepTypes.join(", ")}.`;
    },
  });

  const solveStudy = defineTool({
    name: "solve_study",
    description: "Run a study to solve the physics. This can take a long time.",
    args: z.object({
      study: z.string().min(1).describe("The study to run, e.g. 'Study 1'"),
    }),
    async handler(session, { study }) {
      if (!(await session.exists(["studies", study]))) {
        throw new EngineOperationError(`Study "${study}" does not exist`);
      }
      console.log(`[Tool] Solving study "${study}" (this may take time)...`);
      const started = Date.now();
      await session.solve(study);
      const seconds = ((Date.now() - started) / 1000).toFixed(1);
      return `Study "${study}" solved in ${seconds}s.`;
    },
  });

  return [createMesh, buildMesh, createStudy, solveStudy];
}
