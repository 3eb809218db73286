import { beforeEach, describe, expect, it, vi } from "vitest";
import { ContextSnapshotter } from "../src/core/context-snapshot.js";
import { InMemoryEngine, type InMemoryModel } from "../src/engine/memory-engine.js";
import { createToolRegistry, type ToolRegistry } from "../src/tools/index.js";
import type { ToolResult } from "../src/tools/types.js";

let engine: InMemoryEngine;
let model: InMemoryModel;
let registry: ToolRegistry;

beforeEach(async () => {
  engine = new InMemoryEngine();
  model = await engine.createModel("Test");
  registry = createToolRegistry({ engine });
});

function run(name: string, input: Record<string, unknown> = {}): Promise<ToolResult> {
  return registry.execute({ id: `${name}-call`, name, input }, { session: model });
}

async function content(name: string, input: Record<string, unknown> = {}): Promise<string> {
  return (await run(name, input)).content;
}

async function withGeometry(): Promise<void> {
  await run("create_component");
  await run("create_geometry");
}

describe("model tools", () => {
  it("creates and changes parameters", async () => {
    expect(await content("set_parameter", { name: "U0", value: "1[m/s]" })).toBe(
      'Parameter "U0" created with value "1[m/s]".',
    );
    expect(await content("set_parameter", { name: "U0", value: "2[m/s]" })).toBe(
      'Parameter "U0" changed from "1[m/s]" to "2[m/s]".',
    );
  });

  it("saves and loads, handing back the new session", async () => {
    expect(await content("save_model", { path: "pipe.mph" })).toBe('Model saved to "pipe.mph".');

    const loaded = await run("load_model", { path: "pipe.mph" });
    expect(loaded.content).toBe('Loaded model "Test" from "pipe.mph" (session mem-2).');
    expect(loaded.session?.id).toBe("mem-2");
  });

  it("creates a model even without a session", async () => {
    const result = await registry.execute(
      { id: "c", name: "create_model", input: {} },
      { session: null },
    );
    expect(result.content).toBe('Created new model "Untitled" (session mem-2).');
    expect(await result.session?.name()).toBe("Untitled");
  });
});

describe("geometry tools", () => {
  it("creates components with default names", async () => {
    expect(await content("create_component")).toBe('Created component "Component 1" (tag comp1).');
    expect(await content("create_component")).toBe('Created component "Component 2" (tag comp2).');
  });

  it("needs a component before a geometry", async () => {
    const result = await run("create_geometry");
    expect(result).toEqual({
      tool_use_id: "create_geometry-call",
      content: "Error: The model has no component; create one first",
      is_error: true,
    });
  });

  it("says which parent it defaulted to", async () => {
    await run("create_component");
    expect(await content("create_geometry")).toBe(
      'Created 3D geometry "Geometry 1" in component "Component 1". (using the only component "Component 1")',
    );
    await run("create_geometry", { component: "Component 1", dimension: 2 });
    expect(await content("add_geometry_feature", { type: "Block" })).toBe(
      'Added Block "Block 1" to geometry "Geometry 1". ' +
        '(no geometry given; 2 exist (Geometry 1, Geometry 2), defaulted to the first, "Geometry 1")',
    );
  });

  it("adds features with normalized properties", async () => {
    await withGeometry();
    expect(
      await content("add_geometry_feature", {
        type: "Block",
        geometry: "Geometry 1",
        properties: { size: [1, 2, 3], pos: "0 0 0" },
      }),
    ).toBe('Added Block "Block 1" to geometry "Geometry 1" with size=[1, 2, 3], pos=0 0 0.');
    expect(await model.properties(["geometries", "Geometry 1", "Block 1"])).toEqual({
      size: ["1", "2", "3"],
      pos: "0 0 0",
    });
  });

  it("builds one or all geometries", async () => {
    expect(await content("build_geometry")).toBe("Error: Model has no geometries");
    await withGeometry();
    expect(await content("build_geometry")).toBe("All geometries built successfully (Geometry 1).");
    expect(await content("build_geometry", { geometry: "Geometry 1" })).toBe(
      'Geometry "Geometry 1" built successfully.',
    );
    expect(await content("build_geometry", { geometry: "Nope" })).toBe('Error: Geometry "Nope" does not exist');
  });
});

describe("physics tools", () => {
  beforeEach(withGeometry);

  it("adds a catalogue interface with its default tag", async () => {
    expect(await content("add_physics", { interface: "laminar flow" })).toBe(
      'Added physics interface "Laminar Flow" (LaminarFlow, tag spf) on geometry "Geometry 1". ' +
        '(using the only geometry "Geometry 1")',
    );
  });

  it("passes unknown interfaces through", async () => {
    expect(await content("add_physics", { interface: "MyPhysics", geometry: "Geometry 1" })).toBe(
      'Added physics interface "MyPhysics" (MyPhysics, tag phys1) on geometry "Geometry 1". ' +
        '"MyPhysics" is not in the physics catalogue and was passed through as an interface id.',
    );
  });

  it("rejects a second interface under the same name", async () => {
    await run("add_physics", { interface: "Laminar Flow" });
    expect(await content("add_physics", { interface: "Laminar Flow" })).toBe(
      'Error: Physics interface "Laminar Flow" already exists in the model ' +
        "(pass a different name to add another); nothing was changed.",
    );
    expect(await content("add_physics", { interface: "Laminar Flow", name: "Laminar Flow 2" })).toBe(
      'Added physics interface "Laminar Flow 2" (LaminarFlow, tag phys1) on geometry "Geometry 1". ' +
        '(using the only geometry "Geometry 1")',
    );
  });

  it("rejects an explicit tag already in use", async () => {
    await run("add_physics", { interface: "Laminar Flow" });
    expect(await content("add_physics", { interface: "Heat Transfer in Fluids", tag: "spf" })).toBe(
      'Error: Physics tag "spf" is already in use',
    );
  });

  describe("add_physics_feature selections", () => {
    beforeEach(async () => {
      await run("add_physics", { interface: "Laminar Flow" });
    });

    it.each([
      ["1 2 3", "[1, 2, 3]"],
      [[1, 2, 3], "[1, 2, 3]"],
      ["all", "all"],
    ])("accepts %j", async (selection, shown) => {
      expect(await content("add_physics_feature", { physics: "Laminar Flow", type: "Inlet", selection })).toBe(
        `Added Inlet "Inlet 1" to physics "Laminar Flow" on selection ${shown}.`,
      );
    });

    it("stores the normalized selection and properties", async () => {
      await run("add_physics_feature", {
        physics: "Laminar Flow",
        type: "Inlet",
        selection: "1 2 3",
        properties: { U0in: "0.5[m/s]" },
      });
      expect(await model.properties(["physics", "Laminar Flow", "Inlet 1"])).toEqual({
        U0in: "0.5[m/s]",
        selection: ["1", "2", "3"],
      });
    });

    it.each([
      ["abc", 'Error: Invalid selection "abc": "abc" is not an entity number'],
      ["", 'Error: Invalid selection: empty string (use "all" or entity numbers)'],
    ])("rejects %j without touching the model", async (selection, message) => {
      const result = await run("add_physics_feature", { physics: "Laminar Flow", type: "Wall", selection });
      expect(result.content).toBe(message);
      expect(result.is_error).toBe(true);
      expect(await model.children(["physics", "Laminar Flow"])).toEqual([]);
    });

    it("removes the feature again when its selection fails", async () => {
      const input = { physics: "Laminar Flow", type: "Inlet", name: "In", selection: [99] };
      vi.spyOn(model, "select").mockRejectedValueOnce(new Error("boundary 99 out of range"));

      expect(await run("add_physics_feature", input)).toEqual({
        tool_use_id: "add_physics_feature-call",
        content: "Error: boundary 99 out of range",
        is_error: true,
      });
      expect(await model.children(["physics", "Laminar Flow"])).toEqual([]);

      expect(await content("add_physics_feature", input)).toBe(
        'Added Inlet "In" to physics "Laminar Flow" on selection [99].',
      );
    });

    it("needs an existing interface", async () => {
      expect(await content("add_physics_feature", { physics: "Nope", type: "Wall" })).toBe(
        'Error: Physics interface "Nope" does not exist',
      );
    });
  });

  it("adds materials to the default component", async () => {
    expect(await content("add_material", { name: "Water", properties: { density: "1000[kg/m^3]" } })).toBe(
      'Added material "Water" to component "Component 1" with density=1000[kg/m^3]. ' +
        '(using the only component "Component 1")',
    );
    expect(await content("add_material", { name: "Water" })).toBe(
      'Error: Material "Water" already exists; nothing was changed.',
    );
  });

  it("removes the material again when its selection fails", async () => {
    vi.spyOn(model, "select").mockRejectedValueOnce(new Error("domain 7 out of range"));
    expect(await content("add_material", { name: "Water", selection: "7" })).toBe("Error: domain 7 out of range");
    expect(await model.list("materials")).toEqual([]);

    expect(await content("add_material", { name: "Water", selection: "7" })).toBe(
      'Added material "Water" to component "Component 1" on selection [7]. ' +
        '(using the only component "Component 1")',
    );
  });

  it("keeps the original error when the cleanup also fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(model, "select").mockRejectedValueOnce(new Error("domain 7 out of range"));
    vi.spyOn(model, "removeNode").mockRejectedValueOnce(new Error("bridge closed"));

    expect(await content("add_material", { name: "Water", selection: "7" })).toBe("Error: domain 7 out of range");
    expect(warn).toHaveBeenCalledWith(
      '[Tool] Could not remove "materials/Water" after a failed create: bridge closed',
    );
  });
});

describe("mesh and study tools", () => {
  it("creates and builds a mesh", async () => {
    await withGeometry();
    expect(await content("create_mesh")).toBe(
      'Created mesh "Mesh 1" for geometry "Geometry 1". (using the only geometry "Geometry 1")',
    );
    expect(await content("build_mesh")).toBe("All meshes built successfully (Mesh 1).");
    expect(await model.problems()).toEqual([]);
  });

  it("creates a study with ordered steps", async () => {
    expect(await content("create_study", { name: "std1", steps: ["Stationary", "Stationary"] })).toBe(
      'Created study "std1" with step(s): Stationary, Stationary.',
    );
    expect((await model.children(["studies", "std1"])).map((c) => c.name)).toEqual([
      "Stationary 1",
      "Stationary 2",
    ]);
  });

  it("removes the study again when a step cannot be created", async () => {
    const createNode = model.createNode.bind(model);
    const spy = vi.spyOn(model, "createNode").mockImplementation(async (parent, request) => {
      if (request.type === "Bogus") throw new Error("unknown study step Bogus");
      return createNode(parent, request);
    });

    expect(await content("create_study", { name: "s", steps: ["Stationary", "Bogus"] })).toBe(
      "Error: unknown study step Bogus",
    );
    expect(await model.list("studies")).toEqual([]);

    spy.mockRestore();
    expect(await content("create_study", { name: "s", steps: ["Stationary"] })).toBe(
      'Created study "s" with step(s): Stationary.',
    );
    expect((await model.children(["studies", "s"])).map((c) => c.name)).toEqual(["Stationary 1"]);
  });

  it("solves an existing study", async () => {
    expect(await content("solve_study", { study: "std1" })).toBe('Error: Study "std1" does not exist');
    await run("create_study", { name: "std1" });
    expect(await content("solve_study", { study: "std1" })).toMatch(/^Study "std1" solved in \d+\.\ds\.$/);
    expect(await model.list("solutions")).toEqual(["Solution 1"]);
  });

  it("reports an engine failure during solve as an error result", async () => {
    await run("create_study", { name: "std1" });
    vi.spyOn(model, "solve").mockRejectedValue(new Error("license checkout failed"));
    expect(await run("solve_study", { study: "std1" })).toEqual({
      tool_use_id: "solve_study-call",
      content: "Error: license checkout failed",
      is_error: true,
    });
  });
});

describe("creating an entity twice", () => {
  it.each([
    ["create_study", { name: "std1" }, 'Error: Study "std1" already exists; nothing was changed.'],
    ["create_component", { name: "Component 1" }, 'Error: Component "Component 1" already exists; nothing was changed.'],
    ["create_mesh", { name: "Mesh 1" }, 'Error: Mesh "Mesh 1" already exists; nothing was changed.'],
  ])("%s leaves the model unchanged", async (tool, input, message) => {
    await withGeometry();
    await run("create_mesh");
    await run("create_study", { name: "std1" });

    const snapshotter = new ContextSnapshotter();
    const before = await snapshotter.snapshot(model);
    const result = await run(tool, input);
    const after = await snapshotter.snapshot(model);

    expect(result.content).toBe(message);
    expect(result.is_error).toBe(true);
    expect(after).toBe(before);
  });
});

describe("result tools", () => {
  async function solved(): Promise<void> {
    await run("set_parameter", { name: "U0", value: "2[m/s]" });
    await run("create_study", { name: "std1" });
    await run("solve_study", { study: "std1" });
  }

  it("needs a solution to evaluate", async () => {
    expect(await content("evaluate_expression", { expression: "U0" })).toBe(
      "Error: No solutions available to evaluate. Run a study first.",
    );
  });

  it("evaluates expressions", async () => {
    await solved();
    expect(await content("evaluate_expression", { expression: "U0", unit: "m/s" })).toBe("Result of 'U0': 2 [m/s]");
    expect(await content("evaluate_expression", { expression: "4", dataset: "std1//Solution 1" })).toBe(
      "Result of '4' on \"std1//Solution 1\": 4",
    );
  });

  it("creates a plot and exports it", async () => {
    await solved();
    expect(await content("create_plot", { expression: "spf.U" })).toBe(
      "Created PlotGroup3D \"Plot 1\" on dataset \"std1//Solution 1\" showing 'spf.U'. " +
        '(using the only dataset "std1//Solution 1")',
    );
    expect(await content("export_image", { plot: "Plot 1", path: "u.png" })).toBe(
      'Exported plot "Plot 1" to "u.png".',
    );
    expect(await content("export_image", { plot: "Nope", path: "u.png" })).toBe(
      'Error: Plot group "Nope" does not exist',
    );
  });
});

describe("node tools", () => {
  beforeEach(async () => {
    await withGeometry();
    await run("add_physics", { interface: "Laminar Flow" });
    await run("add_physics_feature", { physics: "Laminar Flow", type: "Inlet" });
  });

  it("sets properties and selections by path", async () => {
    expect(
      await content("set_property", { path: "physics/Laminar Flow/Inlet 1", property: "U0in", value: 2 }),
    ).toBe('Property "U0in" of "physics/Laminar Flow/Inlet 1" set to 2.');
    expect(await content("set_selection", { path: "physics/Laminar Flow/Inlet 1", selection: "3 4" })).toBe(
      'Selection of "physics/Laminar Flow/Inlet 1" set to [3, 4].',
    );
  });

  it("reads properties and children", async () => {
    expect(await content("get_properties", { path: "physics/Laminar Flow" })).toBe(
      ['Properties of "physics/Laminar Flow":', "  geometry = Geometry 1", "Children: Inlet 1 (Inlet)"].join("\n"),
    );
    expect(await content("get_properties", { path: "physics/Laminar Flow/Inlet 1" })).toBe(
      ['Properties of "physics/Laminar Flow/Inlet 1":', "  (no properties)"].join("\n"),
    );
  });

  it("removes nodes", async () => {
    expect(await content("remove_node", { path: "physics/Laminar Flow/Inlet 1" })).toBe(
      'Removed "physics/Laminar Flow/Inlet 1".',
    );
    expect(await content("remove_node", { path: "physics/Laminar Flow/Inlet 1" })).toBe(
      'Error: No node at "physics/Laminar Flow/Inlet 1"',
    );
  });

  it("rejects malformed paths", async () => {
    expect(await content("get_properties", { path: "widgets/A" })).toMatch(/^Error: Invalid node path "widgets\/A"/);
  });
});
