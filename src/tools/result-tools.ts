// ============================================
// Tools: evaluation, plots, image export
// ============================================

import { z } from "zod";
import { EngineOperationError } from "../core/errors.js";
import type { EvaluationValue } from "../engine/types.js";
import { defineTool } from "./define-tool.js";
import { alreadyExists, chooseParent, nextFreeName, withNote } from "./naming.js";
import type { Tool } from "./types.js";

function formatValue(value: EvaluationValue): string {
  return Array.isArray(value) ? `[${value.join(", ")}]` : String(value);
}

export function createResultTools(): Tool[] {
  const evaluateExpression = defineTool({
    name: "evaluate_expression",
    description: "Evaluate an expression on the solution, e.g. 'spf.U' or 'T'. Needs a solved study.",
    args: z.object({
      expression: z.string().min(1).describe("Expression to evaluate"),
      unit: z.string().optional().describe("Unit to evaluate in, e.g. 'm/s' or 'degC'"),
      dataset: z.string().min(1).optional().describe("Dataset (default: the latest solution)"),
      inner: z.number().int().min(1).optional().describe("Inner solution index, e.g. a time step"),
      outer: z.number().int().min(1).optional().describe("Outer solution index, e.g. a parametric sweep step"),
    }),
    async handler(session, args) {
      const solutions = await session.list("solutions");
      if (solutions.length === 0) {
        throw new EngineOperationError("No solutions available to evaluate. Run a study first.");
      }
      const result = await session.evaluate(args);
      const unit = result.unit ?? args.unit;
      const where = args.dataset ? ` on "${args.dataset}"` : "";
      return `Result of '${args.expression}'${where}: ${formatValue(result.value)}${unit ? ` [${unit}]` : ""}`;
    },
  });

  const createPlot = defineTool({
    name: "create_plot",
    description: "Add a plot group showing an expression on a dataset.",
    args: z.object({
      name: z.string().min(1).optional().describe('Plot group name (default "Plot N")'),
      dataset: z.string().min(1).optional().describe("Dataset to plot (default: the first dataset)"),
      type: z
        .enum(["PlotGroup1D", "PlotGroup2D", "PlotGroup3D"])
        .optional()
        .describe("Plot group type (default PlotGroup3D)"),
      expression: z.string().min(1).optional().describe("Expression to plot, e.g. 'spf.U'"),
    }),
    async handler(session, args) {
      const dataset = await chooseParent(session, "datasets", args.dataset);
      const existing = await session.list("plots");
      const plotName = args.name ?? nextFreeName(existing, "Plot");
      if (existing.includes(plotName)) {
        throw alreadyExists("plot group", plotName);
      }
      const type = args.type ?? "PlotGroup3D";
      await session.createNode(["plots"], {
        type,
        name: plotName,
        properties: args.expression
          ? { dataset: dataset.name, expression: args.expression }
          : { dataset: dataset.name },
      });
      const shows = args.expression ? ` showing '${args.expression}'` : "";
      return withNote(`Created ${type} "${plotName}" on dataset "${dataset.name}"${shows}.`, dataset.note);
    },
  });

  const exportImage = defineTool({
    name: "export_image",
    description: "Export a plot group as an image file.",
    args: z.object({
      plot: z.string().min(1).describe("Plot group name"),
      path: z.string().min(1).describe("Destination file, e.g. 'velocity.png'"),
    }),
    async handler(session, { plot, path }) {
      if (!(await session.exists(["plots", plot]))) {
        throw new EngineOperationError(`Plot group "${plot}" does not exist`);
      }
      await session.exportImage(plot, path);
      return `Exported plot "${plot}" to "${path}".`;
    },
  });

  return [evaluateExpression, createPlot, exportImage];
}
