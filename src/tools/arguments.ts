// ============================================
// Argument normalization for selection and property tools
// ============================================
//
// The model sends the same logical value in several shapes. These
// helpers turn each accepted shape into one engine type and reject
// everything else with ArgumentError before the engine sees it.
// ============================================

import { z } from "zod";
import { ArgumentError } from "../core/errors.js";
import type { PropertyValue, Selection } from "../engine/types.js";

/** Accepted wire shapes for a selection. */
export const selectionInput = z
  .union([z.array(z.number()), z.string(), z.number()])
  .describe('Entity numbers as a list ([1, 2, 3]), a space-separated string ("1 2 3"), or "all"');

const scalar = z.union([z.string(), z.number(), z.boolean()]);

/** Accepted wire shapes for a property value. */
export const propertyInput = z
  .union([scalar, z.array(z.union([z.string(), z.number()]))])
  .describe('A string, number, boolean, or a list such as ["0", "0", "1"] or [0, 0, 1]');

function entityNumber(value: number, raw: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ArgumentError(
      `Invalid selection ${raw}: entity numbers must be positive integers`,
    );
  }
  return value;
}

/** Normalize a selection to `{kind: "all"}` or an ordered index list. */
export function parseSelection(input: unknown): Selection {
  if (Array.isArray(input)) {
    if (input.length === 0) {
      throw new ArgumentError("Invalid selection: the list is empty");
    }
    const raw = JSON.stringify(input);
    const indices = input.map((v) => {
      if (typeof v !== "number") {
        throw new ArgumentError(`Invalid selection ${raw}: entries must be numbers`);
      }
      return entityNumber(v, raw);
    });
    return { kind: "indices", indices };
  }

  if (typeof input === "number") {
    return { kind: "indices", indices: [entityNumber(input, String(input))] };
  }

  if (typeof input === "string") {
    const trimmed = input.trim();
    if (trimmed === "") {
      throw new ArgumentError('Invalid selection: empty string (use "all" or entity numbers)');
    }
    if (trimmed.toLowerCase() === "all") {
      return { kind: "all" };
    }
    const tokens = trimmed.split(/[\s,]+/).filter(Boolean);
    const indices = tokens.map((token) => {
      if (!/^\d+$/.test(token)) {
        throw new ArgumentError(
          `Invalid selection "${input}": "${token}" is not an entity number`,
        );
      }
      return entityNumber(Number(token), `"${input}"`);
    });
    return { kind: "indices", indices };
  }

  throw new ArgumentError(
    `Invalid selection of type ${input === null ? "null" : typeof input}`,
  );
}

export function formatSelection(selection: Selection): string {
  return selection.kind === "all" ? "all" : `[${selection.indices.join(", ")}]`;
}

/** Normalize a property value: numbers stringify, lists become string lists. */
export function parsePropertyValue(input: unknown): PropertyValue {
  if (typeof input === "string" || typeof input === "boolean") {
    return input;
  }
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new ArgumentError(`Invalid property value ${input}: must be finite`);
    }
    return String(input);
  }
  if (Array.isArray(input)) {
    return input.map((item) => {
      if (typeof item === "string") return item;
      if (typeof item === "number" && Number.isFinite(item)) return String(item);
      throw new ArgumentError(
        `Invalid property value ${JSON.stringify(input)}: list entries must be strings or numbers`,
      );
    });
  }
  throw new ArgumentError(
    `Invalid property value of type ${input === null ? "null" : typeof input}`,
  );
}

export function formatPropertyValue(value: PropertyValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "boolean") return String(value);
  return `[${value.join(", ")}]`;
}
