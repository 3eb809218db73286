// ============================================
// Physics Catalogue — display names → engine interface ids
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

// physics-catalog.ts sits in src/tools (or dist/tools) → ../../data
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_CATALOG_PATH = path.resolve(__dirname, "../../data/physics-interfaces.json");

const entrySchema = z.object({
  name: z.string().min(1),
  interface: z.string().min(1),
  tag: z.string().min(1),
  area: z.string(),
});

export type PhysicsEntry = z.infer<typeof entrySchema>;

export interface ResolvedPhysics {
  /** Engine interface id passed to node creation. */
  interfaceId: string;
  /** Default tag, or undefined when the name was not in the catalogue. */
  defaultTag?: string;
  /** Display name to use when the caller gave none. */
  displayName: string;
  known: boolean;
}

export class PhysicsCatalog {
  constructor(private readonly entries: readonly PhysicsEntry[]) {}

  static fromFile(filePath: string = DEFAULT_CATALOG_PATH): PhysicsCatalog {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    return new PhysicsCatalog(z.array(entrySchema).parse(raw));
  }

  /**
   * Match by display name, then case-insensitively, then by interface id.
   * Unknown names pass through as raw interface ids.
   */
  resolve(name: string): ResolvedPhysics {
    const trimmed = name.trim();
    const lower = trimmed.toLowerCase();

    const entry =
      this.entries.find((e) => e.name === trimmed) ??
      this.entries.find((e) => e.name.toLowerCase() === lower) ??
      this.entries.find((e) => e.interface === trimmed);

    if (!entry) {
      return { interfaceId: trimmed, displayName: trimmed, known: false };
    }
    return {
      interfaceId: entry.interface,
      defaultTag: entry.tag,
      displayName: entry.name,
      known: true,
    };
  }

  names(): string[] {
    return this.entries.map((e) => e.name);
  }
}

let defaultCatalog: PhysicsCatalog | null = null;

export function getPhysicsCatalog(): PhysicsCatalog {
  defaultCatalog ??= PhysicsCatalog.fromFile();
  return defaultCatalog;
}
