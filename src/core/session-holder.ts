// ============================================
// Engine Session Holder
// ============================================
//
// The one reference to "the current model". Replacement is
// transactional: a candidate is adopted only after it answers a ping,
// otherwise the previous session stays in place.
// ============================================

import type { EngineSession } from "../engine/types.js";
import { errorMessage } from "../types.js";
import { EngineUnstableError } from "./errors.js";

export class EngineSessionHolder {
  private session: EngineSession | null;

  constructor(initial: EngineSession | null = null) {
    this.session = initial;
  }

  current(): EngineSession | null {
    return this.session;
  }

  /**
   * Switch to `candidate` once it proves responsive.
   * Throws EngineUnstableError and keeps the old session otherwise.
   */
  async replace(candidate: EngineSession): Promise<void> {
    try {
      await candidate.ping();
    } catch (err) {
      const kept = this.session ? ` Keeping session ${this.session.id}.` : "";
      throw new EngineUnstableError(
        `New model session ${candidate.id} failed its liveness check: ${errorMessage(err)}.${kept}`,
        err,
      );
    }

    const previous = this.session?.id;
    this.session = candidate;
    console.log(
      `[Engine] Switched to session ${candidate.id}${previous ? ` (was ${previous})` : ""}`,
    );
  }
}
