// ============================================
// Error taxonomy
// ============================================

export class ModelPilotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ModelPilotError";
  }
}

export class DuplicateToolError extends ModelPilotError {
  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`, "DUPLICATE_TOOL");
    this.name = "DuplicateToolError";
  }
}

export class UnknownToolError extends ModelPilotError {
  constructor(
    public readonly toolName: string,
    available: string[],
  ) {
    super(
      `Unknown tool "${toolName}". Available tools: ${available.join(", ") || "(none)"}`,
      "TOOL_NOT_FOUND",
    );
    this.name = "UnknownToolError";
  }
}

/** Malformed or ambiguous tool arguments. */
export class ArgumentError extends ModelPilotError {
  constructor(message: string) {
    super(message, "ARGUMENT_ERROR");
    this.name = "ArgumentError";
  }
}

/** The engine rejected an operation (duplicate name, missing entity, bad reference). */
export class EngineOperationError extends ModelPilotError {
  constructor(message: string, cause?: unknown) {
    super(message, "ENGINE_OPERATION_ERROR", cause);
    this.name = "EngineOperationError";
  }
}

/** A freshly created engine session failed its liveness check. */
export class EngineUnstableError extends ModelPilotError {
  constructor(message: string, cause?: unknown) {
    super(message, "ENGINE_UNSTABLE", cause);
    this.name = "EngineUnstableError";
  }
}

export class NoSessionError extends ModelPilotError {
  constructor() {
    super("No model session is active. Create or load a model first.", "NO_SESSION");
    this.name = "NoSessionError";
  }
}

/** The language-model call failed; fatal for the current turn. */
export class ModelCallError extends ModelPilotError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "MODEL_CALL_ERROR", cause);
    this.name = "ModelCallError";
  }
}
