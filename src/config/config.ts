// ============================================
// ModelPilot Configuration
// ============================================

export interface ModelPilotConfig {
  /** LLM provider: anthropic | openai | google */
  llmProvider: string;

  /** API key for the LLM provider */
  llmApiKey: string;

  /** Model identifier (e.g. gpt-4o) */
  llmModel: string;

  /** Engine bridge base URL; empty means the in-memory engine */
  engineUrl: string;

  /** Model file opened at startup (optional) */
  modelPath: string;

  /** Name of the fresh model created when no modelPath is given */
  modelName: string;

  /** HTTP shell bind address */
  httpHost: string;

  /** HTTP shell port (default: 5000) */
  httpPort: number;

  /** Largest accepted chat request body in bytes (default: 1 MiB) */
  httpMaxBodyBytes: number;

  /** Tool results longer than this are cut (default: 20000) */
  maxToolResultChars: number;
}

const DEFAULT_LLM_PROVIDER = "openai";
const DEFAULT_LLM_MODEL = "gpt-4o";
const DEFAULT_MODEL_NAME = "Untitled";
const DEFAULT_HTTP_HOST = "127.0.0.1";
const DEFAULT_HTTP_PORT = 5000;
const DEFAULT_HTTP_MAX_BODY_BYTES = 1024 * 1024;
const DEFAULT_MAX_TOOL_RESULT_CHARS = 20_000;

/**
 * Load configuration from environment variables.
 * Call dotenv.config() before invoking this function.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ModelPilotConfig {
  return {
    llmProvider: env(source, "LLM_PROVIDER", DEFAULT_LLM_PROVIDER),
    llmApiKey: env(source, "LLM_API_KEY", ""),
    llmModel: env(source, "LLM_MODEL", DEFAULT_LLM_MODEL),
    engineUrl: env(source, "ENGINE_URL", ""),
    modelPath: env(source, "MODEL_PATH", ""),
    modelName: env(source, "MODEL_NAME", DEFAULT_MODEL_NAME),
    httpHost: env(source, "HTTP_HOST", DEFAULT_HTTP_HOST),
    httpPort: envInt(source, "HTTP_PORT", DEFAULT_HTTP_PORT),
    httpMaxBodyBytes: envInt(source, "HTTP_MAX_BODY_BYTES", DEFAULT_HTTP_MAX_BODY_BYTES),
    maxToolResultChars: envInt(source, "MAX_TOOL_RESULT_CHARS", DEFAULT_MAX_TOOL_RESULT_CHARS),
  };
}

/** Read a string env var with a fallback default. */
function env(source: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return source[key]?.trim() || fallback;
}

/** Read an integer env var with a fallback default. */
function envInt(source: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = source[key]?.trim();
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
