import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      llmProvider: "openai",
      llmApiKey: "",
      llmModel: "gpt-4o",
      engineUrl: "",
      modelPath: "",
      modelName: "Untitled",
      httpHost: "127.0.0.1",
      httpPort: 5000,
      httpMaxBodyBytes: 1048576,
      maxToolResultChars: 20000,
    });
  });

  it("reads and trims overrides", () => {
    const config = loadConfig({
      LLM_PROVIDER: " anthropic ",
      LLM_API_KEY: "test-secret",
      ENGINE_URL: "http://localhost:8765",
      MODEL_PATH: "pipe.mph",
      HTTP_PORT: "8080",
      HTTP_MAX_BODY_BYTES: "4096",
    });
    expect(config.llmProvider).toBe("anthropic");
    expect(config.llmApiKey).toBe("test-secret");
    expect(config.engineUrl).toBe("http://localhost:8765");
    expect(config.modelPath).toBe("pipe.mph");
    expect(config.httpPort).toBe(8080);
    expect(config.httpMaxBodyBytes).toBe(4096);
  });

  it("falls back on blank or invalid numbers", () => {
    const config = loadConfig({ HTTP_PORT: "abc", MAX_TOOL_RESULT_CHARS: "  " });
    expect(config.httpPort).toBe(5000);
    expect(config.maxToolResultChars).toBe(20000);
  });
});
