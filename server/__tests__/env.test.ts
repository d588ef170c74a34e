import { describe, it, expect } from "vitest";
import { loadConfig } from "../config/env";
import { MODEL_ASSIGNMENTS } from "../config/models";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      nodeEnv: "development",
      port: 5000,
      llm: {
        enabled: true,
        model: MODEL_ASSIGNMENTS.INTENT_CLASSIFICATION,
        apiKeys: { openai: undefined, gemini: undefined, anthropic: undefined },
      },
      databaseUrl: undefined,
      logging: { level: "info", dir: undefined },
      handler: {
        workerPoolSize: 8,
        collaboratorTimeoutMs: 15000,
        contextWindowSize: 10,
        contextTtlMs: 30 * 60 * 1000,
      },
    });
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({ PORT: "8080", WORKER_POOL_SIZE: "2", CONTEXT_TTL_MINUTES: "1.5", LLM_ENABLED: "false" });
    expect(config.port).toBe(8080);
    expect(config.handler.workerPoolSize).toBe(2);
    expect(config.handler.contextTtlMs).toBe(90000);
    expect(config.llm.enabled).toBe(false);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ WORKER_POOL_SIZE: "0" })).toThrow(/\[Config\] Invalid environment/);
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
  });
});
