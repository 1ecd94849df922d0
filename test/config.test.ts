import { describe, expect, it } from "vitest";
import { DEFAULT_IMAGE_MODEL, DEFAULT_TEXT_MODEL, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 5050,
      openaiApiKey: undefined,
      googleApiKey: undefined,
      textModel: DEFAULT_TEXT_MODEL,
      imageModel: DEFAULT_IMAGE_MODEL,
      generationTimeoutMs: 60_000,
      maxConcurrentGenerations: 4,
      pipelineMode: "live",
      stageBaseUrl: undefined,
      logLevel: "info"
    });
  });

  it("treats blank keys as unset and falls back to GEMINI_API_KEY", () => {
    const config = loadConfig({ OPENAI_API_KEY: "   ", GEMINI_API_KEY: "test-secret" });
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.googleApiKey).toBe("test-secret");
  });

  it("prefers GOOGLE_API_KEY over GEMINI_API_KEY", () => {
    expect(loadConfig({ GOOGLE_API_KEY: "google-test", GEMINI_API_KEY: "gemini-test" }).googleApiKey).toBe("google-test");
  });

  it("clamps numeric settings and ignores garbage", () => {
    const low = loadConfig({ PANELVERSE_GENERATION_TIMEOUT_MS: "5", PANELVERSE_MAX_CONCURRENT_GENERATIONS: "100" });
    expect(low.generationTimeoutMs).toBe(1_000);
    expect(low.maxConcurrentGenerations).toBe(64);

    const garbage = loadConfig({ PANELVERSE_GENERATION_TIMEOUT_MS: "soon", PORT: "" });
    expect(garbage.generationTimeoutMs).toBe(60_000);
    expect(garbage.port).toBe(5050);
  });

  it("normalizes enumerated settings", () => {
    expect(loadConfig({ PANELVERSE_PIPELINE_MODE: " OFFLINE " }).pipelineMode).toBe("offline");
    expect(loadConfig({ PANELVERSE_PIPELINE_MODE: "turbo" }).pipelineMode).toBe("live");
    expect(loadConfig({ LOG_LEVEL: "Debug" }).logLevel).toBe("debug");
    expect(loadConfig({ LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });

  it("strips trailing slashes from the stage base URL", () => {
    expect(loadConfig({ PANELVERSE_STAGE_BASE_URL: "http://stages.test:6000//" }).stageBaseUrl).toBe("http://stages.test:6000");
  });
});
