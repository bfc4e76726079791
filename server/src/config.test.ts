import path from "path";
import { describe, it, expect } from "vitest";
import {
  applyConfigUpdate,
  assertProviderReady,
  DEFAULT_MODELS,
  loadConfig,
  publicConfig,
} from "./config";
import { ConfigurationError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({}, "/work");

    expect(config.ai.provider).toBe("openai");
    expect(config.ai.openaiApiKey).toBeNull();
    expect(config.ai.openaiModel).toBe(DEFAULT_MODELS.openai);
    expect(config.ai.timeoutMs).toBe(120000);
    expect(config.processing.useVision).toBe(true);
    expect(config.processing.confidenceThreshold).toBe(0.7);
    expect(config.processing.renderDpi).toBe(200);
    expect(config.processing.minPageChars).toBe(50);
    expect(config.processing.maxWorkers).toBe(3);
    expect(config.inputDir).toBe(path.resolve("/work", "Input Data"));
    expect(config.outputDir).toBe(path.resolve("/work", "Output"));
    expect(config.server).toEqual({ host: "0.0.0.0", port: 8000 });
    expect(config.logLevel).toBe("info");
  });

  it("reads provider, keys and processing settings", () => {
    const config = loadConfig({
      PA_AI_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "test-secret",
      PA_USE_VISION: "false",
      PA_CONFIDENCE_THRESHOLD: "0.85",
      PA_RENDER_DPI: "150",
      LOG_LEVEL: "DEBUG",
    }, "/work");

    expect(config.ai.provider).toBe("anthropic");
    expect(config.ai.anthropicApiKey).toBe("test-secret");
    expect(config.processing.useVision).toBe(false);
    expect(config.processing.confidenceThreshold).toBe(0.85);
    expect(config.processing.renderDpi).toBe(150);
    expect(config.logLevel).toBe("debug");
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "", PA_CONFIDENCE_THRESHOLD: "" }, "/work");
    expect(config.ai.openaiApiKey).toBeNull();
    expect(config.processing.confidenceThreshold).toBe(0.7);
  });

  it("rejects an unknown provider", () => {
    expect(() => loadConfig({ PA_AI_PROVIDER: "mistral" })).toThrow(ConfigurationError);
  });

  it("rejects a threshold outside [0, 1]", () => {
    expect(() => loadConfig({ PA_CONFIDENCE_THRESHOLD: "1.5" })).toThrow(/PA_CONFIDENCE_THRESHOLD/);
  });

  it("rejects a non-numeric threshold", () => {
    expect(() => loadConfig({ PA_CONFIDENCE_THRESHOLD: "high" })).toThrow(ConfigurationError);
  });
});

describe("assertProviderReady", () => {
  it("names the missing environment variable", () => {
    const config = loadConfig({ PA_AI_PROVIDER: "anthropic" });
    expect(() => assertProviderReady(config)).toThrow(/ANTHROPIC_API_KEY/);
  });

  it("checks the overriding provider instead of the configured one", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-key" });
    expect(() => assertProviderReady(config)).not.toThrow();
    expect(() => assertProviderReady(config, "anthropic")).toThrow(ConfigurationError);
  });
});

describe("applyConfigUpdate", () => {
  it("returns a new config and leaves the input untouched", () => {
    const config = loadConfig({});
    const updated = applyConfigUpdate(config, { provider: "anthropic", confidenceThreshold: 0.9, useVision: false });

    expect(updated.ai.provider).toBe("anthropic");
    expect(updated.processing.confidenceThreshold).toBe(0.9);
    expect(updated.processing.useVision).toBe(false);
    expect(config.ai.provider).toBe("openai");
    expect(config.processing.confidenceThreshold).toBe(0.7);
  });
});

describe("publicConfig", () => {
  it("reports key presence without the keys", () => {
    const view = publicConfig(loadConfig({ OPENAI_API_KEY: "test-secret" }));

    expect(view.hasOpenaiKey).toBe(true);
    expect(view.hasAnthropicKey).toBe(false);
    expect(JSON.stringify(view)).not.toContain("test-secret");
  });
});
