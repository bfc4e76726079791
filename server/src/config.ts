/**
 * Application configuration.
 *
 * `loadConfig` turns an environment record into a validated `AppConfig`.
 * Entry points call it once with `process.env`; everything downstream takes
 * the resulting object as an argument.
 */

import path from "path";
import { z } from "zod";
import { AIProviderZ, type AIProvider, type ConfigUpdate } from "@shared/schema";
import { ConfigurationError } from "./errors";
import { logLevels, type LogLevel } from "./logger";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface AIConfig {
  provider: AIProvider;
  openaiApiKey: string | null;
  anthropicApiKey: string | null;
  openaiModel: string;
  anthropicModel: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface ProcessingConfig {
  useVision: boolean;
  confidenceThreshold: number;
  renderDpi: number;
  minPageChars: number;
  maxImages: number;
  maxWorkers: number;
  contextChars: number;
  chunkSize: number;
  chunkOverlap: number;
}

export interface AppConfig {
  ai: AIConfig;
  processing: ProcessingConfig;
  inputDir: string;
  outputDir: string;
  server: {
    host: string;
    port: number;
  };
  logLevel: LogLevel;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_MODELS: Record<AIProvider, string> = {
  openai: "gpt-4o",
  anthropic: "claude-sonnet-4-20250514",
};

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvZ = z.object({
  PA_AI_PROVIDER: AIProviderZ.default("openai"),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  ANTHROPIC_MODEL: optionalString,
  PA_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  PA_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  PA_PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  PA_USE_VISION: booleanFlag.default("true"),
  PA_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  PA_RENDER_DPI: z.coerce.number().int().min(36).max(600).default(200),
  PA_MIN_PAGE_CHARS: z.coerce.number().int().min(0).default(50),
  PA_MAX_IMAGES: z.coerce.number().int().min(1).max(50).default(10),
  PA_MAX_WORKERS: z.coerce.number().int().min(1).max(32).default(3),
  PA_CONTEXT_CHARS: z.coerce.number().int().min(1000).default(12000),
  PA_INPUT_DIR: z.string().default("Input Data"),
  PA_OUTPUT_DIR: z.string().default("Output"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(logLevels))
    .default("info"),
});

// ═══════════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════════

export function loadConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): AppConfig {
  // Empty strings are treated as unset so defaults apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );

  const parsed = EnvZ.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    ai: {
      provider: e.PA_AI_PROVIDER,
      openaiApiKey: e.OPENAI_API_KEY ?? null,
      anthropicApiKey: e.ANTHROPIC_API_KEY ?? null,
      openaiModel: e.OPENAI_MODEL ?? DEFAULT_MODELS.openai,
      anthropicModel: e.ANTHROPIC_MODEL ?? DEFAULT_MODELS.anthropic,
      maxTokens: e.PA_MAX_TOKENS,
      temperature: e.PA_TEMPERATURE,
      timeoutMs: e.PA_PROVIDER_TIMEOUT_MS,
    },
    processing: {
      useVision: e.PA_USE_VISION,
      confidenceThreshold: e.PA_CONFIDENCE_THRESHOLD,
      renderDpi: e.PA_RENDER_DPI,
      minPageChars: e.PA_MIN_PAGE_CHARS,
      maxImages: e.PA_MAX_IMAGES,
      maxWorkers: e.PA_MAX_WORKERS,
      contextChars: e.PA_CONTEXT_CHARS,
      chunkSize: 1000,
      chunkOverlap: 200,
    },
    inputDir: path.resolve(cwd, e.PA_INPUT_DIR),
    outputDir: path.resolve(cwd, e.PA_OUTPUT_DIR),
    server: {
      host: e.HOST,
      port: e.PORT,
    },
    logLevel: e.LOG_LEVEL,
  };
}

export function apiKeyFor(ai: AIConfig, provider: AIProvider = ai.provider): string | null {
  return provider === "openai" ? ai.openaiApiKey : ai.anthropicApiKey;
}

export function modelFor(ai: AIConfig, provider: AIProvider = ai.provider): string {
  return provider === "openai" ? ai.openaiModel : ai.anthropicModel;
}

/**
 * @throws ConfigurationError when the provider has no API key
 */
export function assertProviderReady(config: AppConfig, provider: AIProvider = config.ai.provider): void {
  if (!apiKeyFor(config.ai, provider)) {
    const envVar = provider === "openai" ? "OPENAI_API_KEY" : "ANTHROPIC_API_KEY";
    throw new ConfigurationError(
      `No API key configured for provider '${provider}'. Set ${envVar} or pass it on the command line.`
    );
  }
}

/**
 * Applies a runtime update. Returns a new config; the input is not mutated.
 */
export function applyConfigUpdate(config: AppConfig, update: ConfigUpdate): AppConfig {
  return {
    ...config,
    ai: {
      ...config.ai,
      provider: update.provider ?? config.ai.provider,
      openaiApiKey: update.openaiApiKey ?? config.ai.openaiApiKey,
      anthropicApiKey: update.anthropicApiKey ?? config.ai.anthropicApiKey,
    },
    processing: {
      ...config.processing,
      useVision: update.useVision ?? config.processing.useVision,
      confidenceThreshold: update.confidenceThreshold ?? config.processing.confidenceThreshold,
    },
  };
}

/** Config view safe to return over the API: key presence only. */
export function publicConfig(config: AppConfig) {
  return {
    provider: config.ai.provider,
    openaiModel: config.ai.openaiModel,
    anthropicModel: config.ai.anthropicModel,
    hasOpenaiKey: config.ai.openaiApiKey !== null,
    hasAnthropicKey: config.ai.anthropicApiKey !== null,
    useVision: config.processing.useVision,
    confidenceThreshold: config.processing.confidenceThreshold,
    renderDpi: config.processing.renderDpi,
    maxWorkers: config.processing.maxWorkers,
    inputDir: config.inputDir,
    outputDir: config.outputDir,
  };
}
