import { z } from "zod";
import { AIProviderZ } from "@shared/schema";
import { loadConfig, type AppConfig } from "../config";

/**
 * Command-line options, as commander hands them over (`optsWithGlobals()`).
 * Values are validated again by `loadConfig`, so strings stay strings here.
 */
export const CliOptionsZ = z.object({
  provider: AIProviderZ.optional(),
  openaiKey: z.string().optional(),
  anthropicKey: z.string().optional(),
  vision: z.boolean().optional(),
  threshold: z.string().optional(),
  inputDir: z.string().optional(),
  outputDir: z.string().optional(),
  logLevel: z.string().optional(),
  parallel: z.boolean().optional(),
  workers: z.string().optional(),
  host: z.string().optional(),
  port: z.string().optional(),
});
export type CliOptions = z.infer<typeof CliOptionsZ>;

type StringOption = Exclude<keyof CliOptions, "vision" | "parallel">;

const ENV_NAMES: ReadonlyArray<[StringOption, string]> = [
  ["provider", "PA_AI_PROVIDER"],
  ["openaiKey", "OPENAI_API_KEY"],
  ["anthropicKey", "ANTHROPIC_API_KEY"],
  ["threshold", "PA_CONFIDENCE_THRESHOLD"],
  ["inputDir", "PA_INPUT_DIR"],
  ["outputDir", "PA_OUTPUT_DIR"],
  ["logLevel", "LOG_LEVEL"],
  ["workers", "PA_MAX_WORKERS"],
  ["host", "HOST"],
  ["port", "PORT"],
];

/** Flags as environment entries; flags win over the environment. */
export function toEnvOverrides(options: CliOptions): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [key, envName] of ENV_NAMES) {
    const value = options[key];
    if (value !== undefined) overrides[envName] = value;
  }
  if (options.vision !== undefined) {
    overrides.PA_USE_VISION = String(options.vision);
  }
  return overrides;
}

export function configFromOptions(
  options: CliOptions,
  env: Record<string, string | undefined>,
  cwd?: string
): AppConfig {
  return loadConfig({ ...env, ...toEnvOverrides(options) }, cwd);
}
