import { z } from "zod";

export const PIPELINE_MODES = ["live", "offline"] as const;
export const LOG_LEVELS = ["error", "warn", "info", "debug", "silent"] as const;

export type PipelineMode = (typeof PIPELINE_MODES)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

export type AppConfig = {
  port: number;
  openaiApiKey?: string;
  googleApiKey?: string;
  textModel: string;
  imageModel: string;
  generationTimeoutMs: number;
  maxConcurrentGenerations: number;
  pipelineMode: PipelineMode;
  stageBaseUrl?: string;
  logLevel: LogLevel;
};

export const DEFAULT_TEXT_MODEL = "gpt-4.1-mini";
export const DEFAULT_IMAGE_MODEL = "gemini-2.5-flash-image";

const optionalText = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

function boundedInt(fallback: number, min: number, max: number) {
  return z
    .string()
    .optional()
    .transform((v) => {
      const raw = v === undefined || v.trim().length === 0 ? Number.NaN : Number(v);
      if (!Number.isFinite(raw)) return fallback;
      return Math.min(max, Math.max(min, Math.round(raw)));
    });
}

function oneOf<T extends string>(values: readonly T[], fallback: T) {
  return z
    .string()
    .optional()
    .transform((v): T => {
      const normalized = v?.trim().toLowerCase();
      return values.find((candidate) => candidate === normalized) ?? fallback;
    });
}

const EnvSchema = z.object({
  PORT: boundedInt(5050, 1, 65535),
  OPENAI_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  GEMINI_API_KEY: optionalText,
  PANELVERSE_TEXT_MODEL: optionalText,
  PANELVERSE_IMAGE_MODEL: optionalText,
  PANELVERSE_GENERATION_TIMEOUT_MS: boundedInt(60_000, 1_000, 600_000),
  PANELVERSE_MAX_CONCURRENT_GENERATIONS: boundedInt(4, 1, 64),
  PANELVERSE_PIPELINE_MODE: oneOf(PIPELINE_MODES, "live"),
  PANELVERSE_STAGE_BASE_URL: optionalText,
  LOG_LEVEL: oneOf(LOG_LEVELS, "info")
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    openaiApiKey: parsed.OPENAI_API_KEY,
    googleApiKey: parsed.GOOGLE_API_KEY ?? parsed.GEMINI_API_KEY,
    textModel: parsed.PANELVERSE_TEXT_MODEL ?? DEFAULT_TEXT_MODEL,
    imageModel: parsed.PANELVERSE_IMAGE_MODEL ?? DEFAULT_IMAGE_MODEL,
    generationTimeoutMs: parsed.PANELVERSE_GENERATION_TIMEOUT_MS,
    maxConcurrentGenerations: parsed.PANELVERSE_MAX_CONCURRENT_GENERATIONS,
    pipelineMode: parsed.PANELVERSE_PIPELINE_MODE,
    stageBaseUrl: parsed.PANELVERSE_STAGE_BASE_URL?.replace(/\/+$/, ""),
    logLevel: parsed.LOG_LEVEL
  };
}
