import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { DEFAULT_NARRATOR_TEMPERATURE } from "@/lib/ai/backend";
import { DEFAULT_NARRATOR_MODEL } from "@/lib/ai/providers";
import { GameError } from "@/lib/errors";

const envSchema = z.object({
  AI_GATEWAY_API_KEY: z.string().trim().min(1).optional(),
  NARRATOR_MODEL: z.string().trim().min(1).default(DEFAULT_NARRATOR_MODEL),
  NARRATOR_TEMPERATURE: z.coerce
    .number()
    .min(0)
    .max(2)
    .default(DEFAULT_NARRATOR_TEMPERATURE),
  NARRATOR_SEED: z.string().trim().min(1).optional(),
  POSTGRES_URL: z.string().trim().url().optional(),
});

export interface NarratorConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  seed?: number | string;
  postgresUrl?: string;
}

const INTEGER_SEED_REGEX = /^\d+$/;

/**
 * Reads narrator settings from an environment map. Blank values count as
 * unset, so an untouched `.env.example` copy yields the defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): NarratorConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new GameError("bad_request:config", { detail });
  }

  const parsed = result.data;
  const seed =
    parsed.NARRATOR_SEED !== undefined &&
    INTEGER_SEED_REGEX.test(parsed.NARRATOR_SEED)
      ? Number(parsed.NARRATOR_SEED)
      : parsed.NARRATOR_SEED;

  return {
    apiKey: parsed.AI_GATEWAY_API_KEY,
    model: parsed.NARRATOR_MODEL,
    temperature: parsed.NARRATOR_TEMPERATURE,
    seed,
    postgresUrl: parsed.POSTGRES_URL,
  };
}

/**
 * Loads `.env` (or `path`) into `process.env` without overriding variables
 * that are already set, then reads the narrator settings from it.
 */
export function loadEnvConfig({ path }: { path?: string } = {}): NarratorConfig {
  loadDotenv(path ? { path } : undefined);
  return loadConfig(process.env);
}
