import { z } from "zod";
import { fromError } from "zod-validation-error";

import { EnvValidationError } from "./errors.js";

const booleanSchema = z
  .string()
  .refine((s) => s === "true" || s === "false")
  .transform((s) => s === "true");

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  // Scryfall API
  SCRYFALL_API_BASE_URL: z.string().url().default("https://api.scryfall.com"),
  SCRYFALL_RATE_LIMIT_MS: z.coerce.number().min(50).default(100), // Scryfall asks for 50-100ms between requests
  SCRYFALL_CONTACT_EMAIL: z.string().email().optional(),

  // Output
  OUTPUT_DIR: z.string().min(1).default("."),
  STRICT_MODE: booleanSchema.optional().default("false"),
  SPLIT_MELD_RESULT: booleanSchema.optional().default("true"),

  // Logging
  LOG_LEVEL: logLevelSchema.default("info"),
});

export type Env = z.infer<typeof envSchema>;

/** Validate an environment map without touching the cached process env */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new EnvValidationError(fromError(parsed.error).toString(), {
      cause: parsed.error,
    });
  }

  return parsed.data;
}

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}
