/**
 * Environment configuration.
 *
 * `.env` is loaded with dotenv, then `process.env` is parsed into a typed
 * `GatewayEnv`. Invalid values fail startup with the zod issues.
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type { ResearchConfigInput } from "@citeline/core";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const GatewayEnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  MODEL_NAME: z.string().trim().min(1).default("gpt-4o-mini"),
  MAX_TOKENS: z.coerce.number().int().positive().default(4096),

  HOST: z.string().trim().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),

  MAX_SEARCH_RESULTS: z.coerce.number().int().positive().default(5),
  MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(3000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MAX_STEPS: z.coerce.number().int().positive().default(8),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  GOOGLE_API_KEY: optionalString,
  GOOGLE_CX: optionalString,

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type GatewayEnv = z.infer<typeof GatewayEnvSchema>;

export class EnvError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "EnvError";
  }
}

/**
 * Parse an environment record (defaults to `process.env`).
 *
 * @throws EnvError listing every invalid variable
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): GatewayEnv {
  const parsed = GatewayEnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new EnvError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Load `.env` into `process.env`, then parse it.
 */
export function loadEnv(path?: string): GatewayEnv {
  loadDotenv(path ? { path } : undefined);
  return parseEnv();
}

export function toResearchConfig(env: GatewayEnv): ResearchConfigInput {
  return {
    maxSteps: env.MAX_STEPS,
    maxSearchResults: env.MAX_SEARCH_RESULTS,
    maxContentLength: env.MAX_CONTENT_LENGTH,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    modelTimeoutMs: env.MODEL_TIMEOUT_MS,
  };
}
