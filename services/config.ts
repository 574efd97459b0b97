import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_MODEL_NAME = 'gemini-2.5-flash';
export const DEFAULT_MAX_ATTEMPTS = 3;

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  GEMINI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  GEMINI_MODEL: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_MODEL_NAME)),
  GEMINI_MAX_ATTEMPTS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_MAX_ATTEMPTS)
  ),
});

export interface AppConfig {
  apiKey?: string;
  modelName: string;
  maxAttempts: number;
}

/**
 * Reads configuration from the environment. `GEMINI_API_KEY` wins over the
 * older `API_KEY` variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    apiKey: values.GEMINI_API_KEY ?? values.API_KEY,
    modelName: values.GEMINI_MODEL,
    maxAttempts: values.GEMINI_MAX_ATTEMPTS,
  };
};
