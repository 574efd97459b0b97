import { GoogleGenAI } from "@google/genai";
import type { Persona, QuestionnaireDataset } from "../types";
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_MODEL_NAME } from "./config";
import {
  ConfigError,
  NonRetryableGenerationError,
  ResponseParseError,
  TransientGenerationError,
  errorMessage,
} from "./errors";
import { parsePersonaPayload, salvagePersonaPayload } from "./jsonRepair";
import { createLogger } from "./logger";
import { coercePersonas } from "./personaSchema";
import { buildPersonaPrompt } from "./promptBuilder";
import { RetryError, withRetry } from "./retry";

const log = createLogger('geminiService');

export interface GenerationConfig {
  temperature: number;
  maxOutputTokens: number;
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  temperature: 0.7,
  maxOutputTokens: 8192,
};

export interface GenerateContentRequest {
  model: string;
  contents: string;
  config: GenerationConfig;
}

interface GenerationResponse {
  text?: string;
}

/** The slice of the Gemini SDK this service calls. `GoogleGenAI` satisfies it. */
export interface GenerationClient {
  models: {
    generateContent: (params: GenerateContentRequest) => Promise<GenerationResponse>;
  };
}

export interface GeneratePersonasOptions {
  client: GenerationClient;
  model?: string;
  maxAttempts?: number;
  generationConfig?: GenerationConfig;
  sleep?: (ms: number) => Promise<void>;
}

const RETRYABLE_MARKERS = ['rate limit', 'quota', 'timeout', '429', '500', '502', '503'];

export const isRetryableGenerationError = (error: unknown): boolean => {
  if (error instanceof ResponseParseError || error instanceof TransientGenerationError) {
    return true;
  }
  if (error instanceof NonRetryableGenerationError || error instanceof ConfigError) {
    return false;
  }
  const message = errorMessage(error).toLowerCase();
  return RETRYABLE_MARKERS.some(marker => message.includes(marker));
};

export const createGeminiClient = (apiKey: string | undefined): GenerationClient => {
  const key = apiKey?.trim();
  if (!key) {
    throw new ConfigError(
      'Missing Gemini API key: set GEMINI_API_KEY in the environment or pass --api-key.'
    );
  }
  return new GoogleGenAI({ apiKey: key });
};

const attemptsLabel = (attempts: number): string =>
  `${attempts} attempt${attempts === 1 ? '' : 's'}`;

/**
 * Sends a prompt to the model and turns the reply into personas.
 *
 * Transient API failures, empty replies and unparseable JSON are retried with
 * exponential backoff. On the last attempt unparseable JSON goes through the
 * salvage parser instead, so a bad reply yields an empty list rather than an
 * error. Callers must treat an empty list as a failed generation.
 */
export const generatePersonasFromPrompt = async (
  prompt: string,
  options: GeneratePersonasOptions
): Promise<Persona[]> => {
  const model = options.model ?? DEFAULT_MODEL_NAME;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const config = options.generationConfig ?? DEFAULT_GENERATION_CONFIG;

  try {
    const items = await withRetry(
      async ({ attempt, isFinalAttempt }) => {
        log.debug({ model, attempt: attempt + 1, maxAttempts }, 'Requesting personas');
        const response = await options.client.models.generateContent({
          model,
          contents: prompt,
          config,
        });

        const text = response.text;
        if (!text || !text.trim()) {
          throw new TransientGenerationError('Empty response from API', attempt + 1);
        }

        try {
          return parsePersonaPayload(text);
        } catch (error) {
          if (!(error instanceof ResponseParseError)) throw error;
          log.warn(
            { attempt: attempt + 1, maxAttempts, responsePreview: text.slice(0, 500) },
            `JSON parsing error: ${error.message}`
          );
          if (!isFinalAttempt) throw error;

          log.warn('Using fallback text parser. JSON format preferred.');
          const salvaged = salvagePersonaPayload(text);
          if (salvaged.length === 0) {
            log.error({ responseLength: text.length }, 'Could not extract valid JSON from response');
          }
          return salvaged;
        }
      },
      {
        maxAttempts,
        isRetryable: isRetryableGenerationError,
        sleep: options.sleep,
        onRetry: (error, attempt, delayMs) => {
          log.warn(
            { attempt: attempt + 1, maxAttempts, delayMs, error: errorMessage(error) },
            `Generation attempt failed, retrying in ${delayMs / 1000} seconds`
          );
        },
      }
    );

    const personas = coercePersonas(items);
    log.info({ count: personas.length }, 'Generated personas');
    return personas;
  } catch (error) {
    if (!(error instanceof RetryError)) throw error;

    const message = `Failed to generate personas after ${attemptsLabel(error.attempts)}: ${error.message}`;
    log.error({ attempts: error.attempts, retryable: error.retryable }, message);
    throw error.retryable
      ? new TransientGenerationError(message, error.attempts, { cause: error.cause })
      : new NonRetryableGenerationError(message, error.attempts, { cause: error.cause });
  }
};

/**
 * Generates personas for a parsed questionnaire.
 */
export const generatePersonas = async (
  dataset: QuestionnaireDataset,
  options: GeneratePersonasOptions
): Promise<Persona[]> => generatePersonasFromPrompt(buildPersonaPrompt(dataset), options);
