/**
 * Raised when the uploaded file has no usable header row or lacks the
 * question/answer columns.
 */
export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputFormatError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The model reply could not be turned into JSON. Only seen inside the
 * generation client: it is retried, then degrades to an empty result.
 */
export class ResponseParseError extends Error {
  readonly responseText: string;

  constructor(message: string, responseText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResponseParseError';
    this.responseText = responseText;
  }
}

export abstract class GenerationError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.attempts = attempts;
  }
}

export class TransientGenerationError extends GenerationError {
  constructor(message: string, attempts = 1, options?: { cause?: unknown }) {
    super(message, attempts, options);
    this.name = 'TransientGenerationError';
  }
}

export class NonRetryableGenerationError extends GenerationError {
  constructor(message: string, attempts = 1, options?: { cause?: unknown }) {
    super(message, attempts, options);
    this.name = 'NonRetryableGenerationError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export type FailureKind = 'rate_limit' | 'timeout' | 'auth' | 'empty' | 'generic';

export interface FailureNotice {
  kind: FailureKind;
  message: string;
}

/**
 * Maps a generation failure to a message the user can act on. Pass `null`
 * when the call succeeded but produced zero personas.
 */
export const describeGenerationFailure = (error: unknown): FailureNotice => {
  if (error === null) {
    return {
      kind: 'empty',
      message:
        'Failed to generate personas. The API returned an empty response. ' +
        'Check that your Gemini API key is valid and that you have quota left, then try again.',
    };
  }

  const text = errorMessage(error);
  const lowered = text.toLowerCase();

  if (lowered.includes('rate limit') || lowered.includes('quota')) {
    return {
      kind: 'rate_limit',
      message: 'Rate Limit Exceeded: the API rate limit has been reached. Wait a few minutes and try again.',
    };
  }
  if (lowered.includes('timeout')) {
    return {
      kind: 'timeout',
      message:
        'Timeout Error: the request took too long. Try again with a smaller questionnaire or check your connection.',
    };
  }
  if (lowered.includes('api key') || lowered.includes('authentication')) {
    return {
      kind: 'auth',
      message: 'Authentication Error: check the Gemini API key (--api-key or GEMINI_API_KEY).',
    };
  }
  return { kind: 'generic', message: `Error generating personas: ${text}` };
};
