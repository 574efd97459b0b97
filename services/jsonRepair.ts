import { ResponseParseError } from "./errors";

const FENCE = '```';
const JSON_FENCE = '```json';

/**
 * Keeps the body of a ```json block when there is one, otherwise the first
 * fenced block that contains both `{` and `[`. Text without fences is
 * returned trimmed.
 */
export const stripCodeFence = (text: string): string => {
  const trimmed = text.trim();

  const jsonFence = trimmed.indexOf(JSON_FENCE);
  if (jsonFence >= 0) {
    const body = trimmed.slice(jsonFence + JSON_FENCE.length);
    const end = body.indexOf(FENCE);
    return (end >= 0 ? body.slice(0, end) : body).trim();
  }

  if (trimmed.includes(FENCE)) {
    // Odd-indexed parts sit between an opening and a closing fence
    const parts = trimmed.split(FENCE);
    for (let i = 1; i < parts.length; i += 2) {
      if (parts[i].includes('{') && parts[i].includes('[')) {
        return parts[i].trim();
      }
    }
  }

  return trimmed;
};

export const trimToJsonStart = (text: string): string => {
  if (text.startsWith('{') || text.startsWith('[')) return text;
  const starts = [text.indexOf('{'), text.indexOf('[')].filter(index => index >= 0);
  return starts.length > 0 ? text.slice(Math.min(...starts)) : text;
};

/**
 * Appends the closers a truncated document is missing, innermost first.
 * Brackets inside string literals are ignored. Truncation inside a string
 * is not repaired.
 */
export const closeUnbalancedBrackets = (text: string): string => {
  const open: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') open.push('}');
    else if (char === '[') open.push(']');
    else if ((char === '}' || char === ']') && open[open.length - 1] === char) open.pop();
  }

  if (open.length === 0) return text;

  const body = text.trimEnd().replace(/,$/, '');
  return body + open.reverse().join('');
};

const PERSONA_MARKER = 'persona_name';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads the persona list out of decoded JSON: a bare array is used as is, an
 * object contributes its `personas` array.
 */
export const readPersonaList = (
  data: unknown,
  responseText: string,
  options: { acceptSinglePersona?: boolean } = {}
): unknown[] => {
  if (Array.isArray(data)) return data;
  if (isRecord(data)) {
    const personas = data.personas;
    if (Array.isArray(personas)) return personas;
    if (personas === undefined) {
      return options.acceptSinglePersona && PERSONA_MARKER in data ? [data] : [];
    }
    throw new ResponseParseError(`"personas" is not a list (got ${typeof personas})`, responseText);
  }
  throw new ResponseParseError(
    `Unexpected response format: ${data === null ? 'null' : typeof data}`,
    responseText
  );
};

/** Runs the full repair pipeline and decodes the persona list. */
export const parsePersonaPayload = (responseText: string): unknown[] => {
  const candidate = closeUnbalancedBrackets(trimToJsonStart(stripCodeFence(responseText)));

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ResponseParseError(`Invalid JSON in model response: ${reason}`, responseText, {
      cause: error,
    });
  }
  return readPersonaList(data, responseText);
};

// Brace-delimited objects with at most one level of nesting
const OBJECT_PATTERN = /\{[^{}]*(?:\{[^{}]*\}[^{}]*)*\}/g;

/**
 * Last-resort parse: decodes the longest object-like substring of the
 * response. A lone persona object counts as a list of one. Never throws.
 */
export const salvagePersonaPayload = (responseText: string): unknown[] => {
  const matches = responseText.match(OBJECT_PATTERN);
  if (!matches) return [];

  const longest = matches.reduce((best, match) => (match.length > best.length ? match : best));
  try {
    return readPersonaList(JSON.parse(longest), responseText, { acceptSinglePersona: true });
  } catch {
    return [];
  }
};
