import type { ClientInfo } from "../types";

export interface HeaderDetection {
  /** Zero-based line index of the header row, or null when none was found. */
  headerIndex: number | null;
  clientInfo: ClientInfo;
}

export interface HeaderTokens {
  question?: string;
  answer?: string;
}

const QUESTION_TOKEN = 'QUESTION';
const ANSWER_TOKEN = 'ANSWER';

const acceptedTokens = (literal: string, custom?: string): string[] => {
  const name = custom?.trim().toUpperCase();
  return name && name !== literal ? [literal, name] : [literal];
};

/**
 * A header row must name the question and answer columns as whole fields.
 * "Questionnaire Type,Answers below" mentions both words but is not a header.
 */
export const isHeaderLine = (line: string, tokens: HeaderTokens = {}): boolean => {
  const questionTokens = acceptedTokens(QUESTION_TOKEN, tokens.question);
  const answerTokens = acceptedTokens(ANSWER_TOKEN, tokens.answer);

  const upper = line.toUpperCase();
  const mentionsBoth =
    questionTokens.some(token => upper.includes(token)) &&
    answerTokens.some(token => upper.includes(token));
  if (!mentionsBoth || !line.includes(',')) return false;

  const fields = line.split(',').map(field => field.trim().toUpperCase());
  return (
    fields.some(field => questionTokens.includes(field)) &&
    fields.some(field => answerTokens.includes(field))
  );
};

/**
 * Splits a metadata row on its first comma. "Client Name,Acme, Inc." gives
 * ["Client Name", "Acme, Inc."].
 */
export const parseMetadataLine = (line: string): [string, string] | null => {
  const comma = line.indexOf(',');
  if (comma < 0) return null;
  const key = line.slice(0, comma).trim();
  if (!key) return null;
  return [key, line.slice(comma + 1).trim()];
};

export const detectHeader = (lines: readonly string[], tokens: HeaderTokens = {}): HeaderDetection => {
  const clientInfo: Record<string, string> = {};

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (isHeaderLine(line, tokens)) {
      return { headerIndex: i, clientInfo };
    }
    const entry = parseMetadataLine(line);
    if (entry) {
      clientInfo[entry[0]] = entry[1];
    }
  }

  return { headerIndex: null, clientInfo };
};
