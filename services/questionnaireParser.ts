import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import type { ClientInfo, ColumnSelection, QARecord, QuestionnaireDataset } from "../types";
import { InputFormatError } from "./errors";
import { detectHeader } from "./headerDetector";
import { createLogger } from "./logger";

const log = createLogger('questionnaireParser');

export const DEFAULT_SECTION = 'General';

const DEFAULT_COLUMNS = {
  section: 'Section',
  question: 'Question',
  answer: 'Answer',
} as const;

export const CLIENT_NAME_KEY = 'Client Name';
export const PRODUCT_NAME_KEY = 'Product Name';

export const clientField = (info: ClientInfo, key: string, fallback = ''): string =>
  Object.prototype.hasOwnProperty.call(info, key) ? info[key] : fallback;

const PERSONA_SECTION_PATTERN = /persona|audience|customer/i;

export const isPersonaSection = (section: string): boolean => PERSONA_SECTION_PATTERN.test(section);

const normalizeHeader = (header: string): string => header.replace(/^\uFEFF/, '').trim().toLowerCase();

const splitLines = (text: string): string[] => text.replace(/^\uFEFF/, '').split(/\r\n|\n|\r/);

/**
 * Finds a column by the caller's name first, then by the literal default.
 * Both comparisons ignore case and surrounding whitespace. Returns -1 when
 * neither is present.
 */
export const resolveColumnIndex = (
  headers: readonly string[],
  requested: string | undefined,
  fallback: string
): number => {
  const normalized = headers.map(normalizeHeader);
  const candidates = [requested?.trim(), fallback].filter((name): name is string => Boolean(name));
  for (const name of candidates) {
    const index = normalized.indexOf(name.toLowerCase());
    if (index >= 0) return index;
  }
  return -1;
};

const readCsvRows = (text: string): string[][] => {
  const result = Papa.parse<string[]>(text, { skipEmptyLines: 'greedy' });
  for (const error of result.errors) {
    log.warn({ row: error.row, code: error.code }, `CSV parse issue: ${error.message}`);
  }
  return result.data;
};

const cell = (row: readonly string[], index: number): string =>
  index >= 0 ? (row[index] ?? '').trim() : '';

/**
 * Header fields of the questionnaire, taken from the detected header row or,
 * when none is found, from the first line.
 */
export const listQuestionnaireColumns = (text: string, columns: ColumnSelection = {}): string[] => {
  const lines = splitLines(text);
  const { headerIndex } = detectHeader(lines, columns);
  const [header] = readCsvRows(lines.slice(headerIndex ?? 0).join('\n'));
  return header ? header.map(field => field.trim()) : [];
};

export const parseQuestionnaireText = (
  text: string,
  columns: ColumnSelection = {}
): QuestionnaireDataset => {
  const lines = splitLines(text);
  const { headerIndex, clientInfo } = detectHeader(lines, columns);
  if (headerIndex === null) {
    log.warn('No header row with Question/Answer columns found, reading from the first line');
  }

  const [header = [], ...rows] = readCsvRows(lines.slice(headerIndex ?? 0).join('\n'));
  const headers = header.map(field => field.trim());

  const sectionIndex = resolveColumnIndex(headers, columns.section, DEFAULT_COLUMNS.section);
  const questionIndex = resolveColumnIndex(headers, columns.question, DEFAULT_COLUMNS.question);
  const answerIndex = resolveColumnIndex(headers, columns.answer, DEFAULT_COLUMNS.answer);

  const missing = [
    questionIndex < 0 ? columns.question?.trim() || DEFAULT_COLUMNS.question : null,
    answerIndex < 0 ? columns.answer?.trim() || DEFAULT_COLUMNS.answer : null,
  ].filter((name): name is string => name !== null);

  if (missing.length > 0) {
    // A detected header always names both columns, so this only happens on
    // the first-line fallback
    throw new InputFormatError(
      'Could not find a CSV header row with Section/Question/Answer columns: ' +
        `${missing.map(name => `"${name}"`).join(', ')} not found in the first line. ` +
        `Available columns: ${headers.length > 0 ? headers.join(', ') : '(none)'}`
    );
  }

  const allQa: QARecord[] = [];
  const personaQa: QARecord[] = [];

  for (const row of rows) {
    const question = cell(row, questionIndex);
    const answer = cell(row, answerIndex);
    if (!question || !answer) continue;

    const record: QARecord = {
      section: cell(row, sectionIndex) || DEFAULT_SECTION,
      question,
      answer,
    };
    allQa.push(record);
    if (isPersonaSection(record.section)) {
      personaQa.push(record);
    }
  }

  log.debug(
    { headerRowIndex: headerIndex, qaCount: allQa.length, personaQaCount: personaQa.length },
    'Parsed questionnaire'
  );

  return { clientInfo, allQa, personaQa, columns: headers, headerRowIndex: headerIndex };
};

export const parseQuestionnaireFile = async (
  filePath: string,
  columns: ColumnSelection = {}
): Promise<QuestionnaireDataset> => {
  const text = await readFile(filePath, 'utf-8');
  return parseQuestionnaireText(text, columns);
};
