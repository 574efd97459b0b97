import { writeFile } from "node:fs/promises";
import Papa from "papaparse";
import { EXPORT_COLUMNS } from "../types";
import type { ClientInfo, ExportRow, ListOrScalar, Persona } from "../types";
import { createLogger } from "./logger";
import { CLIENT_NAME_KEY, PRODUCT_NAME_KEY, clientField } from "./questionnaireParser";

const log = createLogger('personaExporter');

export const LIST_DELIMITER = '; ';

/** The one place a list-or-string persona field becomes text. */
export const joinListOrScalar = (field: ListOrScalar | undefined): string => {
  if (!field) return '';
  return field.kind === 'list' ? field.items.join(LIST_DELIMITER) : field.value;
};

export const buildExportRow = (persona: Persona, clientInfo: ClientInfo): ExportRow => {
  const { demographics, psychographics, behavior } = persona;
  return {
    'Client Name': clientField(clientInfo, CLIENT_NAME_KEY),
    'Product Name': clientField(clientInfo, PRODUCT_NAME_KEY),
    'Persona Name': persona.name ?? '',
    'Persona Type': persona.type ?? '',
    'Age Range': demographics.ageRange ?? '',
    'Gender': demographics.gender ?? '',
    'Location': demographics.location ?? '',
    'Income Level': demographics.incomeLevel ?? '',
    'Net Worth': demographics.netWorth ?? '',
    'Education': demographics.education ?? '',
    'Occupation': demographics.occupation ?? '',
    'Family Status': demographics.familyStatus ?? '',
    'Values': joinListOrScalar(psychographics.values),
    'Motivations': joinListOrScalar(psychographics.motivations),
    'Lifestyle': psychographics.lifestyle ?? '',
    'Interests': joinListOrScalar(psychographics.interests),
    'Goals': joinListOrScalar(persona.goals),
    'Challenges': joinListOrScalar(persona.challenges),
    'Needs': joinListOrScalar(persona.needs),
    'Pain Points': joinListOrScalar(persona.painPoints),
    'Research Style': behavior.researchStyle ?? '',
    'Decision Making': behavior.decisionMaking ?? '',
    'Communication Preferences': behavior.communicationPreferences ?? '',
    'Online Behavior': behavior.onlineBehavior ?? '',
    'Quote': persona.quote ?? '',
    'Key Characteristics': joinListOrScalar(persona.keyCharacteristics),
  };
};

export const buildExportRows = (personas: readonly Persona[], clientInfo: ClientInfo): ExportRow[] =>
  personas.map(persona => buildExportRow(persona, clientInfo));

/**
 * Serializes personas as CSV text with the fixed column order. Returns an
 * empty string when there is nothing to export.
 */
export const personasToCsv = (personas: readonly Persona[], clientInfo: ClientInfo): string => {
  if (personas.length === 0) return '';
  const rows = buildExportRows(personas, clientInfo);
  return Papa.unparse({
    fields: [...EXPORT_COLUMNS],
    data: rows.map(row => EXPORT_COLUMNS.map(column => row[column])),
  });
};

/**
 * Writes the CSV to `outputPath` as UTF-8 and returns the number of rows.
 * Writes nothing for an empty persona list.
 */
export const exportPersonasToFile = async (
  personas: readonly Persona[],
  clientInfo: ClientInfo,
  outputPath: string
): Promise<number> => {
  if (personas.length === 0) {
    log.warn('No personas to export.');
    return 0;
  }
  await writeFile(outputPath, personasToCsv(personas, clientInfo), 'utf-8');
  log.info({ count: personas.length, outputPath }, 'Exported personas');
  return personas.length;
};
