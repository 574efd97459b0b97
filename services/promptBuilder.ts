import type { QuestionnaireDataset } from "../types";
import { PERSONA_SCHEMA_EXAMPLE } from "./personaSchema";
import { CLIENT_NAME_KEY, PRODUCT_NAME_KEY, clientField } from "./questionnaireParser";

const PERSONA_FACETS = [
  'Persona Name - A memorable, descriptive name',
  'Persona Type - Primary, Secondary, or Tertiary',
  'Demographics - Age range, gender, location, income level, education, occupation',
  'Psychographics - Values, motivations, lifestyle, interests',
  'Goals - What they want to achieve',
  'Challenges - Problems they face',
  'Needs - What they need from the product/service',
  'Pain Points - Specific frustrations',
  'Behavior - How they behave, research, make decisions',
  'Quote - A representative quote in their voice',
  'Key Characteristics - 5-7 bullet points summarizing them',
];

const OUTPUT_SCHEMA = JSON.stringify({ personas: [PERSONA_SCHEMA_EXAMPLE] }, null, 2);

const formatQuestionnaire = (data: QuestionnaireDataset): string => {
  const lines = [
    `CLIENT: ${clientField(data.clientInfo, CLIENT_NAME_KEY, 'Unknown')}`,
    `PRODUCT: ${clientField(data.clientInfo, PRODUCT_NAME_KEY, 'Unknown')}`,
    '',
    'QUESTIONNAIRE DATA:',
    '',
  ];
  for (const qa of data.allQa) {
    lines.push(`Section: ${qa.section}`, `Q: ${qa.question}`, `A: ${qa.answer}`, '');
  }
  return lines.join('\n');
};

/**
 * Builds the persona generation prompt. The output is a pure function of the
 * dataset, so the same questionnaire always yields the same prompt.
 */
export const buildPersonaPrompt = (data: QuestionnaireDataset): string =>
  [
    'You are an expert user research and UX strategist. Analyze the following questionnaire data and create comprehensive User Personas.',
    '',
    formatQuestionnaire(data),
    'Based on this questionnaire, create detailed user personas that represent the ideal clients/users for this product/service.',
    '',
    'For each persona, provide:',
    ...PERSONA_FACETS.map((facet, index) => `${index + 1}. ${facet}`),
    '',
    'Return your response as a JSON object with this structure:',
    OUTPUT_SCHEMA,
    '',
    'Identify at least 2-3 distinct personas based on the questionnaire data. Be thorough and specific.',
  ].join('\n');
