import { z } from "zod";
import type { ListOrScalar, Persona } from "../types";
import { createLogger } from "./logger";

const log = createLogger('personaSchema');

// Model output is loosely typed: numbers and booleans are taken as text,
// anything else unusable becomes an absent field.
const primitive = z.union([z.string(), z.number(), z.boolean()]);

const text = primitive.transform(value => String(value)).optional().catch(undefined);

const isPrimitive = (value: unknown): value is string | number | boolean =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

const listOrScalar = z
  .union([
    z.array(z.unknown()).transform((items): ListOrScalar => ({
      kind: 'list',
      items: items.filter(isPrimitive).map(String),
    })),
    primitive.transform((value): ListOrScalar => ({ kind: 'scalar', value: String(value) })),
  ])
  .optional()
  .catch(undefined);

const DemographicsSchema = z
  .object({
    age_range: text,
    gender: text,
    location: text,
    income_level: text,
    net_worth: text,
    education: text,
    occupation: text,
    family_status: text,
  })
  .catch({});

const PsychographicsSchema = z
  .object({
    values: listOrScalar,
    motivations: listOrScalar,
    lifestyle: text,
    interests: listOrScalar,
  })
  .catch({});

const BehaviorSchema = z
  .object({
    research_style: text,
    decision_making: text,
    communication_preferences: text,
    online_behavior: text,
  })
  .catch({});

/** Shape the prompt asks the model to return, one entry of `personas`. */
export const RawPersonaSchema = z.object({
  persona_name: text,
  persona_type: text,
  demographics: DemographicsSchema,
  psychographics: PsychographicsSchema,
  goals: listOrScalar,
  challenges: listOrScalar,
  needs: listOrScalar,
  pain_points: listOrScalar,
  behavior: BehaviorSchema,
  quote: text,
  key_characteristics: listOrScalar,
});

export type RawPersona = z.input<typeof RawPersonaSchema>;

/**
 * Example embedded in the prompt. Typed against RawPersonaSchema so a key
 * renamed on one side fails to compile on the other.
 */
export const PERSONA_SCHEMA_EXAMPLE = {
  persona_name: 'Name',
  persona_type: 'Primary/Secondary/Tertiary',
  demographics: {
    age_range: '35-55',
    gender: 'Mixed (60% M, 40% F)',
    location: 'Primary: UK, Germany, Middle East',
    income_level: '€200,000+ annual',
    net_worth: '€1M+',
    education: 'University degree or higher',
    occupation: 'Business owners, C-level executives',
    family_status: 'Married/partnered, often with children',
  },
  psychographics: {
    values: ['value1', 'value2'],
    motivations: ['motivation1', 'motivation2'],
    lifestyle: 'Description',
    interests: ['interest1', 'interest2'],
  },
  goals: ['Goal 1', 'Goal 2'],
  challenges: ['Challenge 1', 'Challenge 2'],
  needs: ['Need 1', 'Need 2'],
  pain_points: ['Pain point 1', 'Pain point 2'],
  behavior: {
    research_style: 'Description',
    decision_making: 'Description',
    communication_preferences: 'Description',
    online_behavior: 'Description',
  },
  quote: '"A representative quote in their voice"',
  key_characteristics: ['Characteristic 1', 'Characteristic 2', 'Characteristic 3'],
} satisfies RawPersona;

const toPersona = (raw: z.output<typeof RawPersonaSchema>): Persona =>
  Object.freeze({
    name: raw.persona_name,
    type: raw.persona_type,
    demographics: Object.freeze({
      ageRange: raw.demographics.age_range,
      gender: raw.demographics.gender,
      location: raw.demographics.location,
      incomeLevel: raw.demographics.income_level,
      netWorth: raw.demographics.net_worth,
      education: raw.demographics.education,
      occupation: raw.demographics.occupation,
      familyStatus: raw.demographics.family_status,
    }),
    psychographics: Object.freeze({
      values: raw.psychographics.values,
      motivations: raw.psychographics.motivations,
      lifestyle: raw.psychographics.lifestyle,
      interests: raw.psychographics.interests,
    }),
    goals: raw.goals,
    challenges: raw.challenges,
    needs: raw.needs,
    painPoints: raw.pain_points,
    behavior: Object.freeze({
      researchStyle: raw.behavior.research_style,
      decisionMaking: raw.behavior.decision_making,
      communicationPreferences: raw.behavior.communication_preferences,
      onlineBehavior: raw.behavior.online_behavior,
    }),
    quote: raw.quote,
    keyCharacteristics: raw.key_characteristics,
  });

/**
 * Converts the decoded `personas` array into Persona records. Entries that
 * are not JSON objects are dropped.
 */
export const coercePersonas = (items: readonly unknown[]): Persona[] => {
  const personas: Persona[] = [];
  items.forEach((item, index) => {
    const parsed = RawPersonaSchema.safeParse(item);
    if (!parsed.success) {
      log.warn({ index, received: typeof item }, 'Skipping persona entry that is not an object');
      return;
    }
    personas.push(toPersona(parsed.data));
  });
  return personas;
};
