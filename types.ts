export type ClientInfo = Readonly<Record<string, string>>;

export interface QARecord {
  section: string;
  question: string;
  answer: string;
}

export interface QuestionnaireDataset {
  clientInfo: ClientInfo;
  allQa: QARecord[];
  personaQa: QARecord[]; // Subset of allQa, filtered by section keyword
  columns: string[];
  headerRowIndex: number | null; // null when no header row was detected
}

export interface ColumnSelection {
  section?: string;
  question?: string;
  answer?: string;
}

/**
 * Persona fields that should be lists but sometimes come back from the model
 * as a single string.
 */
export type ListOrScalar =
  | { kind: 'list'; items: string[] }
  | { kind: 'scalar'; value: string };

export interface Demographics {
  ageRange?: string;
  gender?: string;
  location?: string;
  incomeLevel?: string;
  netWorth?: string;
  education?: string;
  occupation?: string;
  familyStatus?: string;
}

export interface Psychographics {
  values?: ListOrScalar;
  motivations?: ListOrScalar;
  lifestyle?: string;
  interests?: ListOrScalar;
}

export interface Behavior {
  researchStyle?: string;
  decisionMaking?: string;
  communicationPreferences?: string;
  onlineBehavior?: string;
}

export interface Persona {
  readonly name?: string;
  readonly type?: string; // Primary / Secondary / Tertiary
  readonly demographics: Readonly<Demographics>;
  readonly psychographics: Readonly<Psychographics>;
  readonly goals?: ListOrScalar;
  readonly challenges?: ListOrScalar;
  readonly needs?: ListOrScalar;
  readonly painPoints?: ListOrScalar;
  readonly behavior: Readonly<Behavior>;
  readonly quote?: string;
  readonly keyCharacteristics?: ListOrScalar;
}

export const EXPORT_COLUMNS = [
  'Client Name',
  'Product Name',
  'Persona Name',
  'Persona Type',
  'Age Range',
  'Gender',
  'Location',
  'Income Level',
  'Net Worth',
  'Education',
  'Occupation',
  'Family Status',
  'Values',
  'Motivations',
  'Lifestyle',
  'Interests',
  'Goals',
  'Challenges',
  'Needs',
  'Pain Points',
  'Research Style',
  'Decision Making',
  'Communication Preferences',
  'Online Behavior',
  'Quote',
  'Key Characteristics',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string>;
