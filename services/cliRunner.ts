import { readFile, stat } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import type { ColumnSelection, Persona } from "../types";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { InputFormatError, describeGenerationFailure, errorMessage } from "./errors";
import { createGeminiClient, generatePersonas } from "./geminiService";
import type { GenerationClient } from "./geminiService";
import { createLogger } from "./logger";
import { exportPersonasToFile } from "./personaExporter";
import { listQuestionnaireColumns, parseQuestionnaireFile } from "./questionnaireParser";

const log = createLogger('cli');

export const USAGE = `Usage: persona-generator <input.csv> [options]

Generate user personas from a questionnaire CSV using Gemini.

Options:
  -o, --output <path>         Output CSV path (default: personas_<input>_<timestamp>.csv next to the input)
      --api-key <key>         Gemini API key (or set GEMINI_API_KEY)
      --model <id>            Gemini model (default: GEMINI_MODEL or gemini-2.5-flash)
      --max-attempts <n>      Attempts for the model call (default: GEMINI_MAX_ATTEMPTS or 3)
      --section-column <name> Column holding the section label (default: Section)
      --question-column <name>
                              Column holding the questions (default: Question)
      --answer-column <name>  Column holding the answers (default: Answer)
      --list-columns          Print the detected columns and exit
  -h, --help                  Show this help`;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createClient?: (apiKey: string | undefined) => GenerationClient;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `personas_<stem>_<YYYYMMDD_HHMMSS>.csv` in the input file's directory. */
export const defaultOutputPath = (inputPath: string, now: Date): string => {
  const stem = basename(inputPath, extname(inputPath));
  const timestamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return join(dirname(inputPath), `personas_${stem}_${timestamp}.csv`);
};

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      'api-key': { type: 'string' },
      model: { type: 'string' },
      'max-attempts': { type: 'string' },
      'section-column': { type: 'string' },
      'question-column': { type: 'string' },
      'answer-column': { type: 'string' },
      'list-columns': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

const MaxAttemptsSchema = z.coerce.number().int().positive();

const isFile = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    log.debug({ path, error: errorMessage(error) }, 'Input path is not readable');
    return false;
  }
};

const describePersona = (persona: Persona, index: number): string => {
  const name = persona.name || `Persona ${index + 1}`;
  return persona.type ? `  ${index + 1}. ${name} (${persona.type})` : `  ${index + 1}. ${name}`;
};

/**
 * Runs the command line tool and resolves with its exit code: 0 on success,
 * 1 on bad arguments, unreadable input or a failed generation.
 */
export const runCli = async (argv: string[], deps: CliDependencies = {}): Promise<number> => {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    printError(`Error: ${errorMessage(error)}`);
    printError(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    print(USAGE);
    return 0;
  }

  const [inputPath] = positionals;
  if (!inputPath) {
    printError('Error: missing input CSV path');
    printError(USAGE);
    return 1;
  }
  if (!(await isFile(inputPath))) {
    printError(`Error: Input file not found: ${inputPath}`);
    return 1;
  }

  const columns: ColumnSelection = {
    section: values['section-column'],
    question: values['question-column'],
    answer: values['answer-column'],
  };

  if (values['list-columns']) {
    const detected = listQuestionnaireColumns(await readFile(inputPath, 'utf-8'), columns);
    print(detected.length > 0 ? detected.join('\n') : '(no columns found)');
    return 0;
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    printError(`Configuration error: ${errorMessage(error)}`);
    return 1;
  }

  try {
    let maxAttempts = config.maxAttempts;
    if (values['max-attempts'] !== undefined) {
      const attempts = MaxAttemptsSchema.safeParse(values['max-attempts']);
      if (!attempts.success) {
        printError(`Error: --max-attempts must be a positive integer, got "${values['max-attempts']}"`);
        return 1;
      }
      maxAttempts = attempts.data;
    }

    const outputPath = values.output ?? defaultOutputPath(inputPath, (deps.now ?? (() => new Date()))());

    print(`Parsing questionnaire: ${inputPath}`);
    const dataset = await parseQuestionnaireFile(inputPath, columns);
    print(`Found ${dataset.allQa.length} Q&A pairs`);
    print(`Found ${dataset.personaQa.length} persona-related Q&A pairs`);

    const model = values.model?.trim() || config.modelName;
    print(`Generating personas using ${model}...`);

    const createClient = deps.createClient ?? createGeminiClient;
    const personas = await generatePersonas(dataset, {
      client: createClient(values['api-key'] ?? config.apiKey),
      model,
      maxAttempts,
      sleep: deps.sleep,
    });

    if (personas.length === 0) {
      printError(`Error: ${describeGenerationFailure(null).message}`);
      return 1;
    }

    print(`Generated ${personas.length} persona(s):`);
    personas.forEach((persona, index) => print(describePersona(persona, index)));

    await exportPersonasToFile(personas, dataset.clientInfo, outputPath);
    print(`Exported ${personas.length} persona(s) to ${outputPath}`);
    return 0;
  } catch (error) {
    if (error instanceof InputFormatError) {
      printError(`Error parsing questionnaire: ${error.message}`);
    } else {
      printError(`Error: ${describeGenerationFailure(error).message}`);
    }
    log.debug({ error: errorMessage(error) }, 'Command failed');
    return 1;
  }
};
