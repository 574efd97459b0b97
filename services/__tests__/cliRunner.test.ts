import { copyFile, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EXPORT_COLUMNS } from "../../types";
import { USAGE, defaultOutputPath, runCli } from "../cliRunner";
import type { CliDependencies } from "../cliRunner";
import type { GenerateContentRequest } from "../geminiService";

const FIXTURE = fileURLToPath(new URL('../../fixtures/sample-questionnaire.csv', import.meta.url));

const TWO_PERSONAS = JSON.stringify({
  personas: [
    { persona_name: 'Trail Tess', persona_type: 'Primary', goals: ['Plan a week in the hills'] },
    { goals: ['Carry less'] },
  ],
});

const harness = (reply: string | Error, env: NodeJS.ProcessEnv = { GEMINI_API_KEY: 'test-secret' }) => {
  const out: string[] = [];
  const err: string[] = [];
  const generateContent = vi.fn(async (_request: GenerateContentRequest) => {
    if (reply instanceof Error) throw reply;
    return { text: reply };
  });
  const createClient = vi.fn((_apiKey: string | undefined) => ({ models: { generateContent } }));
  const deps: CliDependencies = {
    env,
    createClient,
    sleep: async () => undefined,
    now: () => new Date(2026, 2, 2, 9, 5, 7),
    print: line => out.push(line),
    printError: line => err.push(line),
  };
  return { deps, out, err, createClient, generateContent };
};

describe('defaultOutputPath', () => {
  it('names the file after the input and a local timestamp', () => {
    expect(defaultOutputPath('/data/survey.csv', new Date(2026, 2, 2, 9, 5, 7))).toBe(
      '/data/personas_survey_20260302_090507.csv'
    );
  });
});

describe('runCli', () => {
  let dir: string;
  let input: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'persona-cli-'));
    input = join(dir, 'discovery.csv');
    await copyFile(FIXTURE, input);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prints usage for --help', async () => {
    const { deps, out } = harness(TWO_PERSONAS);
    expect(await runCli(['--help'], deps)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('fails without an input path', async () => {
    const { deps, err } = harness(TWO_PERSONAS);
    expect(await runCli([], deps)).toBe(1);
    expect(err).toEqual(['Error: missing input CSV path', USAGE]);
  });

  it('rejects unknown options', async () => {
    const { deps, err } = harness(TWO_PERSONAS);
    expect(await runCli([input, '--bogus'], deps)).toBe(1);
    expect(err[0]).toMatch(/^Error: Unknown option '--bogus'/);
  });

  it('fails when the input file does not exist', async () => {
    const { deps, err } = harness(TWO_PERSONAS);
    const missing = join(dir, 'missing.csv');
    expect(await runCli([missing], deps)).toBe(1);
    expect(err).toEqual([`Error: Input file not found: ${missing}`]);
  });

  it('lists the detected columns without calling the model', async () => {
    const { deps, out, createClient } = harness(TWO_PERSONAS);
    expect(await runCli([input, '--list-columns'], deps)).toBe(0);
    expect(out).toEqual(['Section\nQuestion\nAnswer']);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('generates personas and exports them beside the input', async () => {
    const { deps, out, err, createClient } = harness(TWO_PERSONAS);
    const output = join(dir, 'personas_discovery_20260302_090507.csv');

    expect(await runCli([input], deps)).toBe(0);

    expect(err).toEqual([]);
    expect(out).toEqual([
      `Parsing questionnaire: ${input}`,
      'Found 5 Q&A pairs',
      'Found 3 persona-related Q&A pairs',
      'Generating personas using gemini-2.5-flash...',
      'Generated 2 persona(s):',
      '  1. Trail Tess (Primary)',
      '  2. Persona 2',
      `Exported 2 persona(s) to ${output}`,
    ]);
    expect(createClient).toHaveBeenCalledWith('test-secret');

    const lines = (await readFile(output, 'utf-8')).split('\r\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(EXPORT_COLUMNS.join(','));
    expect(lines[1].startsWith('Northwind Outfitters,Trailhead Planner,Trail Tess,Primary,')).toBe(true);
  });

  it('lets flags override the environment', async () => {
    const { deps, out, createClient, generateContent } = harness(TWO_PERSONAS);
    const output = join(dir, 'out.csv');

    const code = await runCli(
      [input, '-o', output, '--api-key', 'test-secret-flag', '--model', 'gemini-2.5-pro'],
      deps
    );

    expect(code).toBe(0);
    expect(createClient).toHaveBeenCalledWith('test-secret-flag');
    expect(generateContent.mock.calls[0][0].model).toBe('gemini-2.5-pro');
    expect(out.at(-1)).toBe(`Exported 2 persona(s) to ${output}`);
    expect((await stat(output)).isFile()).toBe(true);
  });

  it('reads custom column names', async () => {
    const custom = join(dir, 'custom.csv');
    await writeFile(custom, 'Client Name,Acme\nTopic,Prompt,Reply\nAudience,Who?,Parents\nPricing,Cost?,Low\n');
    const { deps, out } = harness(TWO_PERSONAS);

    const code = await runCli(
      [custom, '-o', join(dir, 'out.csv'), '--section-column', 'Topic', '--question-column', 'Prompt', '--answer-column', 'Reply'],
      deps
    );

    expect(code).toBe(0);
    expect(out.slice(1, 3)).toEqual(['Found 2 Q&A pairs', 'Found 1 persona-related Q&A pairs']);
  });

  it('fails when the model returns no personas', async () => {
    const { deps, err } = harness('{"personas": []}');
    const output = join(dir, 'out.csv');

    expect(await runCli([input, '-o', output], deps)).toBe(1);
    expect(err).toEqual([
      'Error: Failed to generate personas. The API returned an empty response. ' +
        'Check that your Gemini API key is valid and that you have quota left, then try again.',
    ]);
    await expect(stat(output)).rejects.toThrow();
  });

  it('reports a failed generation', async () => {
    const { deps, err } = harness(new Error('API key not valid'));
    expect(await runCli([input, '-o', join(dir, 'out.csv')], deps)).toBe(1);
    expect(err).toEqual([
      'Error: Authentication Error: check the Gemini API key (--api-key or GEMINI_API_KEY).',
    ]);
  });

  it('reports a missing API key as an authentication error', async () => {
    const { deps, err } = harness(TWO_PERSONAS, {});
    const { createClient: _unused, ...withoutClient } = deps;

    expect(await runCli([input, '-o', join(dir, 'out.csv')], withoutClient)).toBe(1);
    expect(err).toEqual([
      'Error: Authentication Error: check the Gemini API key (--api-key or GEMINI_API_KEY).',
    ]);
  });

  it('reports a questionnaire without question and answer columns', async () => {
    const bad = join(dir, 'bad.csv');
    await writeFile(bad, 'Foo,Bar\n1,2\n');
    const { deps, err, createClient } = harness(TWO_PERSONAS);

    expect(await runCli([bad], deps)).toBe(1);
    expect(err).toEqual([
      'Error parsing questionnaire: Could not find a CSV header row with Section/Question/Answer columns: ' +
        '"Question", "Answer" not found in the first line. Available columns: Foo, Bar',
    ]);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('rejects an invalid --max-attempts value', async () => {
    const { deps, err } = harness(TWO_PERSONAS);
    expect(await runCli([input, '--max-attempts', '0'], deps)).toBe(1);
    expect(err).toEqual(['Error: --max-attempts must be a positive integer, got "0"']);
  });

  it('reports invalid configuration', async () => {
    const { deps, err } = harness(TWO_PERSONAS, { GEMINI_MAX_ATTEMPTS: 'many' });
    expect(await runCli([input], deps)).toBe(1);
    expect(err[0]).toMatch(/^Configuration error: Invalid configuration: GEMINI_MAX_ATTEMPTS: /);
  });
});
