import fs from 'node:fs';

import { parseEntries } from './bib/entryParser.js';
import { CliError, USAGE, VERSION, parseCliArgs, type CliOptions } from './options.js';
import { formatPreview } from './preview.js';
import { MissingFieldLog, formatMissingReport } from './report/missingFields.js';
import { loadSettings, type Settings } from './settings.js';
import { convertTitles } from './workflows/convertTitles.js';
import { generateCiteKeys } from './workflows/generateCiteKeys.js';
import { listEntries } from './workflows/listEntries.js';

export type CliIO = {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
};

const consoleIO: CliIO = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export type RunCliDeps = {
  io?: CliIO;
  settings?: Settings;
};

function writeOutput(options: CliOptions, input: string, output: string, io: CliIO) {
  if (options.dryRun) {
    const preview = formatPreview(input, output);
    if (preview.length === 0) io.log('  No changes');
    for (const line of preview) io.log(line);
    return;
  }
  fs.writeFileSync(options.outputFile, output, 'utf8');
}

function runTitlecase(options: CliOptions, settings: Settings, io: CliIO) {
  io.log(`  Input file: ${options.inputFile}`);
  io.log(`  Output file: ${options.outputFile}`);
  io.log('  Converting all title attributes to titlecase');
  const input = fs.readFileSync(options.inputFile, 'utf8');
  const { output, updated } = convertTitles(input, settings);
  writeOutput(options, input, output, io);
  io.log(`  Updated ${updated} title fields`);
}

function runCitekey(options: CliOptions, settings: Settings, io: CliIO) {
  io.log(`  Input file: ${options.inputFile}`);
  io.log(`  Output file: ${options.outputFile}`);
  io.log('  Generating cite keys for all entries');
  const input = fs.readFileSync(options.inputFile, 'utf8');
  const missing = new MissingFieldLog();
  const { output, assignments, duplicates } = generateCiteKeys(input, settings, missing);
  writeOutput(options, input, output, io);
  io.log(`  Generated ${assignments.length} citekeys`);
  for (const key of duplicates) {
    io.warn(`[bibtidy] Duplicate citekey: ${key}`);
  }
  for (const line of formatMissingReport(missing)) io.log(line);
}

function runDebug(options: CliOptions, settings: Settings, io: CliIO) {
  const input = fs.readFileSync(options.inputFile, 'utf8');
  for (const line of listEntries(parseEntries(input), settings)) io.log(line);
}

/** Run the command line and return the process exit code. */
export function runCli(argv: readonly string[], deps: RunCliDeps = {}): number {
  const io = deps.io ?? consoleIO;
  try {
    const request = parseCliArgs(argv);
    if (request.kind === 'help') {
      io.log(USAGE);
      return 0;
    }
    if (request.kind === 'version') {
      io.log(VERSION);
      return 0;
    }

    const settings = deps.settings ?? loadSettings();
    const { options } = request;
    if (options.mode === 'titlecase') runTitlecase(options, settings, io);
    else if (options.mode === 'citekey') runCitekey(options, settings, io);
    else runDebug(options, settings, io);
    return 0;
  } catch (error) {
    if (error instanceof CliError) {
      io.error(error.message);
      return error.exitCode;
    }
    throw error;
  }
}
