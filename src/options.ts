import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';

export const VERSION = '0.3.0';

export const MODES = ['titlecase', 'citekey', 'debug'] as const;

export type Mode = (typeof MODES)[number];

const modeSchema = z.enum(MODES);

export type CliOptions = {
  mode: Mode;
  inputFile: string;
  outputFile: string;
  dryRun: boolean;
};

export type CliRequest =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'version' };

export class CliError extends Error {
  constructor(
    message: string,
    readonly exitCode = 1
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const USAGE = [
  `  bibtidy version ${VERSION}`,
  '  Conversions and cite key generation for BibTeX files.',
  '',
  '  Usage: bibtidy <mode> <input-file> [--dry-run]',
  '',
  '    <mode>     Description',
  '    titlecase  Convert all titles to titlecase',
  '    citekey    Generate cite keys for all entries',
  '               according to the following scheme:',
  "               <Last Author's Last Name><2-Digit Year>_<Page Number OR Entry Type>",
  '    debug      List every parsed entry and its cite key parts',
  '',
  '    <input-file> is a BibTeX .bib file that will not be overwritten',
  '    --dry-run    Print the changes instead of writing the output file',
].join('\n');

/** `refs.bib` becomes `refs.titlecase.bib`; a name without extension gets the mode appended. */
export function deriveOutputPath(inputFile: string, mode: Mode): string {
  const { dir, name, ext } = path.parse(inputFile);
  const base = ext ? `${name}.${mode}${ext}` : `${name}.${mode}`;
  return dir ? path.join(dir, base) : base;
}

export function parseCliArgs(argv: readonly string[]): CliRequest {
  let parsed: ReturnType<typeof parseCliTokens>;
  try {
    parsed = parseCliTokens(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`  [ERROR] ${message}\n\n${USAGE}`);
  }

  if (parsed.values.help) return { kind: 'help' };
  if (parsed.values.version) return { kind: 'version' };

  const [rawMode, inputFile] = parsed.positionals;
  if (rawMode === undefined || inputFile === undefined) {
    throw new CliError(USAGE);
  }

  const mode = modeSchema.safeParse(rawMode);
  if (!mode.success) {
    throw new CliError(`  [ERROR] Invalid Mode\n          Allowed modes: ${MODES.join(', ')}`);
  }

  if (!fs.existsSync(inputFile)) {
    throw new CliError(`File '${inputFile}' does not exist`);
  }

  return {
    kind: 'run',
    options: {
      mode: mode.data,
      inputFile,
      outputFile: deriveOutputPath(inputFile, mode.data),
      dryRun: parsed.values['dry-run'] ?? false,
    },
  };
}

function parseCliTokens(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      'dry-run': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });
}
