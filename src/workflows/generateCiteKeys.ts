import { matchEntryHeader, parseEntries } from '../bib/entryParser.js';
import { LineStream } from '../bib/lineStream.js';
import type { BibEntry } from '../bib/types.js';
import { makeCiteKey } from '../citekey/citeKey.js';
import type { MissingFieldLog } from '../report/missingFields.js';
import type { Settings } from '../settings.js';

export type CiteKeyAssignment = {
  entry: BibEntry;
  previousKey: string;
  key: string;
};

export type CiteKeyGeneration = {
  output: string;
  assignments: CiteKeyAssignment[];
  duplicates: string[];
};

export function findDuplicateKeys(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) duplicates.add(key);
    seen.add(key);
  }
  return Array.from(duplicates);
}

/**
 * Rewrite the key on the header line of every recognized entry. All other
 * bytes of the file are left as they are.
 */
export function generateCiteKeys(
  text: string,
  settings: Pick<Settings, 'placeholder' | 'stripAccents' | 'stripHyphens'>,
  missing?: MissingFieldLog
): CiteKeyGeneration {
  const assignments = parseEntries(text).map((entry) => ({
    entry,
    previousKey: entry.key,
    key: makeCiteKey(entry, { ...settings, missing }),
  }));
  const byHeaderLine = new Map(
    assignments.map((assignment) => [assignment.entry.headerLine, assignment] as const)
  );

  const output = LineStream.fromText(text)
    .all()
    .map((line) => {
      const assignment = byHeaderLine.get(line.index);
      const header = assignment ? matchEntryHeader(line.text) : null;
      if (!assignment || !header) return line.text + line.eol;
      return `${header.prefix}${assignment.key}${header.rest}${line.eol}`;
    })
    .join('');

  return {
    output,
    assignments,
    duplicates: findDuplicateKeys(assignments.map((assignment) => assignment.key)),
  };
}
