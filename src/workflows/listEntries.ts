import { FIELD_REGISTRY } from '../bib/config.js';
import type { BibEntry } from '../bib/types.js';
import { citeKeyParts, formatCiteKey } from '../citekey/citeKey.js';
import type { ResolveOptions } from '../citekey/nameResolver.js';

function row(label: string, value: string) {
  return `${`${label}:`.padEnd(14)}${value}`;
}

/** Debug listing: every parsed field of every entry plus the citekey parts. */
export function listEntries(entries: readonly BibEntry[], options: ResolveOptions = {}): string[] {
  const lines = [`TOTAL NUMBER OF ENTRIES: ${entries.length}`];
  entries.forEach((entry, index) => {
    lines.push(
      `<<<>>> ENTRY ${index + 1} <<<>>>`,
      row('TYPE', entry.entryType),
      row('KEY', entry.key || '(none)')
    );
    for (const field of FIELD_REGISTRY) {
      const value = entry.fields[field];
      if (value !== undefined) lines.push(row(field.toUpperCase(), value));
    }
    const parts = citeKeyParts(entry, options);
    lines.push(
      row('LAST NAME', parts.lastName),
      row('2D-YEAR', parts.year),
      row('SUFFIX', parts.suffix),
      row('CITEKEY', formatCiteKey(parts)),
      ''
    );
  });
  return lines;
}
