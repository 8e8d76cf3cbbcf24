import { DEFAULT_PLACEHOLDER, MISSING_LABELS } from '../bib/config.js';
import type { BibEntry } from '../bib/types.js';
import { lastAuthorLastName, type ResolveOptions } from './nameResolver.js';

export type CiteKeyParts = {
  lastName: string;
  year: string;
  suffix: string;
};

export function twoDigitYear(entry: BibEntry, options: ResolveOptions = {}): string {
  const year = (entry.fields.year ?? '').replace(/[{}"\s]/g, '');
  if (!year) {
    options.missing?.record(MISSING_LABELS.year);
    return options.placeholder ?? DEFAULT_PLACEHOLDER;
  }
  return year.slice(-2);
}

export function firstPage(entry: BibEntry, options: ResolveOptions = {}): string {
  const page = (entry.fields.pages ?? '').split('-')[0]?.replace(/[{}"]/g, '').trim();
  if (!page) {
    options.missing?.record(MISSING_LABELS.pages);
    return options.placeholder ?? DEFAULT_PLACEHOLDER;
  }
  return page;
}

export function citeKeySuffix(entry: BibEntry, options: ResolveOptions = {}): string {
  switch (entry.entryType) {
    case 'article':
      return firstPage(entry, options);
    case 'phdthesis':
    case 'mastersthesis':
      return 'thesis';
    default:
      return entry.entryType;
  }
}

/** Each lookup runs once, so a missing field is counted once per entry. */
export function citeKeyParts(entry: BibEntry, options: ResolveOptions = {}): CiteKeyParts {
  return {
    lastName: lastAuthorLastName(entry, options),
    year: twoDigitYear(entry, options),
    suffix: citeKeySuffix(entry, options),
  };
}

export function formatCiteKey(parts: CiteKeyParts) {
  return `${parts.lastName}${parts.year}_${parts.suffix}`;
}

export function makeCiteKey(entry: BibEntry, options: ResolveOptions = {}): string {
  return formatCiteKey(citeKeyParts(entry, options));
}
