import { DEFAULT_PLACEHOLDER, MISSING_LABELS } from '../bib/config.js';
import type { BibEntry } from '../bib/types.js';
import type { MissingFieldLog } from '../report/missingFields.js';
import { stripLatexAccents } from './latexAccents.js';

export type ResolveOptions = {
  placeholder?: string;
  stripAccents?: boolean;
  stripHyphens?: boolean;
  missing?: MissingFieldLog;
};

const AUTHOR_SEPARATOR = /(?:^|\s+)and(?:\s+|$)/;

// A quoted value keeps its quotes in the matched contents; `\"` is an umlaut.
function unquote(value: string | undefined) {
  return (value ?? '')
    .trim()
    .replace(/^"|(?<!\\)"$/g, '')
    .trim();
}

export function splitAuthors(value: string): string[] {
  return value
    .split(AUTHOR_SEPARATOR)
    .map((fragment) => fragment.trim())
    .filter(Boolean);
}

/**
 * Last name of the last listed author, falling back to the editor.
 *
 * Handles both `First Last` and `Last, First` order. Only the final
 * whitespace-separated token of the surname is kept, so `van Kuiken` yields
 * `Kuiken`. Absent data yields the placeholder and a "Last Name" record.
 */
export function lastAuthorLastName(entry: BibEntry, options: ResolveOptions = {}): string {
  const placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;
  const missing = () => {
    options.missing?.record(MISSING_LABELS.lastName);
    return placeholder;
  };

  const names = unquote(entry.fields.author) || unquote(entry.fields.editor);
  if (!names) return missing();

  const lastAuthor = splitAuthors(names).pop();
  if (!lastAuthor) return missing();

  const comma = lastAuthor.indexOf(',');
  const span = comma >= 0 ? lastAuthor.slice(0, comma) : lastAuthor;

  let lastName = span.split(/\s+/).filter(Boolean).pop() ?? '';
  if (options.stripAccents ?? true) lastName = stripLatexAccents(lastName);
  if (options.stripHyphens) lastName = lastName.replace(/-/g, '');

  return lastName || missing();
}
