// Entry types accepted after `@` on a header line.
export const ENTRY_TYPES = [
  'article',
  'book',
  'booklet',
  'conference',
  'inbook',
  'incollection',
  'inproceedings',
  'manual',
  'mastersthesis',
  'misc',
  'phdthesis',
  'proceedings',
  'techreport',
  'unpublished',
] as const;

export type EntryType = (typeof ENTRY_TYPES)[number];

/**
 * Field names recognized by the entry parser, in the order they are tried
 * against a line. The first match wins.
 */
export const FIELD_REGISTRY = [
  'author',
  'editor',
  'title',
  'booktitle',
  'journal',
  'volume',
  'number',
  'year',
  'month',
  'pages',
  'chapter',
  'edition',
  'series',
  'publisher',
  'address',
  'institution',
  'organization',
  'school',
  'howpublished',
  'type',
  'note',
  'annote',
  'crossref',
  'key',
  'doi',
  'url',
] as const;

export type FieldName = (typeof FIELD_REGISTRY)[number];

// Letters that form a LaTeX accent command when they directly follow `\`.
export const ACCENT_ESCAPE_LETTERS = 'Hbcdkrtuv`\'^"~=.';

// Control sequences that stand for a letter of their own (\o is ø, \l is ł).
export const LETTER_MACROS: Readonly<Record<string, string>> = {
  o: 'o',
  O: 'O',
  l: 'l',
  L: 'L',
  i: 'i',
  j: 'j',
  ss: 'ss',
  ae: 'ae',
  AE: 'AE',
  oe: 'oe',
  OE: 'OE',
  aa: 'a',
  AA: 'A',
};

export const SMALL_WORDS = [
  'a',
  'an',
  'and',
  'as',
  'at',
  'but',
  'by',
  'en',
  'for',
  'if',
  'in',
  'nor',
  'of',
  'on',
  'or',
  'per',
  'the',
  'to',
  'v',
  'v.',
  'via',
  'vs',
  'vs.',
] as const;

export const DEFAULT_PLACEHOLDER = 'MISSING';

export const MISSING_LABELS = {
  lastName: 'Last Name',
  year: 'Year',
  pages: 'Page Number',
} as const;
