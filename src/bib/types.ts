import type { EntryType, FieldName } from './config.js';

export type FieldPart = 'prefix' | 'contents' | 'suffix';

export type FieldParts = Record<FieldPart, string>;

export type FieldSpan = FieldParts & {
  field: FieldName;
  line: number;
};

export type BibEntry = {
  entryType: EntryType;
  key: string;
  headerLine: number;
  fields: Partial<Record<FieldName, string>>;
  spans: FieldSpan[];
};

export type ParseResult =
  | { found: true; entry: BibEntry }
  | { found: false };
