import { ENTRY_TYPES, FIELD_REGISTRY, type EntryType, type FieldName } from './config.js';
import { classifyLine } from './fieldMatcher.js';
import { LineStream } from './lineStream.js';
import type { BibEntry, ParseResult } from './types.js';

export type EntryParserOptions = {
  entryTypes?: readonly EntryType[];
  registry?: readonly FieldName[];
};

export type EntryHeader = {
  entryType: EntryType;
  key: string;
  prefix: string;
  rest: string;
};

const headerPatternCache = new Map<string, RegExp>();

function getHeaderPattern(entryTypes: readonly EntryType[]) {
  const cacheKey = entryTypes.join('|');
  const cached = headerPatternCache.get(cacheKey);
  if (cached) return cached;
  const pattern = new RegExp(`^(\\s*@(${cacheKey})\\s*\\{\\s*)([^,\\s}]*)(.*)$`, 'i');
  headerPatternCache.set(cacheKey, pattern);
  return pattern;
}

export function matchEntryHeader(
  line: string,
  entryTypes: readonly EntryType[] = ENTRY_TYPES
): EntryHeader | null {
  const match = getHeaderPattern(entryTypes).exec(line);
  if (!match) return null;
  const type = (match[2] ?? '').toLowerCase();
  const entryType = entryTypes.find((candidate) => candidate === type);
  if (!entryType) return null;
  return {
    entryType,
    prefix: match[1] ?? '',
    key: match[3] ?? '',
    rest: match[4] ?? '',
  };
}

/** Blank line, or a line holding nothing but a closing brace. */
export function isEntryEnd(line: string) {
  return /^\s*\}?\s*$/.test(line);
}

/**
 * Consume one entry from the stream.
 *
 * Lines before the header are skipped only while they are blank or a lone
 * `}`; any other line ends the call with `found: false` so the caller can
 * move past it. A following entry header is left in the stream.
 */
export function parseEntry(stream: LineStream, options: EntryParserOptions = {}): ParseResult {
  const entryTypes = options.entryTypes ?? ENTRY_TYPES;
  const registry = options.registry ?? FIELD_REGISTRY;
  let entry: BibEntry | null = null;

  for (let line = stream.peek(); line; line = stream.peek()) {
    if (!entry) {
      stream.next();
      const header = matchEntryHeader(line.text, entryTypes);
      if (header) {
        entry = {
          entryType: header.entryType,
          key: header.key,
          headerLine: line.index,
          fields: {},
          spans: [],
        };
        continue;
      }
      if (isEntryEnd(line.text)) continue;
      return { found: false };
    }

    if (matchEntryHeader(line.text, entryTypes)) break;
    stream.next();

    const classified = classifyLine(line.text, registry);
    if (classified) {
      const { field, prefix, contents, suffix } = classified;
      entry.fields[field] = contents;
      entry.spans.push({ field, line: line.index, prefix, contents, suffix });
      continue;
    }
    if (isEntryEnd(line.text)) break;
  }

  return entry ? { found: true, entry } : { found: false };
}

export function parseEntries(text: string, options: EntryParserOptions = {}): BibEntry[] {
  const stream = LineStream.fromText(text);
  const entries: BibEntry[] = [];
  while (!stream.done) {
    const result = parseEntry(stream, options);
    if (result.found) entries.push(result.entry);
  }
  return entries;
}
