import { FIELD_REGISTRY, type FieldName } from './config.js';
import type { FieldPart, FieldParts } from './types.js';

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern for `name = {value},`. The opening and closing braces and the comma
 * are all optional, so `year = 2013,` and a last field without a comma match
 * as well.
 */
export function getFieldPattern(fieldName: string): RegExp {
  const cached = patternCache.get(fieldName);
  if (cached) return cached;
  const pattern = new RegExp(
    `^(\\s*${escapeRegExp(fieldName)}\\s*=\\s*\\{?)(.+?)(\\}?,?\\s*)$`,
    'i'
  );
  patternCache.set(fieldName, pattern);
  return pattern;
}

export function matchField(fieldName: string, line: string): FieldParts | null {
  const match = getFieldPattern(fieldName).exec(line);
  if (!match) return null;
  return {
    prefix: match[1] ?? '',
    contents: match[2] ?? '',
    suffix: match[3] ?? '',
  };
}

export function isField(fieldName: string, line: string): boolean {
  return getFieldPattern(fieldName).test(line);
}

export function getFieldPart(fieldName: string, part: FieldPart, line: string): string | null {
  const parts = matchField(fieldName, line);
  return parts ? parts[part] : null;
}

export type ClassifiedLine = FieldParts & { field: FieldName };

export function classifyLine(
  line: string,
  registry: readonly FieldName[] = FIELD_REGISTRY
): ClassifiedLine | null {
  for (const field of registry) {
    const parts = matchField(field, line);
    if (parts) return { field, ...parts };
  }
  return null;
}
