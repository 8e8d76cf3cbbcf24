import { diffLines } from 'diff';

/** Line diff of a conversion, `-`/`+` prefixed, unchanged lines omitted. */
export function formatPreview(before: string, after: string): string[] {
  const lines: string[] = [];
  for (const part of diffLines(before, after)) {
    if (!part.added && !part.removed) continue;
    const marker = part.added ? '+' : '-';
    const body = part.value.endsWith('\n') ? part.value.slice(0, -1) : part.value;
    for (const line of body.split('\n')) {
      lines.push(`${marker} ${line.replace(/\r$/, '')}`);
    }
  }
  return lines;
}
