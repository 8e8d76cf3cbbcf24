import { parseEntries } from '../bib/entryParser.js';
import { LineStream } from '../bib/lineStream.js';
import type { FieldSpan } from '../bib/types.js';
import type { Settings } from '../settings.js';
import { titleCase } from '../titlecase/titleCase.js';

export type TitleConversion = {
  output: string;
  updated: number;
};

export function convertTitles(
  text: string,
  settings: Pick<Settings, 'titleFields' | 'smallWords'>
): TitleConversion {
  const titleFields = new Set<string>(settings.titleFields);
  const spans = new Map<number, FieldSpan>();
  for (const entry of parseEntries(text)) {
    for (const span of entry.spans) {
      if (titleFields.has(span.field)) spans.set(span.line, span);
    }
  }

  let updated = 0;
  const output = LineStream.fromText(text)
    .all()
    .map((line) => {
      const span = spans.get(line.index);
      if (!span) return line.text + line.eol;
      updated += 1;
      const contents = titleCase(span.contents, { smallWords: settings.smallWords });
      return `${span.prefix}${contents}${span.suffix}${line.eol}`;
    })
    .join('');

  return { output, updated };
}
