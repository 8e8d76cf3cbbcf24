import { SMALL_WORDS } from '../bib/config.js';

export type TitleCaseOptions = {
  smallWords?: readonly string[];
};

type Word = {
  token: number;
  text: string;
  protectedText: boolean;
};

const WORD_PARTS = /^([^\p{L}\p{N}]*)(.*?)([^\p{L}\p{N}]*)$/u;
const INNER_CAPITAL = /.\p{Lu}/u;
const UNIT_END = /:[)\]"'’”]*$/;

function hasInnerCapital(core: string) {
  return INNER_CAPITAL.test(core);
}

function capitalize(core: string) {
  if (!core) return core;
  return core.charAt(0).toUpperCase() + core.slice(1);
}

function splitWords(tokens: string[]): Word[] {
  const words: Word[] = [];
  let depth = 0;
  tokens.forEach((text, token) => {
    if (!text || /^\s+$/.test(text)) return;
    const protectedText = depth > 0 || /[{}\\$]/.test(text);
    for (const char of text) {
      if (char === '{') depth += 1;
      else if (char === '}') depth = Math.max(0, depth - 1);
    }
    words.push({ token, text, protectedText });
  });
  return words;
}

function caseWord(word: Word, force: boolean, smallWords: ReadonlySet<string>) {
  if (word.protectedText) return word.text;
  const match = WORD_PARTS.exec(word.text);
  if (!match) return word.text;
  const [, lead = '', core = '', trail = ''] = match;

  if (!core || /[./@]/.test(core) || hasInnerCapital(core)) return word.text;

  let cased: string;
  if (core.includes('-')) {
    cased = core.split('-').map(capitalize).join('-');
  } else if (!force && smallWords.has(core.toLowerCase())) {
    cased = core.toLowerCase();
  } else {
    cased = capitalize(core);
  }
  return `${lead}${cased}${trail}`;
}

/**
 * Title-case a string. The first and last word, and the words on either side
 * of a colon, are always capitalized; small words are lowercased elsewhere.
 * Words with inner capitals, brace-protected text, LaTeX commands and
 * dotted words (URLs, abbreviations) are left as they are. Whitespace is
 * kept unchanged.
 */
export function titleCase(text: string, options: TitleCaseOptions = {}): string {
  const smallWords = new Set(
    [...SMALL_WORDS, ...(options.smallWords ?? [])].map((word) => word.toLowerCase())
  );
  const tokens = text.split(/(\s+)/);
  const words = splitWords(tokens);

  words.forEach((word, index) => {
    const previous = words[index - 1];
    const startsUnit = !previous || UNIT_END.test(previous.text);
    const endsUnit = index === words.length - 1 || UNIT_END.test(word.text);
    tokens[word.token] = caseWord(word, startsUnit || endsUnit, smallWords);
  });

  return tokens.join('');
}
