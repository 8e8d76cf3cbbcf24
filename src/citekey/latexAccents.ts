import { ACCENT_ESCAPE_LETTERS, LETTER_MACROS } from '../bib/config.js';

function escapeClass(letters: string) {
  return letters.replace(/[\]\\^-]/g, '\\$&');
}

const ACCENT_ESCAPE = new RegExp(`\\\\[${escapeClass(ACCENT_ESCAPE_LETTERS)}]`, 'g');
const LETTER_MACRO = /\\([A-Za-z]+)(?![A-Za-z])\s*/g;

/**
 * Reduce LaTeX-escaped text to bare letters: `\v{Z}utic` becomes `Zutic`,
 * `{\o}ksendal` becomes `oksendal`.
 */
export function stripLatexAccents(text: string): string {
  return text
    .replace(LETTER_MACRO, (match, name: string) =>
      Object.hasOwn(LETTER_MACROS, name) ? LETTER_MACROS[name] : match)
    .replace(/[{}]/g, '')
    .replace(ACCENT_ESCAPE, '');
}
