import assert from 'node:assert/strict';
import test from 'node:test';

import type { BibEntry } from '../src/bib/types.js';
import { stripLatexAccents } from '../src/citekey/latexAccents.js';
import { lastAuthorLastName, splitAuthors } from '../src/citekey/nameResolver.js';
import { MissingFieldLog } from '../src/report/missingFields.js';

function entryWith(fields: BibEntry['fields']): BibEntry {
  return { entryType: 'article', key: '', headerLine: 0, fields, spans: [] };
}

test('resolves the last author in "First Last" order', () => {
  assert.equal(lastAuthorLastName(entryWith({ author: 'Joseph W. May and X. Li' })), 'Li');
});

test('resolves the last author in "Last, First" order', () => {
  assert.equal(lastAuthorLastName(entryWith({ author: 'May, Joseph W. and Li, X.' })), 'Li');
});

test('drops name particles of the last author', () => {
  assert.equal(
    lastAuthorLastName(entryWith({ author: 'May, Joseph W. and van Kuiken, Benjamin E.' })),
    'Kuiken'
  );
});

test('falls back to the editor', () => {
  assert.equal(lastAuthorLastName(entryWith({ editor: 'Ann Smith and Bo Jones' })), 'Jones');
  assert.equal(lastAuthorLastName(entryWith({ author: '  ', editor: 'Ann Smith' })), 'Smith');
});

test('ignores a dangling separator from a cut multi-line value', () => {
  assert.equal(lastAuthorLastName(entryWith({ author: 'A. One and B. Two and' })), 'Two');
  assert.deepEqual(splitAuthors('and C. Three'), ['C. Three']);
});

test('does not split inside names that contain "and"', () => {
  assert.deepEqual(splitAuthors('Anderson, K. and Sandberg, L.'), ['Anderson, K.', 'Sandberg, L.']);
});

test('strips the quotes of a quoted author value', () => {
  assert.equal(lastAuthorLastName(entryWith({ author: '"Joseph W. May and X. Li"' })), 'Li');
  assert.equal(lastAuthorLastName(entryWith({ author: '"May, J. and {van Kuiken}"' })), 'Kuiken');
  assert.equal(lastAuthorLastName(entryWith({ editor: '"Kurt G\\"{o}del"' })), 'Godel');
});

test('a quoted value with no names is missing', () => {
  const missing = new MissingFieldLog();
  assert.equal(lastAuthorLastName(entryWith({ author: '""' }), { missing }), 'MISSING');
  assert.deepEqual(missing.report(), [['Last Name', 1]]);
});

test('strips LaTeX accents and braces by default', () => {
  assert.equal(lastAuthorLastName(entryWith({ author: 'Igor \\v{Z}uti\\\'{c}' })), 'Zutic');
  assert.equal(lastAuthorLastName(entryWith({ author: '{\\O}ksendal, Bernt' })), 'Oksendal');
});

test('keeps accents when stripping is turned off', () => {
  assert.equal(
    lastAuthorLastName(entryWith({ author: 'Igor \\v{Z}utic' }), { stripAccents: false }),
    '\\v{Z}utic'
  );
});

test('strips hyphens only when asked', () => {
  const entry = entryWith({ author: 'Jean Dupont-Martin' });
  assert.equal(lastAuthorLastName(entry), 'Dupont-Martin');
  assert.equal(lastAuthorLastName(entry, { stripHyphens: true }), 'DupontMartin');
});

test('missing author and editor yields the placeholder and a log record', () => {
  const missing = new MissingFieldLog();
  assert.equal(lastAuthorLastName(entryWith({}), { missing }), 'MISSING');
  assert.equal(lastAuthorLastName(entryWith({ author: ' and ' }), { missing, placeholder: 'NONE' }), 'NONE');
  assert.deepEqual(missing.report(), [['Last Name', 2]]);
});

test('stripLatexAccents folds the known escapes', () => {
  assert.equal(stripLatexAccents('G\\"{o}del'), 'Godel');
  assert.equal(stripLatexAccents('{\\\'E}cole'), 'Ecole');
  assert.equal(stripLatexAccents('Erd\\H{o}s'), 'Erdos');
  assert.equal(stripLatexAccents('\\l{}ukasiewicz'), 'lukasiewicz');
  assert.equal(stripLatexAccents('Fran\\c{c}ois'), 'Francois');
  assert.equal(stripLatexAccents('Plain'), 'Plain');
});

test('stripLatexAccents only expands its own letter macros', () => {
  assert.equal(stripLatexAccents('\\hasOwnProperty'), '\\hasOwnProperty');
  assert.equal(stripLatexAccents('\\constructor'), 'onstructor');
});
