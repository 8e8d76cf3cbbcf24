import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';

import { CliError, USAGE, deriveOutputPath, parseCliArgs } from '../src/options.js';

function makeTempBib(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibtidy-options-'));
  const file = path.join(dir, 'refs.bib');
  fs.writeFileSync(file, '', 'utf8');
  return file;
}

test('deriveOutputPath inserts the mode before the extension', () => {
  assert.equal(deriveOutputPath('refs.bib', 'titlecase'), 'refs.titlecase.bib');
  assert.equal(deriveOutputPath('lib/my.refs.bib', 'citekey'), path.join('lib', 'my.refs.citekey.bib'));
  assert.equal(deriveOutputPath('refs', 'citekey'), 'refs.citekey');
});

test('parseCliArgs builds run options for a valid invocation', () => {
  const file = makeTempBib();
  assert.deepEqual(parseCliArgs(['citekey', file, '--dry-run']), {
    kind: 'run',
    options: {
      mode: 'citekey',
      inputFile: file,
      outputFile: path.join(path.dirname(file), 'refs.citekey.bib'),
      dryRun: true,
    },
  });
});

test('parseCliArgs shows usage with fewer than two arguments', () => {
  assert.throws(
    () => parseCliArgs(['titlecase']),
    (error: unknown) => error instanceof CliError && error.message === USAGE && error.exitCode === 1
  );
});

test('parseCliArgs rejects an unknown mode', () => {
  const file = makeTempBib();
  assert.throws(() => parseCliArgs(['shout', file]), {
    name: 'CliError',
    message: '  [ERROR] Invalid Mode\n          Allowed modes: titlecase, citekey, debug',
  });
});

test('parseCliArgs rejects a missing input file', () => {
  assert.throws(() => parseCliArgs(['debug', 'no/such/file.bib']), {
    name: 'CliError',
    message: "File 'no/such/file.bib' does not exist",
  });
});

test('parseCliArgs rejects unknown flags', () => {
  assert.throws(() => parseCliArgs(['debug', 'refs.bib', '--loud']), CliError);
});

test('parseCliArgs handles help and version flags', () => {
  assert.deepEqual(parseCliArgs(['--help']), { kind: 'help' });
  assert.deepEqual(parseCliArgs(['-v']), { kind: 'version' });
});
