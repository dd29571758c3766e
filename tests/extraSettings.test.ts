import { test } from 'node:test';
import assert from 'node:assert/strict';

import { TemplateEditor } from '../src/configgen/edits.ts';
import { findHeaderLine, insertExtraSetting, parseExtraSetting } from '../src/configgen/extraSettings.ts';

test('parseExtraSetting splits section, key and value', () => {
  assert.deepEqual(parseExtraSetting('default:CC = gcc -O2'), { section: 'default', key: 'CC', value: 'gcc -O2' });
  assert.deepEqual(parseExtraSetting('fprate=peak:OPTIMIZE=-O3 -flto=auto'), {
    section: 'fprate=peak',
    key: 'OPTIMIZE',
    value: '-O3 -flto=auto',
  });
  assert.deepEqual(parseExtraSetting('default:EXTRA='), { section: 'default', key: 'EXTRA', value: '' });
});

test('parseExtraSetting rejects malformed input', () => {
  assert.equal(parseExtraSetting('CC=gcc'), undefined);
  assert.equal(parseExtraSetting('default:CC'), undefined);
  assert.equal(parseExtraSetting(':CC=gcc'), undefined);
  assert.equal(parseExtraSetting('default: =gcc'), undefined);
});

test('findHeaderLine matches whole headers only', () => {
  const lines = ['default=base:', 'default:  # compilers', 'intrate,fprate:'];
  assert.equal(findHeaderLine(lines, 'default:'), 1);
  assert.equal(findHeaderLine(lines, 'intrate,fprate:'), 2);
  assert.equal(findHeaderLine(lines, 'fprate:'), -1);
});

test('insertExtraSetting adds under an existing section', () => {
  const text = 'tune = base\ndefault:\n   CC = gcc\n';
  assert.equal(
    insertExtraSetting(text, { section: 'default', key: 'FC', value: 'gfortran' }),
    'tune = base\ndefault:\n   FC = gfortran\n   CC = gcc\n',
  );
});

test('insertExtraSetting opens a new section before the suite headers', () => {
  const text = 'tune = base\n\nintspeed,fpspeed:\n   threads = 4\n';
  assert.equal(
    insertExtraSetting(text, { section: 'fprate=peak', key: 'basepeak', value: 'yes' }),
    'tune = base\n\nfprate=peak:\n   basepeak = yes\n\nintspeed,fpspeed:\n   threads = 4\n',
  );
});

test('insertExtraSetting appends when the template has no suite headers', () => {
  assert.equal(insertExtraSetting('tune = base', { section: 'default', key: 'CC', value: 'gcc' }), 'tune = base\n\ndefault:\n   CC = gcc\n');
});

test('TemplateEditor reports each rule', () => {
  const editor = new TemplateEditor('label "mytest"\n');
  assert.equal(editor.replaceFirst('label', 'label "mytest"', 'label "$&"'), true);
  assert.equal(editor.replaceFirst('missing', 'nope', 'x'), false);
  editor.update('noop', () => undefined, 'detail');
  editor.skip('gcc-ge10', 'gcc 9 < 10');

  assert.equal(editor.text, 'label "$&"\n');
  assert.deepEqual(editor.outcomes(), [
    { rule: 'label', status: 'applied' },
    { rule: 'missing', status: 'not_found' },
    { rule: 'noop', status: 'not_found', detail: 'detail' },
    { rule: 'gcc-ge10', status: 'skipped', detail: 'gcc 9 < 10' },
  ]);
});

test('TemplateEditor matches inside a line and passes over marked occurrences', () => {
  const editor = new TemplateEditor('tune = base (auto-set)\n  tune = base # note\n');
  assert.equal(editor.replaceFirst('tune', 'tune = base', 'tune = peak (auto-set)'), true);
  assert.equal(editor.text, 'tune = base (auto-set)\n  tune = peak (auto-set) # note\n');
  assert.equal(editor.replaceFirst('again', 'tune = base', 'x'), false);
});
