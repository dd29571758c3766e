import { test } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import type { GccProfile, IntelProfile, ToolchainSelection } from '../src/compiler/types.ts';
import { generateConfig, removeGeneratedConfig, renderConfig, templatePath } from '../src/configgen/generate.ts';
import { TEMPLATE_LINES, TEMPLATE_REPLACEMENTS } from '../src/configgen/template.ts';
import { createSilentLogger } from '../src/logger.ts';
import { createCapturingLogger, FakeProbe, FIXTURE_SPEC_ROOT, warnings, withTempDir } from './helpers/fakes.ts';

const GCC_11: GccProfile = { kind: 'gcc', binary: '/usr/bin/gcc', version: 11, root: '/usr' };
const GCC_9: GccProfile = { kind: 'gcc', binary: '/opt/rh/gcc9/bin/gcc', version: 9, root: '/opt/rh/gcc9' };

const INTEL: IntelProfile = {
  kind: 'intel',
  root: '/opt/intel/oneapi',
  cc: '/opt/intel/oneapi/bin/icx',
  cxx: '/opt/intel/oneapi/bin/icpx',
  libraryPaths: ['/opt/intel/oneapi/lib'],
  includePaths: [],
  environment: { ONEAPI_ROOT: '/opt/intel/oneapi' },
};

async function loadTemplate(): Promise<string> {
  return readFile(templatePath(FIXTURE_SPEC_ROOT), 'utf8');
}

function lines(text: string): string[] {
  return text.split('\n');
}

test('renderConfig rewrites label, gcc, tune and copies', async () => {
  const template = await loadTemplate();
  const toolchain: ToolchainSelection = { effective: 'gcc', gcc: GCC_11 };
  const { text, edits } = renderConfig(template, { tune: 'all', cores: 16 }, toolchain, 8, createSilentLogger());

  const out = lines(text);
  assert.ok(out.includes('%   define label "specer"           # (2)      Use a label meaningful to *you*.'));
  assert.ok(out.includes("%define GCCge10  # EDIT: remove the '#' from column 1 if using GCC 10 or later (auto-detected)"));
  assert.ok(out.includes('%   define  gcc_dir        "/usr"  # EDIT (see above) (auto-detected)'));
  assert.ok(out.includes('tune                 = base,peak  # EDIT if needed: set to "base" for old GCC. (auto-set)'));
  assert.ok(out.includes('   copies           = 16   # EDIT to change number of copies (see above)'));
  assert.deepEqual(edits, [
    { rule: 'label', status: 'applied' },
    { rule: 'gcc-ge10', status: 'applied' },
    { rule: 'gcc-dir', status: 'applied' },
    { rule: 'tune', status: 'applied' },
    { rule: 'copies', status: 'applied' },
  ]);
});

test('renderConfig does not mark an already generated file twice', async () => {
  const toolchain: ToolchainSelection = { effective: 'gcc', gcc: GCC_11 };
  const first = renderConfig(await loadTemplate(), { tune: 'all' }, toolchain, 8, createSilentLogger());
  const second = renderConfig(first.text, { tune: 'all' }, toolchain, 8, createSilentLogger());

  assert.equal(second.text.split('(auto-set)').length, 2);
  assert.equal(second.text.split('(auto-detected)').length, 3);
  assert.deepEqual(
    second.edits.map((edit) => edit.status),
    ['not_found', 'not_found', 'not_found', 'not_found', 'not_found'],
  );
});

test('renderConfig substitutes lines that carry trailing whitespace', async () => {
  const template = (await loadTemplate())
    .replace(TEMPLATE_LINES.label, `${TEMPLATE_LINES.label} `)
    .replace(TEMPLATE_LINES.tune, `${TEMPLATE_LINES.tune}\t`)
    .replace(TEMPLATE_LINES.copies, `${TEMPLATE_LINES.copies}  `);
  const toolchain: ToolchainSelection = { effective: 'gcc', gcc: GCC_11 };
  const { text, edits } = renderConfig(template, { tune: 'base', cores: 4 }, toolchain, 8, createSilentLogger());

  const out = lines(text);
  assert.ok(out.includes(`${TEMPLATE_REPLACEMENTS.label()} `));
  assert.ok(out.includes(`${TEMPLATE_REPLACEMENTS.tune('base')}\t`));
  assert.ok(out.includes(`${TEMPLATE_REPLACEMENTS.copies(4)}  `));
  assert.deepEqual(
    edits.map((edit) => edit.status),
    ['applied', 'applied', 'applied', 'applied', 'applied'],
  );

  const again = renderConfig(text, { tune: 'base', cores: 4 }, toolchain, 8, createSilentLogger());
  assert.equal(again.text.split('(auto-set)').length, 2);
});

test('renderConfig leaves the GCC 10 switch alone for older compilers', async () => {
  const template = await loadTemplate();
  const { text, edits } = renderConfig(template, {}, { effective: 'gcc', gcc: GCC_9 }, 8, createSilentLogger());

  assert.ok(lines(text).includes("#%define GCCge10  # EDIT: remove the '#' from column 1 if using GCC 10 or later"));
  assert.ok(lines(text).includes('%   define  gcc_dir        "/opt/rh/gcc9"  # EDIT (see above) (auto-detected)'));
  assert.deepEqual(edits[1], { rule: 'gcc-ge10', status: 'skipped', detail: 'gcc 9 < 10' });
  assert.equal(
    edits.some((edit) => edit.rule === 'tune'),
    false,
  );
});

test('renderConfig takes copies from the host, then a default', async () => {
  const template = await loadTemplate();
  const { log, records } = createCapturingLogger();

  const fromHost = renderConfig(template, {}, { effective: 'gcc-default' }, 12, log);
  assert.ok(lines(fromHost.text).includes('   copies           = 12   # EDIT to change number of copies (see above)'));
  assert.ok(lines(fromHost.text).includes('%   define  gcc_dir        "/opt/rh/devtoolset-9/root/usr"  # EDIT (see above)'));
  assert.deepEqual(warnings(records), ['Could not detect GCC path, using default in template']);

  const fallback = renderConfig(template, {}, { effective: 'gcc-default' }, undefined, createSilentLogger());
  assert.ok(lines(fallback.text).includes('   copies           = 4   # EDIT to change number of copies (see above)'));
});

test('renderConfig appends Intel sections for the floating point suites', async () => {
  const template = await loadTemplate();
  const { text, edits } = renderConfig(
    template,
    {},
    { effective: 'intel', gcc: GCC_11, intel: INTEL },
    8,
    createSilentLogger(),
  );

  const out = lines(text);
  const fprateBase = out.indexOf('fprate=base:');
  assert.ok(fprateBase > 0);
  assert.equal(out[fprateBase + 1], `   ${'CC'.padEnd(20)}= /opt/intel/oneapi/bin/icx -m64 -std=c99`);
  assert.ok(out.includes(`   ${'EXTRA_LDFLAGS'.padEnd(20)}= -L/opt/intel/oneapi/lib`));
  assert.ok(out.includes('fpspeed=peak:'));
  assert.equal(out.includes('intrate=base:'), false);
  assert.equal(out.some((line) => line.includes('FC_VERSION_OPTION')), false);
  assert.equal(edits.find((edit) => edit.rule === 'intel-sections')?.status, 'applied');
});

test('renderConfig applies extra settings and skips malformed ones', async () => {
  const template = await loadTemplate();
  const { log, records } = createCapturingLogger();
  const { text, edits } = renderConfig(
    template,
    { extraSettings: ['default=peak:OPTIMIZE=-O2', 'oops', 'fprate=peak:basepeak=yes'] },
    { effective: 'gcc', gcc: GCC_11 },
    8,
    log,
  );

  const out = lines(text);
  assert.equal(out[out.indexOf('default=peak:') + 1], '   OPTIMIZE = -O2');
  const added = out.indexOf('fprate=peak:');
  assert.equal(out[added + 1], '   basepeak = yes');
  assert.equal(out[added + 3], 'intrate,fprate:');
  assert.deepEqual(
    edits.filter((edit) => edit.rule === 'extra-setting'),
    [
      { rule: 'extra-setting', status: 'applied', detail: 'default=peak:OPTIMIZE=-O2' },
      { rule: 'extra-setting', status: 'skipped', detail: 'oops' },
      { rule: 'extra-setting', status: 'applied', detail: 'fprate=peak:basepeak=yes' },
    ],
  );
  assert.deepEqual(warnings(records), ['Ignoring malformed extra setting (expected section:key=value)']);
});

test('generateConfig writes a new file in the temp directory', async () => {
  await withTempDir(async (dir) => {
    const probe = new FakeProbe().respond('which gcc', '/usr/bin/gcc').respond('/usr/bin/gcc --version', 'gcc (GCC) 12.3.0');
    const generated = await generateConfig(
      { specRoot: FIXTURE_SPEC_ROOT, compiler: 'gcc', cores: 2 },
      { probe, settings: { searchPath: '/usr/bin' }, log: createSilentLogger(), tmpDir: dir },
    );

    assert.ok(generated);
    assert.equal(dirname(generated.path), dir);
    assert.match(generated.path, /specer_generated_[0-9a-f-]+\.cfg$/);
    assert.equal(generated.compiler, 'gcc');
    assert.deepEqual(generated.environment, {});

    const contents = lines(await readFile(generated.path, 'utf8'));
    assert.ok(contents.includes('%   define label "specer"           # (2)      Use a label meaningful to *you*.'));
    assert.ok(contents.includes('   copies           = 2   # EDIT to change number of copies (see above)'));

    await removeGeneratedConfig(generated.path, createSilentLogger());
    await assert.rejects(stat(generated.path), { code: 'ENOENT' });
    await removeGeneratedConfig(generated.path, createSilentLogger());
  });
});

test('generateConfig reports a missing template', async () => {
  await withTempDir(async (dir) => {
    const { log, records } = createCapturingLogger();
    const generated = await generateConfig(
      { specRoot: join(dir, 'no-spec') },
      { probe: new FakeProbe(), settings: { searchPath: '' }, log, tmpDir: dir },
    );
    assert.equal(generated, undefined);
    assert.ok(records.some((record) => record.msg === 'Config template not found'));
  });
});
