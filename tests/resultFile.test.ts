import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { normalizeRsfBenchmarkId, parseInteger, suiteScoreName } from '../src/results/extractors.ts';
import {
  parseResultContent,
  parseResultFile,
  resolveResultFilePath,
  resultFileCandidates,
} from '../src/results/resultFile.ts';
import { createCapturingLogger, warnings, withTempDir } from './helpers/fakes.ts';

const RSF = [
  'spec.cpu2017.basemean: 12.5',
  'spec.cpu2017.baseenergymean: --',
  'spec.cpu2017.peakenergymean: 3.25',
  'spec.cpu2017.results.648_exchange2_s.base.000.ratio: 12.380557',
  'spec.cpu2017.results.648_exchange2_s.base.000.reported_sec: 237.82',
  'spec.cpu2017.results.648_exchange2_s.base.000.reference: 2944',
  'spec.cpu2017.results.648_exchange2_s.base.000.threads: 4.000',
  'spec.cpu2017.results.657_xz_s.base.000.reported_sec: 10',
  'spec.cpu2017.errors000: 657.xz_s (base) miscompare',
  'spec.cpu2017.errors001: 648.exchange2_s (base) output differs slightly',
  'spec.cpu2017.errors002: 605.mcf_s (base) build failed',
].join('\n');

test('suiteScoreName derives the score from the file name', () => {
  assert.equal(suiteScoreName('/spec/result/CPU2017.001.intspeed.refspeed.rsf', 'base'), 'SPECint2017_speed_base');
  assert.equal(suiteScoreName('CPU2017.002.fprate.refrate.rsf', 'PEAK'), 'SPECfp2017_rate_peak');
});

test('normalizeRsfBenchmarkId replaces only the first underscore', () => {
  assert.equal(normalizeRsfBenchmarkId('648_exchange2_s'), '648.exchange2_s');
  assert.equal(parseInteger('4.000'), 4);
  assert.equal(parseInteger(''), undefined);
});

test('parseResultContent reads raw result files', () => {
  const record = parseResultContent(RSF, '/spec/result/CPU2017.001.intspeed.refspeed.rsf');
  assert.deepEqual(record.scores, { SPECint2017_speed_base: 12.5 });
  assert.deepEqual(record.metrics, { Energy_peak: 3.25 });
  assert.deepEqual(record.benchmarkResults, {
    '648.exchange2_s': {
      ratio: 12.380557,
      time: 237.82,
      reference: 2944,
      threads: 4,
      warning: 'output differs slightly',
    },
    '657.xz_s': { time: 10 },
  });
  assert.equal(record.filePath, '/spec/result/CPU2017.001.intspeed.refspeed.rsf');
});

test('parseResultContent reads legacy result keys', () => {
  const record = parseResultContent('spec.cpu2017.519.lbm_r.base.ratio: 30.5\nspec.cpu2017.519.lbm_r.base.time: 55', 'old.rsf');
  assert.deepEqual(record.benchmarkResults, { '519.lbm_r': { ratio: 30.5, time: 55 } });
});

test('parseResultContent reads text report rows', () => {
  const text = [
    'Est. SPECrate2017_fp_base = 45.60',
    'Est. SPECrate2017_fp_energy = 2.5',
    '503.bwaves_r  base  45.6  220.1',
    '519.lbm_r  base  30  100.5',
  ].join('\n');
  const record = parseResultContent(text, 'CPU2017.001.fprate.txt');
  assert.deepEqual(record.scores, { SPECrate2017_fp_base: 45.6 });
  assert.deepEqual(record.metrics, { SPECrate2017_fp_energy: 2.5 });
  assert.deepEqual(record.benchmarkResults, {
    '503.bwaves_r': { ratio: 45.6, time: 220.1 },
    '519.lbm_r': { ratio: 30, time: 100.5 },
  });
});

test('parseResultContent reads HTML report rows', () => {
  const html = '<tr><td class="bm">505.mcf_r</td><td>12.3</td><td>456.7</td></tr>';
  assert.deepEqual(parseResultContent(html, 'CPU2017.001.intrate.html').benchmarkResults, {
    '505.mcf_r': { ratio: 12.3, time: 456.7 },
  });
});

test('resultFileCandidates looks under the installation', () => {
  assert.deepEqual(resultFileCandidates('/abs/CPU2017.001.rsf', '/spec'), ['/abs/CPU2017.001.rsf']);
  assert.deepEqual(resultFileCandidates('CPU2017.001.rsf', undefined), ['CPU2017.001.rsf']);
  assert.deepEqual(resultFileCandidates('result/CPU2017.001.rsf', '/spec'), [
    '/spec/result/CPU2017.001.rsf',
    '/spec/result/result/CPU2017.001.rsf',
    '/spec/result/CPU2017.001.rsf',
  ]);
});

test('resolveResultFilePath returns the first existing candidate', () => {
  const exists = (path: string) => path === '/spec/result/CPU2017.001.rsf';
  assert.equal(resolveResultFilePath('CPU2017.001.rsf', '/spec', exists), '/spec/result/CPU2017.001.rsf');
  assert.equal(resolveResultFilePath('CPU2017.009.rsf', '/spec', exists), undefined);
  assert.equal(resolveResultFilePath('relative.rsf', undefined, exists), 'relative.rsf');
});

test('parseResultFile reads a file below the installation', async () => {
  await withTempDir(async (dir) => {
    await mkdir(join(dir, 'result'));
    await writeFile(join(dir, 'result', 'CPU2017.001.fprate.rsf'), 'spec.cpu2017.basemean: 7.25\n');
    const { log, records } = createCapturingLogger();

    const record = await parseResultFile('result/CPU2017.001.fprate.rsf', dir, log);
    assert.deepEqual(record?.scores, { SPECfp2017_rate_base: 7.25 });
    assert.equal(record?.filePath, join(dir, 'result', 'CPU2017.001.fprate.rsf'));

    assert.equal(await parseResultFile('CPU2017.404.rsf', dir, log), undefined);
    assert.deepEqual(warnings(records), ['Result file not found']);
  });
});
