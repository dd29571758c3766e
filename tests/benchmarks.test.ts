import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  detectSuitePreference,
  isFullBenchmarkId,
  isRateToken,
  isSpeedToken,
  parseBenchmarkFromOutput,
  resolveBenchmarks,
} from '../src/benchmarks.ts';

test('resolveBenchmarks defaults short names to speed', () => {
  assert.deepEqual(resolveBenchmarks(['gcc', 'lbm']), ['602.gcc_s', '619.lbm_s']);
});

test('resolveBenchmarks honours rate preference', () => {
  assert.deepEqual(resolveBenchmarks(['gcc', 'exchange2'], { preferRate: true }), ['502.gcc_r', '548.exchange2_r']);
});

test('resolveBenchmarks matches aliases case-insensitively', () => {
  assert.deepEqual(resolveBenchmarks(['cactuBSSN'], { preferRate: true }), ['507.cactuBSSN_r']);
});

test('resolveBenchmarks passes suites, full ids and unknown names through', () => {
  assert.deepEqual(resolveBenchmarks(['intrate', 'ALL', '519.lbm_r', 'nosuch'], { preferSpeed: true }), [
    'intrate',
    'ALL',
    '519.lbm_r',
    'nosuch',
  ]);
});

test('isFullBenchmarkId needs a digit before the dot', () => {
  assert.equal(isFullBenchmarkId('602.gcc_s'), true);
  assert.equal(isFullBenchmarkId('gcc.x'), false);
  assert.equal(isFullBenchmarkId('gcc'), false);
});

test('detectSuitePreference counts speed and rate hints', () => {
  assert.deepEqual(detectSuitePreference(['602.gcc_s', 'intspeed']), { preferSpeed: true, preferRate: false });
  assert.deepEqual(detectSuitePreference(['502.gcc_r', 'fprate']), { preferSpeed: false, preferRate: true });
  assert.deepEqual(detectSuitePreference(['602.gcc_s', '519.lbm_r']), { preferSpeed: false, preferRate: false });
  assert.deepEqual(detectSuitePreference(['gcc']), { preferSpeed: false, preferRate: false });
});

test('rate and speed token classification', () => {
  assert.equal(isRateToken('519.lbm_r'), true);
  assert.equal(isRateToken('specrate'), true);
  assert.equal(isRateToken('intspeed'), false);
  assert.equal(isSpeedToken('fpspeed'), true);
  assert.equal(isSpeedToken('602.gcc_s'), true);
  assert.equal(isSpeedToken('gcc'), false);
});

test('parseBenchmarkFromOutput finds the running benchmark', () => {
  assert.equal(parseBenchmarkFromOutput('Running 519.lbm_r refrate (ref) base mytest'), '519.lbm_r');
  assert.equal(parseBenchmarkFromOutput('  Building 502.gcc_r base mytest: (build_base_mytest.0000)'), '502.gcc_r');
  assert.equal(parseBenchmarkFromOutput('505.mcf_r: copy 0 finished'), '505.mcf_r');
  assert.equal(parseBenchmarkFromOutput('Success: 1x 519.lbm_r'), undefined);
  assert.equal(parseBenchmarkFromOutput('nothing interesting here'), undefined);
});
