import { test } from 'node:test';
import assert from 'node:assert/strict';

import { UsageError } from '../src/errors.ts';
import {
  buildAffinityCommand,
  detectAffinityTools,
  formatCpuList,
  isValidCpuList,
  parseNumaTopology,
  queryNumaTopology,
  validateAffinity,
} from '../src/runcpu/affinity.ts';
import { assignCores } from '../src/runcpu/cores.ts';
import { FakeProbe } from './helpers/fakes.ts';

const NUMACTL_HARDWARE = [
  'available: 2 nodes (0-1)',
  'node 0 cpus: 0 1 2 3',
  'node 0 size: 15918 MB',
  'node 1 cpus: 4 5 6 7',
  'node 1 size: 16125 MB',
  'node distances:',
  'node   0   1',
  '  0:  10  21',
].join('\n');

const CMD = ['/spec/bin/runcpu', '--action', 'run', 'gcc'];

test('parseNumaTopology reads node CPU lists', () => {
  const topology = parseNumaTopology(NUMACTL_HARDWARE);
  assert.ok(topology);
  assert.deepEqual(topology.nodes, [0, 1]);
  assert.deepEqual(topology.nodeCpus.get(1), [4, 5, 6, 7]);
  assert.equal(topology.totalCpus, 8);
  assert.equal(parseNumaTopology('No NUMA available on this system'), undefined);
});

test('queryNumaTopology treats a missing numactl as no topology', () => {
  assert.equal(queryNumaTopology(new FakeProbe()), undefined);
  const probe = new FakeProbe().respond('numactl --hardware', NUMACTL_HARDWARE);
  assert.deepEqual(queryNumaTopology(probe)?.nodes, [0, 1]);
});

test('detectAffinityTools probes each tool', () => {
  const probe = new FakeProbe().respond('taskset --version', 'taskset from util-linux 2.37');
  assert.deepEqual(detectAffinityTools(probe), { numactl: false, taskset: true });
});

test('isValidCpuList accepts ranges and lists', () => {
  assert.equal(isValidCpuList('0-3'), true);
  assert.equal(isValidCpuList('0,2,4'), true);
  assert.equal(isValidCpuList('0-3,8-11'), true);
  assert.equal(isValidCpuList('a-b'), false);
  assert.equal(isValidCpuList('-,'), false);
});

test('formatCpuList shortens long lists', () => {
  assert.equal(formatCpuList([0, 1, 2]), '0, 1, 2');
  assert.equal(formatCpuList([0, 1, 2, 3, 4, 5, 6, 7, 8]), '0-8');
});

test('validateAffinity rejects unknown nodes and bad core lists', () => {
  const topology = parseNumaTopology(NUMACTL_HARDWARE);
  assert.throws(() => validateAffinity({ cpuCores: 'x' }, () => topology), UsageError);
  assert.throws(
    () => validateAffinity({ numaNode: 3 }, () => topology),
    /NUMA node 3 not available\. Available nodes: 0, 1/,
  );
  assert.throws(() => validateAffinity({ numaNode: 0 }, () => undefined), /NUMA topology not available/);
  assert.equal(validateAffinity({ numaNode: 1 }, () => topology), topology);
  assert.equal(validateAffinity({ cpuCores: '0-3' }, () => topology), undefined);
});

test('buildAffinityCommand prefers numactl', () => {
  const tools = { numactl: true, taskset: true };
  assert.deepEqual(buildAffinityCommand(CMD, { numaNode: 0 }, tools).argv, [
    'numactl',
    '--cpunodebind',
    '0',
    '--membind',
    '0',
    '--',
    ...CMD,
  ]);
  assert.deepEqual(buildAffinityCommand(CMD, { numaNode: 1, numaMemory: false, cpuCores: '4-5' }, tools).prefix, [
    'numactl',
    '--cpunodebind',
    '1',
    '--physcpubind',
    '4-5',
    '--',
  ]);
});

test('buildAffinityCommand falls back to taskset for cores only', () => {
  const tools = { numactl: false, taskset: true };
  assert.deepEqual(buildAffinityCommand(CMD, { cpuCores: '0-3' }, tools).argv, ['taskset', '-c', '0-3', ...CMD]);
  assert.deepEqual(buildAffinityCommand(CMD, { numaNode: 0 }, tools), { argv: CMD, prefix: [] });
  assert.deepEqual(buildAffinityCommand(CMD, {}, { numactl: true, taskset: true }), { argv: CMD, prefix: [] });
});

test('assignCores maps --cores by benchmark kind', () => {
  assert.deepEqual(assignCores(['502.gcc_r'], 8, { threads: 2 }), { copies: 8, threads: 2, use: 'copies' });
  assert.deepEqual(assignCores(['intspeed'], 8, {}), { copies: undefined, threads: 8, use: 'threads' });
  assert.deepEqual(assignCores(['502.gcc_r', '602.gcc_s'], 8, {}), { copies: 8, threads: 8, use: 'both' });
  assert.deepEqual(assignCores(['all'], 8, { copies: 1 }), { copies: 1, threads: 8, use: 'threads-default' });
  assert.deepEqual(assignCores(['502.gcc_r'], undefined, { copies: 3 }), { copies: 3, threads: undefined });
});
