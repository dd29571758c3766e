import { detectSuitePreference, REPORTABLE_SUITES, resolveBenchmarks } from '../benchmarks.ts';
import type { SystemProbe } from '../compiler/probe.ts';
import { generateConfig, removeGeneratedConfig, type GeneratedConfig } from '../configgen/generate.ts';
import { ConfigGenerationError, UsageError } from '../errors.ts';
import type { Logger } from '../logger.ts';
import { enrichResults } from '../results/enrich.ts';
import { readConfigSnapshot, writeResultsJson } from '../results/export.ts';
import { parseLiveOutput } from '../results/live.ts';
import { renderResultSummary } from '../results/render.ts';
import { parseResultFile } from '../results/resultFile.ts';
import {
  buildAffinityCommand,
  detectAffinityTools,
  hasAffinity,
  queryNumaTopology,
  validateAffinity,
  type AffinityCommand,
  type AffinitySpec,
} from '../runcpu/affinity.ts';
import { buildRuncpuCommand, resolveRuncpuPath, type RuncpuAction, type RuncpuRequest } from '../runcpu/command.ts';
import { assignCores, type CoreAssignment, type CoreUse } from '../runcpu/cores.ts';
import { executeCommand, type OutputSink } from '../runcpu/execute.ts';
import type { CommandRunner } from '../runcpu/process.ts';
import type { Settings } from '../settings.ts';
import { formatCommandLine } from '../text.ts';
import type { CommandName, CommandOptions } from './args.ts';
import { renderTopology, TOPOLOGY_UNAVAILABLE_LINES } from './topology.ts';

export interface AppContext {
  settings: Settings;
  log: Logger;
  probe: SystemProbe;
  runner: CommandRunner;
  /** User-facing output (dry-run commands, summaries). */
  out(line: string): void;
  /** Where runcpu's own output is echoed. */
  sink?: OutputSink;
  /** Directory for generated configs; the OS temp dir when unset. */
  tmpDir?: string;
  now?: () => Date;
}

export interface Invocation {
  command: CommandName;
  benchmarks: readonly string[];
  options: CommandOptions;
}

type BenchmarkCommand = Exclude<CommandName, 'update' | 'topology'>;

const ACTIONS: Record<BenchmarkCommand, RuncpuAction> = {
  compile: 'build',
  run: 'run',
  setup: 'setup',
  clean: 'clean',
};

const CORE_USE_LABELS: Record<Exclude<CoreUse, 'both'>, string> = {
  copies: 'copies for rate benchmarks',
  threads: 'threads for speed benchmarks',
  'threads-default': 'threads (default behavior)',
};

function requireSpecRoot(options: CommandOptions, settings: Settings): string {
  const root = options.specRoot ?? settings.specPath;
  if (!root) {
    throw new UsageError(
      '--spec-root is required',
      'Pass --spec-root /path/to/spec2017, or set SPEC_PATH=/path/to/spec2017',
    );
  }
  return root;
}

export function validateSelection(command: CommandName, benchmarks: readonly string[], options: CommandOptions): void {
  if (options.speed && options.rate) {
    throw new UsageError('--speed and --rate options are mutually exclusive');
  }
  if (command !== 'run') return;

  if (options.reportable && options.noreportable) {
    throw new UsageError('--reportable and --noreportable options are mutually exclusive');
  }
  if (options.reportable && !benchmarks.some((token) => REPORTABLE_SUITES.has(token.toLowerCase()))) {
    throw new UsageError(
      '--reportable requires a full benchmark suite (intspeed, intrate, fpspeed, fprate or all)',
      `For individual benchmarks, use --noreportable instead: specer run ${benchmarks.join(' ')} --noreportable`,
    );
  }
}

function affinityOf(options: CommandOptions): AffinitySpec {
  return { numaNode: options.numaNode, cpuCores: options.cpuCores, numaMemory: options.numaMemory };
}

function wrapWithAffinity(argv: string[], spec: AffinitySpec, ctx: AppContext): AffinityCommand {
  if (!hasAffinity(spec)) return { argv, prefix: [] };
  const wrapped = buildAffinityCommand(argv, spec, detectAffinityTools(ctx.probe));
  if (wrapped.prefix.length === 0) {
    ctx.log.warn('Neither numactl nor taskset is usable; running without CPU affinity');
  }
  return wrapped;
}

async function obtainConfig(
  specRoot: string,
  options: CommandOptions,
  ctx: AppContext,
): Promise<{ path: string; generated?: GeneratedConfig }> {
  if (options.config) return { path: options.config };

  const generated = await generateConfig(
    {
      specRoot,
      cores: options.cores,
      tune: options.tune,
      extraSettings: options.extraSettings,
      compiler: options.compiler,
    },
    { probe: ctx.probe, settings: ctx.settings, log: ctx.log, tmpDir: ctx.tmpDir },
  );
  if (!generated) throw new ConfigGenerationError();
  return { path: generated.path, generated };
}

async function reportResults(
  output: string,
  elapsedSec: number,
  specRoot: string,
  benchmarks: readonly string[],
  config: string,
  options: CommandOptions,
  ctx: AppContext,
): Promise<void> {
  const live = parseLiveOutput(output);
  if (!live) {
    ctx.log.warn('No results found in runcpu output');
    return;
  }

  const record = await enrichResults(live, (path) => parseResultFile(path, specRoot, ctx.log), elapsedSec);
  ctx.out('');
  for (const line of renderResultSummary(record)) ctx.out(line);

  if (options.json !== undefined) {
    const snapshot = await readConfigSnapshot(config, ctx.log);
    const path = await writeResultsJson(record, options.json || undefined, {
      benchmarks,
      config: snapshot,
      now: ctx.now?.(),
    });
    ctx.out('');
    ctx.out(`Results saved to: ${path}`);
  }
}

async function runBenchmarkCommand(command: BenchmarkCommand, tokens: readonly string[], options: CommandOptions, ctx: AppContext): Promise<number> {
  const { log } = ctx;
  validateSelection(command, tokens, options);

  const specRoot = requireSpecRoot(options, ctx.settings);
  const runcpu = resolveRuncpuPath(specRoot, (path) => ctx.probe.isFile(path));

  const affinity = affinityOf(options);
  const topology = validateAffinity(affinity, () => queryNumaTopology(ctx.probe));
  if (options.dryRun && topology && affinity.numaNode !== undefined) {
    ctx.out(`NUMA node ${affinity.numaNode} validated (CPUs: ${(topology.nodeCpus.get(affinity.numaNode) ?? []).join(', ')})`);
  }
  if (options.dryRun && affinity.cpuCores !== undefined) ctx.out(`CPU cores binding: ${affinity.cpuCores}`);

  const preference = options.speed || options.rate
    ? { preferSpeed: options.speed, preferRate: options.rate }
    : detectSuitePreference(tokens);
  const benchmarks = resolveBenchmarks(tokens, preference);
  log.debug({ from: tokens, to: benchmarks }, 'Resolved benchmarks');
  if (options.dryRun && benchmarks.some((name, i) => name !== tokens[i])) {
    ctx.out(`Converted benchmark names: ${tokens.join(' ')} -> ${benchmarks.join(' ')}`);
  }

  const cores: CoreAssignment = command === 'run' ? assignCores(benchmarks, options.cores, options) : {};
  if (cores.use === 'both') {
    log.warn(
      { cores: options.cores },
      'Mixed rate and speed benchmarks: --cores is used as both copies and threads; consider --copies and --threads',
    );
  } else if (options.dryRun && cores.use) {
    const usage = CORE_USE_LABELS[cores.use];
    ctx.out(`Using --cores=${options.cores} as ${usage}`);
  }

  const config = await obtainConfig(specRoot, options, ctx);
  try {
    if (options.dryRun && config.generated) {
      const withCores = options.cores !== undefined ? ` with ${options.cores} cores` : '';
      ctx.out(`Auto-generated config file${withCores}: ${config.path}`);
    }

    const request: RuncpuRequest = {
      action: ACTIONS[command],
      runcpu,
      benchmarks,
      config: config.path,
      tune: options.tune,
      verbose: options.verbose,
    };
    if (command === 'compile' || command === 'run') {
      request.rebuild = options.rebuild;
      request.parallelTest = options.parallelTest;
      request.ignoreErrors = options.ignoreErrors;
    }
    if (command === 'run') {
      request.size = options.size;
      request.copies = cores.copies;
      request.threads = cores.threads;
      request.iterations = options.iterations;
      request.reportable = options.reportable;
      request.noreportable = options.noreportable;
      request.outputFormats = options.outputFormats;
    }

    const argv = buildRuncpuCommand(request);
    log.debug({ argv }, 'Built runcpu command');
    const wrapped = wrapWithAffinity(argv, affinity, ctx);

    if (options.dryRun) {
      ctx.out(`Would execute: ${formatCommandLine(wrapped.argv)}`);
      if (wrapped.prefix.length > 0) ctx.out(`  (with affinity wrapper: ${formatCommandLine(wrapped.prefix)})`);
      return 0;
    }

    const parse = command === 'run' && (options.parse || options.json !== undefined);
    const result = await executeCommand(wrapped.argv, {
      runner: ctx.runner,
      log,
      echo: command !== 'run' || options.verbose,
      capture: parse,
      env: config.generated?.environment,
      sink: ctx.sink,
    });
    log.debug({ elapsedSec: result.elapsedSec }, 'Execution completed');

    if (parse) await reportResults(result.output, result.elapsedSec, specRoot, benchmarks, config.path, options, ctx);
    return 0;
  } finally {
    if (config.generated) await removeGeneratedConfig(config.generated.path, log);
  }
}

async function runUpdate(options: CommandOptions, ctx: AppContext): Promise<number> {
  const specRoot = requireSpecRoot(options, ctx.settings);
  const runcpu = resolveRuncpuPath(specRoot, (path) => ctx.probe.isFile(path));
  const argv = buildRuncpuCommand({ action: 'update', runcpu, verbose: options.verbose });

  if (options.dryRun) {
    ctx.out(`Would execute: ${formatCommandLine(argv)}`);
    return 0;
  }

  await executeCommand(argv, { runner: ctx.runner, log: ctx.log, echo: true, capture: false, autoConfirm: true, sink: ctx.sink });
  return 0;
}

function showTopology(options: CommandOptions, ctx: AppContext): number {
  const topology = queryNumaTopology(ctx.probe);
  if (!topology) {
    for (const line of TOPOLOGY_UNAVAILABLE_LINES) ctx.out(line);
    return 1;
  }
  for (const line of renderTopology(topology, options.verbose)) ctx.out(line);
  return 0;
}

/** Runs one parsed command; resolves to the process exit code. */
export async function runInvocation(invocation: Invocation, ctx: AppContext): Promise<number> {
  const { command, benchmarks, options } = invocation;
  switch (command) {
    case 'update':
      return runUpdate(options, ctx);
    case 'topology':
      return showTopology(options, ctx);
    default:
      return runBenchmarkCommand(command, benchmarks, options, ctx);
  }
}
