import type { SystemProbe } from '../compiler/probe.ts';
import { UsageError } from '../errors.ts';

export interface AffinitySpec {
  numaNode?: number;
  /** numactl/taskset CPU list: `0-3`, `0,2,4`, `0-3,8-11`. */
  cpuCores?: string;
  /** Bind memory to `numaNode`; on unless explicitly disabled. */
  numaMemory?: boolean;
}

export interface NumaTopology {
  nodes: number[];
  nodeCpus: Map<number, number[]>;
  totalCpus: number;
}

export interface AffinityTools {
  numactl: boolean;
  taskset: boolean;
}

const TOPOLOGY_TIMEOUT_MS = 10_000;
const TOOL_TIMEOUT_MS = 5_000;

/** Parses `numactl --hardware`; only the `node <n> cpus: …` lines matter. */
export function parseNumaTopology(output: string): NumaTopology | undefined {
  const nodes: number[] = [];
  const nodeCpus = new Map<number, number[]>();
  let totalCpus = 0;

  for (const raw of output.split('\n')) {
    const match = /^node\s+(\d+)\s+cpus:(.*)$/.exec(raw.trim());
    const nodeText = match?.[1];
    if (nodeText === undefined) continue;

    const node = Number.parseInt(nodeText, 10);
    const cpus = (match?.[2] ?? '')
      .trim()
      .split(/\s+/)
      .filter((part) => /^\d+$/.test(part))
      .map((part) => Number.parseInt(part, 10));

    nodes.push(node);
    nodeCpus.set(node, cpus);
    if (cpus.length > 0) totalCpus = Math.max(totalCpus, Math.max(...cpus) + 1);
  }

  return nodes.length > 0 ? { nodes, nodeCpus, totalCpus } : undefined;
}

export function queryNumaTopology(probe: SystemProbe): NumaTopology | undefined {
  const result = probe.run('numactl', ['--hardware'], { timeoutMs: TOPOLOGY_TIMEOUT_MS });
  if (!result || result.status !== 0) return undefined;
  return parseNumaTopology(result.stdout);
}

export function detectAffinityTools(probe: SystemProbe): AffinityTools {
  const works = (tool: string) => probe.run(tool, ['--version'], { timeoutMs: TOOL_TIMEOUT_MS })?.status === 0;
  return { numactl: works('numactl'), taskset: works('taskset') };
}

export function isValidCpuList(cpuCores: string): boolean {
  return /\d/.test(cpuCores) && /^[\d\-,\s]+$/.test(cpuCores);
}

/** Compact display of a node's CPUs: the full list when short, `first-last` otherwise. */
export function formatCpuList(cpus: readonly number[]): string {
  if (cpus.length === 0) return '';
  if (cpus.length <= 8) return cpus.join(', ');
  return `${cpus[0]}-${cpus[cpus.length - 1]}`;
}

/**
 * Checks an affinity request before anything is built. Throws `UsageError` for input
 * the user has to fix.
 */
export function validateAffinity(spec: AffinitySpec, topology: () => NumaTopology | undefined): NumaTopology | undefined {
  if (spec.cpuCores !== undefined && !isValidCpuList(spec.cpuCores)) {
    throw new UsageError("Invalid CPU cores format. Use formats like '0-3', '0,2,4', or '0-3,8-11'");
  }
  if (spec.numaNode === undefined) return undefined;

  const topo = topology();
  if (!topo) throw new UsageError('NUMA topology not available or numactl not installed');
  if (!topo.nodes.includes(spec.numaNode)) {
    throw new UsageError(`NUMA node ${spec.numaNode} not available. Available nodes: ${topo.nodes.join(', ')}`);
  }
  return topo;
}

export function hasAffinity(spec: AffinitySpec): boolean {
  return spec.numaNode !== undefined || spec.cpuCores !== undefined;
}

export interface AffinityCommand {
  argv: string[];
  /** Tokens placed in front of the original command; empty when nothing applied. */
  prefix: string[];
}

/** Wraps `cmd` with numactl, or taskset for a core-only request, whichever is installed. */
export function buildAffinityCommand(cmd: readonly string[], spec: AffinitySpec, tools: AffinityTools): AffinityCommand {
  const unchanged: AffinityCommand = { argv: [...cmd], prefix: [] };
  if (!hasAffinity(spec)) return unchanged;

  if (tools.numactl) {
    const prefix = ['numactl'];
    if (spec.numaNode !== undefined) {
      prefix.push('--cpunodebind', String(spec.numaNode));
      if (spec.numaMemory ?? true) prefix.push('--membind', String(spec.numaNode));
    }
    if (spec.cpuCores !== undefined) prefix.push('--physcpubind', spec.cpuCores);
    prefix.push('--');
    return { argv: [...prefix, ...cmd], prefix };
  }

  if (spec.cpuCores !== undefined && tools.taskset) {
    const prefix = ['taskset', '-c', spec.cpuCores];
    return { argv: [...prefix, ...cmd], prefix };
  }

  return unchanged;
}
