import { formatCpuList, type NumaTopology } from '../runcpu/affinity.ts';

export const TOPOLOGY_UNAVAILABLE_LINES: readonly string[] = [
  'NUMA topology not available',
  'Possible reasons:',
  '  - numactl is not installed',
  '  - System does not support NUMA',
  '  - No NUMA nodes configured',
  '',
  'To install numactl:',
  '  - Ubuntu/Debian: sudo apt install numactl',
  '  - RHEL/CentOS: sudo yum install numactl',
  '  - Fedora: sudo dnf install numactl',
];

function cpuRange(cpus: readonly number[]): string | undefined {
  const first = cpus[0];
  if (first === undefined) return undefined;
  return cpus.length > 1 ? `${first}-${cpus[cpus.length - 1]}` : String(first);
}

export function renderTopology(topology: NumaTopology, detailed: boolean): string[] {
  const lines = [
    'NUMA Topology',
    `  Total NUMA nodes:  ${topology.nodes.length}`,
    `  Available nodes:   ${topology.nodes.join(', ')}`,
    `  Total CPU cores:   ${topology.totalCpus}`,
  ];

  if (detailed) {
    lines.push('', 'NUMA nodes:');
    for (const node of [...topology.nodes].sort((a, b) => a - b)) {
      const cpus = topology.nodeCpus.get(node) ?? [];
      lines.push(`  node ${node}: ${formatCpuList(cpus)} (${cpus.length} cores)`);
    }
  }

  const node0 = topology.nodes[0];
  const range = node0 === undefined ? undefined : cpuRange(topology.nodeCpus.get(node0) ?? []);
  if (node0 !== undefined && range !== undefined) {
    const examples: [string, string][] = [
      [`specer run gcc --numa-node ${node0}`, `Bind to NUMA node ${node0} (CPUs & memory)`],
      [`specer run gcc --cpu-cores ${range}`, `Bind to CPU cores ${range}`],
      [`specer run gcc --numa-node ${node0} --cpu-cores ${range}`, `Bind to NUMA node ${node0} with specific cores`],
    ];
    const width = Math.max(...examples.map(([cmd]) => cmd.length));
    lines.push('', 'Usage examples:', ...examples.map(([cmd, what]) => `  ${cmd.padEnd(width)}  ${what}`));
  }

  return lines;
}
