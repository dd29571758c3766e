import { benchmarkStatus, type BenchmarkResult, type BenchmarkStatus, type ResultRecord } from './types.ts';

const NOT_AVAILABLE = 'N/A';

const STATUS_LABELS: Record<BenchmarkStatus, string> = {
  success: 'Success',
  warning: 'Warning',
  failed: 'Failed',
};

const BENCHMARK_COLUMNS = [
  { title: 'Benchmark', width: 18, align: 'left' },
  { title: 'Status', width: 10, align: 'left' },
  { title: 'Ratio', width: 8, align: 'right' },
  { title: 'Time (s)', width: 9, align: 'right' },
  { title: 'Reference', width: 9, align: 'right' },
  { title: 'Copies', width: 7, align: 'right' },
  { title: 'Threads', width: 8, align: 'right' },
] as const;

function fixed(value: number | undefined, digits: number): string {
  return value === undefined ? NOT_AVAILABLE : value.toFixed(digits);
}

function count(value: number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : String(value);
}

/** `65.4` → `1m 5.4s`; under a minute → `42.0s`. */
export function formatDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const rest = (seconds % 60).toFixed(1);
  return minutes > 0 ? `${minutes}m ${rest}s` : `${rest}s`;
}

export function benchmarkRow(id: string, result: BenchmarkResult): string[] {
  const status = benchmarkStatus(result);
  if (status === 'failed') {
    return [id, STATUS_LABELS.failed, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE];
  }
  return [
    id,
    STATUS_LABELS[status],
    fixed(result.ratio, 2),
    fixed(result.time, 1),
    fixed(result.reference, 0),
    count(result.copies),
    count(result.threads),
  ];
}

function formatRow(cells: readonly string[]): string {
  return cells
    .map((cell, i) => {
      const column = BENCHMARK_COLUMNS[i];
      if (!column) return cell;
      return column.align === 'right' ? cell.padStart(column.width) : cell.padEnd(column.width);
    })
    .join('  ')
    .trimEnd();
}

function renderValues(title: string, values: Record<string, number>): string[] {
  const entries = Object.entries(values);
  if (entries.length === 0) return [];
  const width = Math.max(30, ...entries.map(([name]) => name.length));
  return ['', title, ...entries.map(([name, value]) => `  ${name.padEnd(width)}  ${value.toFixed(2)}`)];
}

/** Plain-text summary of a parsed run, one string per output line. */
export function renderResultSummary(record: ResultRecord): string[] {
  const lines = ['SPEC CPU 2017 Benchmark Results'];

  lines.push(...renderValues('Overall Scores', record.scores));
  lines.push(...renderValues('Suite Metrics', record.metrics));

  const benchmarks = Object.entries(record.benchmarkResults);
  if (benchmarks.length > 0) {
    lines.push('', 'Individual Benchmark Results');
    lines.push(`  ${formatRow(BENCHMARK_COLUMNS.map((column) => column.title))}`);
    for (const [id, result] of benchmarks) {
      lines.push(`  ${formatRow(benchmarkRow(id, result))}`);
      if (result.warning) lines.push(`    warning: ${result.warning}`);
    }
  }

  if (record.resultFiles.length > 0) {
    lines.push('', 'Result Files');
    for (const file of record.resultFiles) lines.push(`  ${file.path} (${file.type})`);
  }

  if (record.logFile) lines.push('', `Log File: ${record.logFile}`);
  if (record.executionTimeSec !== undefined && record.executionTimeSec > 0) {
    lines.push('', `Execution Time: ${formatDuration(record.executionTimeSec)}`);
  }

  return lines;
}
