export type ResultFileType = 'result' | 'result_file';

export interface ResultFileRef {
  path: string;
  /** `result`: announced by runcpu; `result_file`: a path sniffed from its extension. */
  type: ResultFileType;
}

export type BenchmarkStatus = 'success' | 'warning' | 'failed';

export interface BenchmarkResult {
  ratio?: number;
  /** Reported run time, seconds. */
  time?: number;
  reference?: number;
  copies?: number;
  threads?: number;
  /** Legacy RSF `result` value. */
  result?: number;
  /** Message from an `errors<N>` line on a benchmark that still produced a ratio. */
  warning?: string;
  status?: BenchmarkStatus;
}

export interface ResultRecord {
  scores: Record<string, number>;
  metrics: Record<string, number>;
  benchmarkResults: Record<string, BenchmarkResult>;
  resultFiles: ResultFileRef[];
  logFile?: string;
  /** Result file the record was read from, for `parseResultFile`. */
  filePath?: string;
  executionTimeSec?: number;
}

export function emptyResultRecord(): ResultRecord {
  return { scores: {}, metrics: {}, benchmarkResults: {}, resultFiles: [] };
}

/** A record counts as found only with a result file, a score or a log file. */
export function hasResultEvidence(record: ResultRecord): boolean {
  return record.resultFiles.length > 0 || Object.keys(record.scores).length > 0 || record.logFile !== undefined;
}

export function benchmarkStatus(result: BenchmarkResult): BenchmarkStatus {
  if (result.status === 'failed') return 'failed';
  if (result.warning) return 'warning';
  return result.status ?? 'success';
}
