import { isRawResultFile } from './resultFile.ts';
import type { BenchmarkResult, ResultRecord } from './types.ts';

export type ResultFileReader = (path: string) => Promise<ResultRecord | undefined>;

async function collectBenchmarkResults(
  paths: readonly string[],
  read: ResultFileReader,
): Promise<Record<string, BenchmarkResult>> {
  const collected: Record<string, BenchmarkResult> = {};
  for (const path of paths) {
    const parsed = await read(path);
    if (parsed) Object.assign(collected, parsed.benchmarkResults);
  }
  return collected;
}

/**
 * Adds per-benchmark detail from the result files the live output announced. Raw
 * (`.rsf`) files are read first; formatted reports are only consulted when no raw file
 * yielded benchmark data.
 */
export async function enrichResults(
  record: ResultRecord,
  read: ResultFileReader,
  executionTimeSec?: number,
): Promise<ResultRecord> {
  const paths = record.resultFiles.map((file) => file.path);
  const raw = paths.filter((path) => isRawResultFile(path));
  const formatted = paths.filter((path) => !isRawResultFile(path));

  let details = await collectBenchmarkResults(raw, read);
  if (Object.keys(details).length === 0) {
    details = await collectBenchmarkResults(formatted, read);
  }

  const enriched: ResultRecord = {
    ...record,
    benchmarkResults: { ...record.benchmarkResults, ...details },
  };
  if (executionTimeSec !== undefined) enriched.executionTimeSec = executionTimeSec;
  return enriched;
}
