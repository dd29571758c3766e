import { readFile, writeFile } from 'node:fs/promises';

import { errorCode } from '../errors.ts';
import type { Logger } from '../logger.ts';
import { formatOneLineError } from '../text.ts';
import { SPECER_VERSION } from '../version.ts';
import type { BenchmarkResult, ResultRecord } from './types.ts';

export interface ConfigSnapshot {
  path: string;
  contents: string;
}

export interface ResultsDocument {
  metadata: {
    timestamp: string;
    specer_version: string;
    benchmarks: string[];
    config: ConfigSnapshot | null;
  };
  results: {
    scores: Record<string, number>;
    metrics: Record<string, number>;
    benchmark_results: Record<string, BenchmarkResult>;
    result_files: { path: string; type: string }[];
    log_file: string | null;
    execution_time: number | null;
  };
}

export interface ExportOptions {
  benchmarks: readonly string[];
  config?: ConfigSnapshot;
  now?: Date;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `specer_results_20250102_030405.json`, local time. */
export function defaultResultsFileName(now: Date): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `specer_results_${date}_${time}.json`;
}

export function buildResultsDocument(record: ResultRecord, options: ExportOptions): ResultsDocument {
  return {
    metadata: {
      timestamp: (options.now ?? new Date()).toISOString(),
      specer_version: SPECER_VERSION,
      benchmarks: [...options.benchmarks],
      config: options.config ?? null,
    },
    results: {
      scores: { ...record.scores },
      metrics: { ...record.metrics },
      benchmark_results: { ...record.benchmarkResults },
      result_files: record.resultFiles.map((file) => ({ path: file.path, type: file.type })),
      log_file: record.logFile ?? null,
      execution_time: record.executionTimeSec ?? null,
    },
  };
}

/**
 * Captures the config used for the run. A file that is already gone (a cleaned-up
 * generated config) keeps its path with empty contents.
 */
export async function readConfigSnapshot(path: string | undefined, log: Logger): Promise<ConfigSnapshot | undefined> {
  if (!path) return undefined;
  try {
    return { path, contents: await readFile(path, 'utf8') };
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      log.warn({ path, err: formatOneLineError(err, 256) }, 'Could not read config file');
    }
    return { path, contents: '' };
  }
}

/** Writes the JSON document and returns the path written. */
export async function writeResultsJson(
  record: ResultRecord,
  outputFile: string | undefined,
  options: ExportOptions,
): Promise<string> {
  const now = options.now ?? new Date();
  const path = outputFile || defaultResultsFileName(now);
  const document = buildResultsDocument(record, { ...options, now });
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  return path;
}
