import { basename } from 'node:path';

import type { BenchmarkResult, ResultFileType, ResultRecord } from './types.ts';

/**
 * One named pattern and what a match contributes to the record. Extractors never throw:
 * a group that does not parse as a number is ignored.
 */
export interface Extractor {
  name: string;
  pattern: RegExp;
  apply(match: RegExpMatchArray, record: ResultRecord, source: ExtractionSource): void;
}

export interface ExtractionSource {
  /** Result file being read; empty for live output. */
  filePath: string;
}

export const RESULT_FILE_EXTENSIONS: readonly string[] = ['.rsf', '.html', '.pdf', '.txt', '.ps'];

const SCORE_NAME_RE = /^SPEC\w+\d+_\w+_\w+$/i;

export function parseNumber(text: string | undefined): number | undefined {
  if (text === undefined || text.length === 0) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

/** Integer fields (`copies`, `threads`) are written as `4` or `4.000` in RSF files. */
export function parseInteger(text: string | undefined): number | undefined {
  const value = parseNumber(text);
  return value === undefined ? undefined : Math.trunc(value);
}

export function addResultFile(record: ResultRecord, path: string, type: ResultFileType): void {
  if (!path) return;
  if (record.resultFiles.some((file) => file.path === path)) return;
  record.resultFiles.push({ path, type });
}

function benchmarkEntry(record: ResultRecord, id: string): BenchmarkResult {
  const existing = record.benchmarkResults[id];
  if (existing) return existing;
  const created: BenchmarkResult = {};
  record.benchmarkResults[id] = created;
  return created;
}

/** `648_exchange2_s` → `648.exchange2_s`: only the separator after the number changes. */
export function normalizeRsfBenchmarkId(id: string): string {
  return id.replace('_', '.');
}

/**
 * `SPEC<int|fp>2017_<rate|speed>_<tuning>` from an RSF file name such as
 * `CPU2017.001.intrate.refrate.rsf`.
 */
export function suiteScoreName(filePath: string, tuning: string): string {
  const name = basename(filePath).toLowerCase();
  const kind = name.includes('intspeed') || name.includes('intrate') ? 'int' : 'fp';
  const mode = name.includes('rate') ? 'rate' : 'speed';
  return `SPEC${kind}2017_${mode}_${tuning.toLowerCase()}`;
}

function recordScore(record: ResultRecord, name: string | undefined, valueText: string | undefined): void {
  const value = parseNumber(valueText);
  if (!name || value === undefined) return;
  record.scores[name] = value;
}

function recordMetric(record: ResultRecord, name: string | undefined, valueText: string | undefined): void {
  const value = parseNumber(valueText);
  if (!name || value === undefined) return;
  record.metrics[name] = value;
}

// --- live `runcpu` output, applied line by line -------------------------------------------

export const LIVE_OUTPUT_EXTRACTORS: readonly Extractor[] = [
  {
    name: 'result_file',
    pattern: /The result.*?is in (.*?)(?:\s|$)/i,
    apply: (m, record) => addResultFile(record, (m[1] ?? '').trim(), 'result'),
  },
  {
    name: 'score_line',
    pattern: /Est\. (SPEC\w+\d+_\w+_\w+)\s*=\s*([\d.]+)/i,
    apply: (m, record) => recordScore(record, m[1], m[2]),
  },
  {
    name: 'metric_line',
    pattern: /Est\. (SPEC\w+\d+_\w+)\s*=\s*([\d.]+)/i,
    apply: (m, record) => {
      if (m[1] && SCORE_NAME_RE.test(m[1])) return;
      recordMetric(record, m[1], m[2]);
    },
  },
  {
    name: 'log_file',
    pattern: /The log for this run is in (.*?)(?:\s|$)/i,
    apply: (m, record) => {
      const path = (m[1] ?? '').trim();
      if (path) record.logFile = path;
    },
  },
  {
    name: 'report_location',
    pattern: /(?:format to|reports are in) (.*?)(?:\s|$)/i,
    apply: (m, record) => addResultFile(record, (m[1] ?? '').trim(), 'result'),
  },
];

// --- raw result files (.rsf) ---------------------------------------------------------------

const RSF_DETAIL_FIELDS: Readonly<Record<string, (entry: BenchmarkResult, value: string) => void>> = {
  ratio: (entry, value) => {
    const n = parseNumber(value);
    if (n !== undefined) entry.ratio = n;
  },
  reported_sec: (entry, value) => {
    const n = parseNumber(value);
    if (n !== undefined) entry.time = n;
  },
  reference: (entry, value) => {
    const n = parseNumber(value);
    if (n !== undefined) entry.reference = n;
  },
  copies: (entry, value) => {
    const n = parseInteger(value);
    if (n !== undefined) entry.copies = n;
  },
  threads: (entry, value) => {
    const n = parseInteger(value);
    if (n !== undefined) entry.threads = n;
  },
};

const RSF_LEGACY_FIELDS: Readonly<Record<string, keyof Pick<BenchmarkResult, 'ratio' | 'time' | 'result'>>> = {
  ratio: 'ratio',
  time: 'time',
  result: 'result',
};

/** The `errors` extractor must run last: it only annotates benchmarks that already have a ratio. */
export const RSF_EXTRACTORS: readonly Extractor[] = [
  {
    name: 'suite_mean',
    pattern: /spec\.cpu2017\.(base|peak)mean:\s*([\d.]+)/gi,
    apply: (m, record, source) => {
      if (!m[1]) return;
      recordScore(record, suiteScoreName(source.filePath, m[1]), m[2]);
    },
  },
  {
    name: 'suite_energy',
    pattern: /spec\.cpu2017\.(base|peak)energymean:\s*(\S+)/gi,
    apply: (m, record) => {
      // "--" is runcpu's "no data".
      if (!m[1] || m[2] === '--') return;
      recordMetric(record, `Energy_${m[1].toLowerCase()}`, m[2]);
    },
  },
  {
    name: 'detailed_result',
    pattern: /spec\.cpu2017\.results\.(\d{3}_\w+)\.(?:base|peak)\.000\.(ratio|reported_sec|reference|copies|threads):\s*([\d.]+)/gi,
    apply: (m, record) => {
      const [, rawId, field, value] = m;
      const set = field ? RSF_DETAIL_FIELDS[field.toLowerCase()] : undefined;
      if (!rawId || !set || value === undefined) return;
      set(benchmarkEntry(record, normalizeRsfBenchmarkId(rawId)), value);
    },
  },
  {
    name: 'legacy_result',
    pattern: /spec\.cpu2017\.(\d{3}\.\w+)\.(?:base|peak)\.(ratio|time|result):\s*([\d.]+)/gi,
    apply: (m, record) => {
      const [, id, field, valueText] = m;
      const key = field ? RSF_LEGACY_FIELDS[field.toLowerCase()] : undefined;
      const value = parseNumber(valueText);
      if (!id || !key || value === undefined) return;
      benchmarkEntry(record, id)[key] = value;
    },
  },
  {
    name: 'benchmark_error',
    pattern: /spec\.cpu2017\.errors\d+:\s*(\d{3}\.\w+)\s*\([^)]+\)\s*(.+)/gi,
    apply: (m, record) => {
      const [, id, message] = m;
      if (!id || !message) return;
      // A benchmark without a ratio never produced a result; it is left out rather than
      // shown as a warned success.
      const entry = record.benchmarkResults[id];
      if (entry?.ratio === undefined) return;
      entry.warning = message.trim();
    },
  },
];

// --- text and HTML reports -----------------------------------------------------------------

function recordRow(record: ResultRecord, id: string | undefined, ratioText: string | undefined, timeText: string | undefined): void {
  const ratio = parseNumber(ratioText);
  const time = parseNumber(timeText);
  if (!id || ratio === undefined || time === undefined) return;
  record.benchmarkResults[id] = { ratio, time };
}

export const REPORT_EXTRACTORS: readonly Extractor[] = [
  {
    name: 'estimated_score',
    pattern: /Est\.\s+(SPEC\w+\d+_\w+)\s*=\s*([\d.]+)/gi,
    apply: (m, record) => {
      const name = m[1];
      if (!name) return;
      if (/base|peak/i.test(name)) {
        recordScore(record, name, m[2]);
      } else {
        recordMetric(record, name, m[2]);
      }
    },
  },
  {
    name: 'table_row',
    pattern: /(\d{3}\.\w+)[ \t]+[\w \t]+[ \t]+([\d.]+)[ \t]+([\d.]+)/gim,
    apply: (m, record) => recordRow(record, m[1], m[2], m[3]),
  },
  {
    name: 'html_row',
    pattern: /<td[^>]*>(\d{3}\.\w+)<\/td>.*?<td[^>]*>([\d.]+)<\/td>.*?<td[^>]*>([\d.]+)<\/td>/gi,
    apply: (m, record) => recordRow(record, m[1], m[2], m[3]),
  },
];

/** Runs each extractor over the whole text, in table order. */
export function applyContentExtractors(
  content: string,
  extractors: readonly Extractor[],
  record: ResultRecord,
  source: ExtractionSource,
): void {
  for (const extractor of extractors) {
    for (const match of content.matchAll(extractor.pattern)) {
      extractor.apply(match, record, source);
    }
  }
}
