import { addResultFile, LIVE_OUTPUT_EXTRACTORS, RESULT_FILE_EXTENSIONS } from './extractors.ts';
import { emptyResultRecord, hasResultEvidence, type ResultRecord } from './types.ts';

function sniffResultPaths(line: string, record: ResultRecord): void {
  const lower = line.toLowerCase();
  if (!RESULT_FILE_EXTENSIONS.some((ext) => lower.includes(ext))) return;

  for (const word of line.split(/\s+/)) {
    const candidate = word.toLowerCase();
    if (RESULT_FILE_EXTENSIONS.some((ext) => candidate.endsWith(ext))) {
      addResultFile(record, word, 'result_file');
    }
  }
}

/**
 * Scans captured `runcpu` output for scores, metrics, the log file and result file
 * locations. Returns `undefined` when the output names no result file, score or log.
 */
export function parseLiveOutput(output: string): ResultRecord | undefined {
  const record = emptyResultRecord();

  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    for (const extractor of LIVE_OUTPUT_EXTRACTORS) {
      const match = extractor.pattern.exec(line);
      if (match) extractor.apply(match, record, { filePath: '' });
    }
    sniffResultPaths(line, record);
  }

  return hasResultEvidence(record) ? record : undefined;
}
