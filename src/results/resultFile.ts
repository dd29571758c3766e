import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, isAbsolute, join } from 'node:path';

import type { Logger } from '../logger.ts';
import { formatOneLineError } from '../text.ts';
import { applyContentExtractors, REPORT_EXTRACTORS, RSF_EXTRACTORS } from './extractors.ts';
import { emptyResultRecord, type ResultRecord } from './types.ts';

/**
 * Where a path printed by runcpu may live: as given when absolute, otherwise under the
 * installation root, its `result/` directory, or `result/` by file name alone.
 */
export function resultFileCandidates(path: string, specRoot: string | undefined): string[] {
  if (isAbsolute(path) || !specRoot) return [path];
  return [join(specRoot, path), join(specRoot, 'result', path), join(specRoot, 'result', basename(path))];
}

export function resolveResultFilePath(
  path: string,
  specRoot: string | undefined,
  exists: (candidate: string) => boolean = existsSync,
): string | undefined {
  const candidates = resultFileCandidates(path, specRoot);
  if (candidates.length === 1) return candidates[0];
  return candidates.find((candidate) => exists(candidate));
}

export function isRawResultFile(path: string): boolean {
  return path.toLowerCase().endsWith('.rsf');
}

/** Parses already-read content; `.rsf` files use the raw-format extractors. */
export function parseResultContent(content: string, filePath: string): ResultRecord {
  const record = emptyResultRecord();
  record.filePath = filePath;
  const extractors = isRawResultFile(filePath) ? RSF_EXTRACTORS : REPORT_EXTRACTORS;
  applyContentExtractors(content, extractors, record, { filePath });
  return record;
}

/** Reads and parses one result file. Unresolvable or unreadable files yield `undefined`. */
export async function parseResultFile(
  path: string,
  specRoot: string | undefined,
  log: Logger,
): Promise<ResultRecord | undefined> {
  const resolved = resolveResultFilePath(path, specRoot);
  if (!resolved) {
    log.warn({ path }, 'Result file not found');
    return undefined;
  }

  let content: string;
  try {
    content = await readFile(resolved, 'utf8');
  } catch (err) {
    log.warn({ path: resolved, err: formatOneLineError(err, 256) }, 'Could not read result file');
    return undefined;
  }
  return parseResultContent(content, resolved);
}
