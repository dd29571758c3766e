import { dirname } from 'node:path';

import { formatOneLineUtf8 } from '../text.ts';
import { which, type SystemProbe } from './probe.ts';
import type { DetectionContext, GccProfile } from './types.ts';

const PROBE_TIMEOUT_MS = 5_000;

// "gcc (GCC) 11.2.0", "gcc (Ubuntu 9.4.0-1ubuntu1~20.04.1) 9.4.0"
const GCC_VERSION_RE = /gcc.*?(\d+)\.(\d+)\.(\d+)/i;

export function parseGccMajorVersion(output: string): number | undefined {
  const majorText = GCC_VERSION_RE.exec(output)?.[1];
  if (!majorText) return undefined;
  const major = Number.parseInt(majorText, 10);
  return Number.isSafeInteger(major) ? major : undefined;
}

export function detectGccVersion(probe: SystemProbe, binary: string): number | undefined {
  const result = probe.run(binary, ['--version'], { timeoutMs: PROBE_TIMEOUT_MS });
  if (!result || result.status !== 0) return undefined;
  return parseGccMajorVersion(result.stdout.trim());
}

/** `/usr/bin/gcc` → `/usr`. */
export function gccRootFromBinary(binary: string): string {
  return dirname(dirname(binary));
}

export function detectGcc({ probe, log }: DetectionContext): GccProfile | undefined {
  const binary = which(probe, 'gcc', PROBE_TIMEOUT_MS);
  if (!binary) {
    log.debug('GCC not found in PATH');
    return undefined;
  }

  const version = detectGccVersion(probe, binary);
  const root = gccRootFromBinary(binary);
  log.debug({ binary: formatOneLineUtf8(binary, 512), root, version }, 'Detected GCC');
  return { kind: 'gcc', binary, version, root };
}
