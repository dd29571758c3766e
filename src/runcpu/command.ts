import { join } from 'node:path';

import { RuncpuNotFoundError } from '../errors.ts';

export type RuncpuAction = 'build' | 'run' | 'setup' | 'clean' | 'update';

export interface RuncpuRequest {
  action: RuncpuAction;
  /** Executable path: `<specRoot>/bin/runcpu`, or plain `runcpu` for a PATH lookup. */
  runcpu: string;
  benchmarks?: readonly string[];
  config?: string;
  tune?: string;
  size?: string;
  copies?: number;
  threads?: number;
  iterations?: number;
  reportable?: boolean;
  noreportable?: boolean;
  /** Comma list for `--output_format`; `all` leaves runcpu's own default. */
  outputFormats?: string;
  verbose?: boolean;
  rebuild?: boolean;
  parallelTest?: number;
  ignoreErrors?: boolean;
}

export const DEFAULT_OUTPUT_FORMATS = 'rsf,pdf';
export const RUNCPU_VERBOSE_FLAG = '--verbose=5';

export function resolveRuncpuPath(specRoot: string | undefined, isFile: (path: string) => boolean): string {
  if (!specRoot) return 'runcpu';
  const path = join(specRoot, 'bin', 'runcpu');
  if (!isFile(path)) throw new RuncpuNotFoundError(path);
  return path;
}

/**
 * Argument vector for `runcpu`. Order matters: `--output_format` is emitted before
 * `--verbose`, since runcpu's verbose flag swallows a following bare number.
 */
export function buildRuncpuCommand(req: RuncpuRequest): string[] {
  const cmd = [req.runcpu];

  if (req.action === 'update') {
    cmd.push('--update');
    if (req.verbose) cmd.push(RUNCPU_VERBOSE_FLAG);
    return cmd;
  }

  cmd.push('--action', req.action);
  if (req.config) cmd.push('--config', req.config);
  if (req.tune) cmd.push('--tune', req.tune);
  if (req.size) cmd.push('--size', req.size);
  if (req.copies !== undefined) cmd.push('--copies', String(req.copies));
  if (req.threads !== undefined) cmd.push('--threads', String(req.threads));
  if (req.iterations !== undefined) cmd.push('--iterations', String(req.iterations));

  if (req.reportable) {
    cmd.push('--reportable');
  } else if (req.noreportable) {
    cmd.push('--noreportable');
  }

  const formats = req.outputFormats ?? DEFAULT_OUTPUT_FORMATS;
  if (formats.toLowerCase() !== 'all') cmd.push('--output_format', formats);

  if (req.verbose) cmd.push(RUNCPU_VERBOSE_FLAG);
  if (req.rebuild) cmd.push('--rebuild');
  if (req.parallelTest !== undefined) cmd.push('--parallel_test', String(req.parallelTest));
  if (req.ignoreErrors) cmd.push('--ignore_errors');

  cmd.push(...(req.benchmarks ?? []));
  return cmd;
}
