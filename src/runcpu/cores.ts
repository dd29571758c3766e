import { isRateToken, isSpeedToken } from '../benchmarks.ts';

export type CoreUse = 'copies' | 'threads' | 'both' | 'threads-default';

export interface CoreAssignment {
  copies?: number;
  threads?: number;
  /** How `--cores` was applied; absent without `--cores`. */
  use?: CoreUse;
}

/**
 * Maps `--cores` onto runcpu's knobs: copies for rate runs, threads for speed runs, both
 * for a mix. Without `--cores` the explicit values pass through.
 */
export function assignCores(
  benchmarks: readonly string[],
  cores: number | undefined,
  explicit: { copies?: number; threads?: number },
): CoreAssignment {
  if (cores === undefined) return { copies: explicit.copies, threads: explicit.threads };

  const rate = benchmarks.some((token) => isRateToken(token));
  const speed = benchmarks.some((token) => isSpeedToken(token));

  if (rate && !speed) return { copies: cores, threads: explicit.threads, use: 'copies' };
  if (speed && !rate) return { copies: explicit.copies, threads: cores, use: 'threads' };
  if (rate && speed) return { copies: cores, threads: cores, use: 'both' };
  return { copies: explicit.copies, threads: cores, use: 'threads-default' };
}
