import { detectGcc } from './gcc.ts';
import { detectIntel } from './oneapi.ts';
import type { CompilerChoice, DetectionContext, ToolchainSelection } from './types.ts';

/**
 * Picks the toolchain for a generated config. Intel is tried first unless GCC was asked
 * for; any Intel failure falls back to GCC, and a host without GCC still yields
 * `gcc-default` (the template's own settings).
 *
 * GCC is probed in every mode because the integer suites always build with it.
 */
export function selectToolchain(choice: CompilerChoice | undefined, ctx: DetectionContext): ToolchainSelection {
  const gcc = detectGcc(ctx);

  if (choice !== 'gcc') {
    const intel = detectIntel(ctx);
    if (intel) return { effective: 'intel', gcc, intel };
    if (choice === 'intel') {
      ctx.log.warn('Intel oneAPI requested but unusable; falling back to GCC');
    }
  }

  if (gcc) return { effective: 'gcc', gcc };
  ctx.log.warn('No compiler detected; keeping template compiler settings');
  return { effective: 'gcc-default' };
}
