import { join } from 'node:path';

export const TEMPLATE_RELATIVE_PATH = join('config', 'Example-gcc-linux-x86.cfg');

/**
 * Literal lines of the vendor's `Example-gcc-linux-x86.cfg` (CPU2017 v1.1.x) that the
 * generator rewrites. Substitution is literal, first occurrence only: if a newer
 * template reworded a line, the rule reports `not_found` and the line stays as shipped.
 */
export const TEMPLATE_LINES = {
  label: '%   define label "mytest"           # (2)      Use a label meaningful to *you*.',
  gccGe10: "#%define GCCge10  # EDIT: remove the '#' from column 1 if using GCC 10 or later",
  gccDir: '%   define  gcc_dir        "/opt/rh/devtoolset-9/root/usr"  # EDIT (see above)',
  tune: 'tune                 = base,peak  # EDIT if needed: set to "base" for old GCC.',
  copies: '   copies           = 1   # EDIT to change number of copies (see above)',
} as const;

export const GENERATED_LABEL = 'specer';
export const AUTO_DETECTED_MARKER = '(auto-detected)';
export const AUTO_SET_MARKER = '(auto-set)';

/** Suite headers new sections are placed in front of, in order of preference. */
export const SUITE_SECTION_HEADERS: readonly string[] = [
  'intrate,fprate:',
  'intspeed,fpspeed:',
  'intrate,intspeed=base:',
  'fprate,fpspeed=base:',
  'intrate,intspeed=peak:',
  'fprate,fpspeed=peak:',
];

export const TEMPLATE_REPLACEMENTS = {
  label: () => `%   define label "${GENERATED_LABEL}"           # (2)      Use a label meaningful to *you*.`,
  gccGe10: () => `%define GCCge10  # EDIT: remove the '#' from column 1 if using GCC 10 or later ${AUTO_DETECTED_MARKER}`,
  gccDir: (gccRoot: string) => `%   define  gcc_dir        "${gccRoot}"  # EDIT (see above) ${AUTO_DETECTED_MARKER}`,
  tune: (tune: string) => `tune                 = ${tune}  # EDIT if needed: set to "base" for old GCC. ${AUTO_SET_MARKER}`,
  copies: (copies: number) => `   copies           = ${copies}   # EDIT to change number of copies (see above)`,
} as const;

const TUNE_VALUES: Readonly<Record<string, string>> = {
  base: 'base',
  peak: 'peak',
  all: 'base,peak',
};

/** `all` expands to `base,peak`; anything unrecognised is passed through verbatim. */
export function mapTuneValue(tune: string): string {
  return TUNE_VALUES[tune] ?? tune;
}
