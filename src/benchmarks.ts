export interface BenchmarkVariants {
  readonly speed: string;
  readonly rate: string;
}

/** Short alias → SPEC CPU 2017 identifiers. Keys are stored lower-case. */
export const BENCHMARK_MAPPING: ReadonlyMap<string, BenchmarkVariants> = new Map(
  (
    [
      ['perlbench', '600.perlbench_s', '500.perlbench_r'],
      ['gcc', '602.gcc_s', '502.gcc_r'],
      ['mcf', '605.mcf_s', '505.mcf_r'],
      ['omnetpp', '620.omnetpp_s', '520.omnetpp_r'],
      ['xalancbmk', '623.xalancbmk_s', '523.xalancbmk_r'],
      ['x264', '625.x264_s', '525.x264_r'],
      ['deepsjeng', '631.deepsjeng_s', '531.deepsjeng_r'],
      ['leela', '641.leela_s', '541.leela_r'],
      ['exchange2', '648.exchange2_s', '548.exchange2_r'],
      ['xz', '657.xz_s', '557.xz_r'],
      ['bwaves', '603.bwaves_s', '503.bwaves_r'],
      ['cactubssn', '607.cactuBSSN_s', '507.cactuBSSN_r'],
      ['lbm', '619.lbm_s', '519.lbm_r'],
      ['wrf', '621.wrf_s', '521.wrf_r'],
      ['cam4', '627.cam4_s', '527.cam4_r'],
      ['pop2', '628.pop2_s', '528.pop2_r'],
      ['imagick', '638.imagick_s', '538.imagick_r'],
      ['nab', '644.nab_s', '544.nab_r'],
      ['fotonik3d', '649.fotonik3d_s', '549.fotonik3d_r'],
      ['roms', '654.roms_s', '554.roms_r'],
    ] as const
  ).map(([alias, speed, rate]) => [alias, { speed, rate }]),
);

export const SUITE_KEYWORDS: ReadonlySet<string> = new Set([
  'intspeed',
  'fpspeed',
  'specspeed',
  'intrate',
  'fprate',
  'specrate',
  'all',
]);

/** Suites accepted by a reportable run. */
export const REPORTABLE_SUITES: ReadonlySet<string> = new Set(['intspeed', 'intrate', 'fpspeed', 'fprate', 'all']);

const RATE_SUITES: ReadonlySet<string> = new Set(['intrate', 'fprate', 'specrate']);
const SPEED_SUITES: ReadonlySet<string> = new Set(['intspeed', 'fpspeed', 'specspeed']);

export interface ResolveOptions {
  preferSpeed?: boolean;
  preferRate?: boolean;
}

/** `602.gcc_s`, `519.lbm_r`: a dot with a digit somewhere before it. */
export function isFullBenchmarkId(token: string): boolean {
  const dot = token.indexOf('.');
  if (dot < 0) return false;
  return /\d/.test(token.slice(0, dot));
}

export function isSuiteKeyword(token: string): boolean {
  return SUITE_KEYWORDS.has(token.toLowerCase());
}

/**
 * Replaces short aliases with full identifiers. Full ids, suite keywords and unknown
 * names pass through untouched; `runcpu` reports names it does not know.
 *
 * Speed wins when neither preference is set.
 */
export function resolveBenchmarks(tokens: readonly string[], options: ResolveOptions = {}): string[] {
  return tokens.map((token) => {
    if (isFullBenchmarkId(token) || isSuiteKeyword(token)) return token;

    const variants = BENCHMARK_MAPPING.get(token.toLowerCase());
    if (!variants) return token;
    if (options.preferSpeed) return variants.speed;
    if (options.preferRate) return variants.rate;
    return variants.speed;
  });
}

export interface SuitePreference {
  preferSpeed: boolean;
  preferRate: boolean;
}

/** Infers speed/rate from tokens that already say which one they are. Ties yield neither. */
export function detectSuitePreference(tokens: readonly string[]): SuitePreference {
  let speed = 0;
  let rate = 0;
  for (const token of tokens) {
    const lower = token.toLowerCase();
    if (token.includes('_s') || lower.includes('speed')) {
      speed += 1;
    } else if (token.includes('_r') || lower.includes('rate')) {
      rate += 1;
    }
  }
  return { preferSpeed: speed > rate, preferRate: rate > speed };
}

export function isRateToken(token: string): boolean {
  return token.endsWith('_r') || RATE_SUITES.has(token.toLowerCase());
}

export function isSpeedToken(token: string): boolean {
  return token.endsWith('_s') || SPEED_SUITES.has(token.toLowerCase());
}

const BENCHMARK_ID = String.raw`(\d{3}\.\w+(?:_[rs])?)`;

const PROGRESS_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`Running.*?${BENCHMARK_ID}`, 'i'),
  new RegExp(String.raw`Building.*?${BENCHMARK_ID}`, 'i'),
  new RegExp(String.raw`${BENCHMARK_ID}\s*(?:base|peak)`, 'i'),
  new RegExp(String.raw`runcpu.*?${BENCHMARK_ID}`, 'i'),
  new RegExp(String.raw`specinvoke.*?${BENCHMARK_ID}`, 'i'),
  new RegExp(String.raw`^${BENCHMARK_ID}:\s`, 'i'),
];

/** Picks the benchmark a `runcpu` progress line is talking about, if any. */
export function parseBenchmarkFromOutput(line: string): string | undefined {
  for (const pattern of PROGRESS_PATTERNS) {
    const match = pattern.exec(line);
    if (match?.[1]) return match[1];
  }
  return undefined;
}
