import { basename, dirname, join } from 'node:path';

import { searchPathEntries } from '../settings.ts';
import { which } from './probe.ts';
import type { DetectionContext, IntelProfile } from './types.ts';

const SETVARS = 'setvars.sh';
const PROBE_TIMEOUT_MS = 5_000;
const SETVARS_TIMEOUT_MS = 30_000;

const ICX_WALK_LEVELS = 6;
const PATH_WALK_LEVELS = 5;

/** Variables whose name contains one of these are kept from the `setvars.sh` environment. */
export const ONEAPI_ENV_ALLOWLIST: readonly string[] = [
  'INTEL',
  'ONEAPI',
  'MKLROOT',
  'TBBROOT',
  'DAALROOT',
  'IPPROOT',
  'CPATH',
  'LIBRARY_PATH',
  'LD_LIBRARY_PATH',
  'PATH',
];

const LIBRARY_SUBDIRS = [
  'compiler/latest/lib',
  'compiler/latest/lib/intel64',
  'compiler/latest/linux/lib',
  'compiler/latest/linux/compiler/lib/intel64_lin',
  'mkl/latest/lib',
  'mkl/latest/lib/intel64',
  'tbb/latest/lib/intel64/gcc4.8',
];

const INCLUDE_SUBDIRS = ['compiler/latest/include', 'compiler/latest/linux/include', 'mkl/latest/include', 'tbb/latest/include'];

type RootStrategy = {
  name: string;
  find: (ctx: DetectionContext) => string | undefined;
};

function hasSetvars(ctx: DetectionContext, dir: string): boolean {
  return ctx.probe.isFile(join(dir, SETVARS));
}

function isOneapiDir(ctx: DetectionContext, dir: string): boolean {
  return basename(dir) === 'oneapi' && hasSetvars(ctx, dir);
}

/** Checks `start` and at most `levels` of its ancestors. */
function walkUp(start: string, levels: number, matches: (dir: string) => boolean): string | undefined {
  let dir = start;
  for (let level = 0; level <= levels; level += 1) {
    if (matches(dir)) return dir;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
  return undefined;
}

export function conventionalOneapiLocations(home: string | undefined): string[] {
  const out = ['/opt/intel/oneapi'];
  if (home) out.push(join(home, 'intel', 'oneapi'));
  out.push('/usr/local/intel/oneapi');
  return out;
}

export const ONEAPI_ROOT_STRATEGIES: readonly RootStrategy[] = [
  {
    name: 'icx-in-path',
    find: (ctx) => {
      const icx = which(ctx.probe, 'icx', PROBE_TIMEOUT_MS);
      if (!icx) return undefined;
      return walkUp(dirname(icx), ICX_WALK_LEVELS, (dir) => isOneapiDir(ctx, dir));
    },
  },
  {
    name: 'ONEAPI_ROOT',
    find: (ctx) => {
      const root = ctx.settings.oneapiRoot;
      return root && hasSetvars(ctx, root) ? root : undefined;
    },
  },
  {
    name: 'well-known-location',
    find: (ctx) => conventionalOneapiLocations(ctx.settings.home).find((dir) => hasSetvars(ctx, dir)),
  },
  {
    name: 'path-entry',
    find: (ctx) => {
      for (const entry of searchPathEntries(ctx.settings)) {
        const lower = entry.toLowerCase();
        if (!lower.includes('intel') && !lower.includes('oneapi')) continue;
        const found = walkUp(entry, PATH_WALK_LEVELS, (dir) => isOneapiDir(ctx, dir));
        if (found) return found;
      }
      return undefined;
    },
  },
];

export function findOneapiRoot(ctx: DetectionContext): string | undefined {
  for (const strategy of ONEAPI_ROOT_STRATEGIES) {
    const root = strategy.find(ctx);
    if (root) {
      ctx.log.debug({ root, strategy: strategy.name }, 'Found Intel oneAPI installation');
      return root;
    }
  }
  ctx.log.warn('Intel oneAPI installation not found');
  return undefined;
}

export function isAllowedOneapiVariable(name: string): boolean {
  return ONEAPI_ENV_ALLOWLIST.some((part) => name.includes(part));
}

/** Parses `env` output, keeping allow-listed names. Continuation lines of multi-line values are dropped. */
export function parseEnvironmentDump(output: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of output.split('\n')) {
    const match = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(line);
    const name = match?.[1];
    if (!name || !isAllowedOneapiVariable(name)) continue;
    out[name] = match?.[2] ?? '';
  }
  return out;
}

/** Sources `setvars.sh --force` in a subshell and captures the resulting environment. */
export function loadOneapiEnvironment(ctx: DetectionContext, root: string): Record<string, string> {
  const setvars = join(root, SETVARS);
  const result = ctx.probe.run(
    'bash',
    ['-c', 'source "$1" --force >/dev/null 2>&1 && env', 'specer', setvars],
    { timeoutMs: SETVARS_TIMEOUT_MS },
  );
  if (!result || result.status !== 0) {
    ctx.log.warn({ setvars, status: result?.status ?? null }, 'Failed to load Intel oneAPI environment');
    return {};
  }
  return parseEnvironmentDump(result.stdout);
}

function locateInPath(ctx: DetectionContext, name: string, pathVar: string): string | undefined {
  for (const dir of pathVar.split(':')) {
    if (!dir) continue;
    const candidate = join(dir, name);
    if (ctx.probe.isExecutable(candidate)) return candidate;
  }
  return undefined;
}

function respondsToVersion(ctx: DetectionContext, binary: string, env: Record<string, string>): boolean {
  const result = ctx.probe.run(binary, ['--version'], { timeoutMs: PROBE_TIMEOUT_MS, env });
  return result?.status === 0;
}

export interface IntelCompilerValidation {
  valid: boolean;
  cc?: string;
  cxx?: string;
  fc?: string;
}

/** `icx` and `icpx` are required; `ifx` only adds Fortran. */
export function validateIntelCompilers(ctx: DetectionContext, environment: Record<string, string>): IntelCompilerValidation {
  const pathVar = environment.PATH ?? ctx.settings.searchPath;
  const check = (name: string): string | undefined => {
    const binary = locateInPath(ctx, name, pathVar);
    if (!binary) {
      ctx.log.debug({ compiler: name }, 'Intel compiler not found');
      return undefined;
    }
    if (!respondsToVersion(ctx, binary, environment)) {
      ctx.log.debug({ compiler: name, binary }, 'Intel compiler did not answer --version');
      return undefined;
    }
    return binary;
  };

  const cc = check('icx');
  const cxx = check('icpx');
  if (!cc || !cxx) return { valid: false, cc, cxx };

  const fc = check('ifx');
  if (!fc) ctx.log.warn('ifx not available; Fortran benchmarks keep the template compiler');
  return { valid: true, cc, cxx, fc };
}

export function existingSubdirs(ctx: DetectionContext, root: string, subdirs: readonly string[]): string[] {
  return subdirs.map((sub) => join(root, sub)).filter((dir) => ctx.probe.isDirectory(dir));
}

/** Full Intel toolchain, or `undefined` if any required step fails. */
export function detectIntel(ctx: DetectionContext): IntelProfile | undefined {
  const root = findOneapiRoot(ctx);
  if (!root) return undefined;

  const environment = loadOneapiEnvironment(ctx, root);
  if (Object.keys(environment).length === 0) return undefined;

  const validation = validateIntelCompilers(ctx, environment);
  if (!validation.valid || !validation.cc || !validation.cxx) {
    ctx.log.warn({ root }, 'Intel compilers failed validation');
    return undefined;
  }

  return {
    kind: 'intel',
    root,
    cc: validation.cc,
    cxx: validation.cxx,
    fc: validation.fc,
    libraryPaths: existingSubdirs(ctx, root, LIBRARY_SUBDIRS),
    includePaths: existingSubdirs(ctx, root, INCLUDE_SUBDIRS),
    environment,
  };
}
