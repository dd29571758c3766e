import type { IntelProfile } from '../compiler/types.ts';

/**
 * Suites that may be built with icx/icpx/ifx. The integer suites have known C++
 * incompatibilities with the Intel front-end, so they always stay on GCC.
 */
export const INTEL_ELIGIBLE_SUITES = ['fprate', 'fpspeed'] as const;

const C_OPTIMIZE = '-O3 -xHost -ipo -qopt-mem-layout-trans=4';
const CXX_OPTIMIZE = '-O3 -xHost -ipo';
const F_OPTIMIZE = '-O3 -xHost -ipo -nostandard-realloc-lhs -align array64byte';

function directive(key: string, value: string): string {
  return `   ${key.padEnd(20)}= ${value}`;
}

function baseDirectives(profile: IntelProfile): string[] {
  const out = [
    directive('CC', `${profile.cc} -m64 -std=c99`),
    directive('CXX', `${profile.cxx} -m64 -std=c++14`),
    directive('CC_VERSION_OPTION', '--version'),
    directive('CXX_VERSION_OPTION', '--version'),
    directive('COPTIMIZE', C_OPTIMIZE),
    directive('CXXOPTIMIZE', CXX_OPTIMIZE),
  ];
  if (profile.fc) {
    out.push(directive('FC', `${profile.fc} -m64`), directive('FC_VERSION_OPTION', '--version'), directive('FOPTIMIZE', F_OPTIMIZE));
  }

  if (profile.includePaths.length > 0) {
    const includes = profile.includePaths.map((dir) => `-I${dir}`).join(' ');
    out.push(directive('EXTRA_CFLAGS', includes), directive('EXTRA_CXXFLAGS', includes));
  }
  if (profile.libraryPaths.length > 0) {
    out.push(directive('EXTRA_LDFLAGS', profile.libraryPaths.map((dir) => `-L${dir}`).join(' ')));
  }
  return out;
}

/** Config text appended for an Intel build: base directives per eligible suite, peak reuses base. */
export function renderIntelSections(profile: IntelProfile): string {
  const lines = [
    '#------------------------------------------------------------------------------',
    `# Intel oneAPI compilers (${profile.root}), floating point suites only`,
    '#------------------------------------------------------------------------------',
  ];
  for (const suite of INTEL_ELIGIBLE_SUITES) {
    lines.push(`${suite}=base:`, ...baseDirectives(profile), '');
    lines.push(`${suite}=peak:`, directive('basepeak', 'yes'), '');
  }
  return lines.join('\n');
}
