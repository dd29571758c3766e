import type { Logger } from '../logger.ts';
import type { Settings } from '../settings.ts';
import type { SystemProbe } from './probe.ts';

export type CompilerChoice = 'gcc' | 'intel';

export interface GccProfile {
  kind: 'gcc';
  binary: string;
  /** Major version, when `gcc --version` could be parsed. */
  version?: number;
  /** Installation root: the directory above `bin/gcc`. */
  root: string;
}

export interface IntelProfile {
  kind: 'intel';
  root: string;
  cc: string;
  cxx: string;
  /** Missing when `ifx` is unavailable; Fortran then stays on the template's compiler. */
  fc?: string;
  libraryPaths: string[];
  includePaths: string[];
  /** Variables captured from `setvars.sh`, passed on to `runcpu`. */
  environment: Record<string, string>;
}

export type CompilerProfile = GccProfile | IntelProfile;

export type EffectiveCompiler = 'intel' | 'gcc' | 'gcc-default';

export interface ToolchainSelection {
  effective: EffectiveCompiler;
  gcc?: GccProfile;
  intel?: IntelProfile;
}

export interface DetectionContext {
  probe: SystemProbe;
  settings: Pick<Settings, 'oneapiRoot' | 'searchPath' | 'home'>;
  log: Logger;
}
