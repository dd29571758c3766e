import type { CompilerChoice } from '../compiler/types.ts';

export type CommandName = 'compile' | 'run' | 'setup' | 'clean' | 'update' | 'topology';

export const COMMAND_NAMES: readonly CommandName[] = ['compile', 'run', 'setup', 'clean', 'update', 'topology'];

export type RunSize = 'test' | 'train' | 'ref';

export interface CommandOptions {
  verbose: boolean;
  quiet: boolean;
  specRoot?: string;
  dryRun: boolean;
  config?: string;
  tune?: string;
  speed: boolean;
  rate: boolean;
  cores?: number;
  compiler?: CompilerChoice;
  /** Raw `section:key=value` strings from `--set`. */
  extraSettings: string[];
  numaNode?: number;
  cpuCores?: string;
  numaMemory: boolean;
  rebuild: boolean;
  parallelTest?: number;
  ignoreErrors: boolean;
  size?: RunSize;
  copies?: number;
  threads?: number;
  iterations?: number;
  reportable: boolean;
  noreportable: boolean;
  outputFormats?: string;
  /** `''` writes to the default file name. */
  json?: string;
  parse: boolean;
}

export type CliCommand =
  | { kind: 'help'; command?: CommandName; error?: string }
  | { kind: 'version' }
  | { kind: 'command'; command: CommandName; benchmarks: string[]; options: CommandOptions };

type Scope = 'all' | 'spec' | 'config' | 'build' | 'run';

const SCOPES: readonly Scope[] = ['all', 'spec', 'config', 'build', 'run'];

const SCOPE_COMMANDS: Record<Scope, readonly CommandName[]> = {
  all: COMMAND_NAMES,
  spec: ['compile', 'run', 'setup', 'clean', 'update'],
  config: ['compile', 'run', 'setup', 'clean'],
  build: ['compile', 'run'],
  run: ['run'],
};

interface OptionDef {
  names: readonly string[];
  scope: Scope;
  /** `required`: `--x v` or `--x=v`; `inline`: only `--x=v`, bare `--x` passes `''`. */
  value?: 'required' | 'inline';
  /** Returns an error message for a bad value. */
  apply(options: CommandOptions, value: string): string | undefined;
}

function positiveInt(name: string, value: string, set: (n: number) => void): string | undefined {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) return `${name} must be a positive integer`;
  set(Number.parseInt(value, 10));
  return undefined;
}

function nonNegativeInt(name: string, value: string, set: (n: number) => void): string | undefined {
  if (!/^\d+$/.test(value)) return `${name} must be a non-negative integer`;
  set(Number.parseInt(value, 10));
  return undefined;
}

const TUNE_VALUES: readonly string[] = ['base', 'peak', 'all'];
const SIZE_VALUES: readonly RunSize[] = ['test', 'train', 'ref'];

function isRunSize(value: string): value is RunSize {
  return SIZE_VALUES.some((size) => size === value);
}

const OPTIONS: readonly OptionDef[] = [
  { names: ['--verbose', '-v'], scope: 'all', apply: (o) => void (o.verbose = true) },
  { names: ['--quiet', '-q'], scope: 'all', apply: (o) => void (o.quiet = true) },

  { names: ['--spec-root', '-s'], scope: 'spec', value: 'required', apply: (o, v) => void (o.specRoot = v) },
  { names: ['--dry-run', '-n'], scope: 'spec', apply: (o) => void (o.dryRun = true) },

  { names: ['--config', '-c'], scope: 'config', value: 'required', apply: (o, v) => void (o.config = v) },
  {
    names: ['--tune', '-t'],
    scope: 'config',
    value: 'required',
    apply: (o, v) => {
      if (!TUNE_VALUES.includes(v)) return `--tune must be one of: ${TUNE_VALUES.join(', ')}`;
      o.tune = v;
      return undefined;
    },
  },
  { names: ['--speed'], scope: 'config', apply: (o) => void (o.speed = true) },
  { names: ['--rate'], scope: 'config', apply: (o) => void (o.rate = true) },
  {
    names: ['--cores'],
    scope: 'config',
    value: 'required',
    apply: (o, v) => positiveInt('--cores', v, (n) => (o.cores = n)),
  },
  {
    names: ['--compiler'],
    scope: 'config',
    value: 'required',
    apply: (o, v) => {
      if (v !== 'gcc' && v !== 'intel') return '--compiler must be one of: gcc, intel';
      o.compiler = v;
      return undefined;
    },
  },
  { names: ['--set'], scope: 'config', value: 'required', apply: (o, v) => void o.extraSettings.push(v) },
  {
    names: ['--numa-node'],
    scope: 'config',
    value: 'required',
    apply: (o, v) => nonNegativeInt('--numa-node', v, (n) => (o.numaNode = n)),
  },
  { names: ['--cpu-cores'], scope: 'config', value: 'required', apply: (o, v) => void (o.cpuCores = v) },
  { names: ['--numa-memory'], scope: 'config', apply: (o) => void (o.numaMemory = true) },
  { names: ['--no-numa-memory'], scope: 'config', apply: (o) => void (o.numaMemory = false) },

  { names: ['--rebuild'], scope: 'build', apply: (o) => void (o.rebuild = true) },
  {
    names: ['--parallel-test'],
    scope: 'build',
    value: 'required',
    apply: (o, v) => positiveInt('--parallel-test', v, (n) => (o.parallelTest = n)),
  },
  { names: ['--ignore-errors'], scope: 'build', apply: (o) => void (o.ignoreErrors = true) },

  {
    names: ['--size'],
    scope: 'run',
    value: 'required',
    apply: (o, v) => {
      if (!isRunSize(v)) return `--size must be one of: ${SIZE_VALUES.join(', ')}`;
      o.size = v;
      return undefined;
    },
  },
  { names: ['--copies'], scope: 'run', value: 'required', apply: (o, v) => positiveInt('--copies', v, (n) => (o.copies = n)) },
  { names: ['--threads'], scope: 'run', value: 'required', apply: (o, v) => positiveInt('--threads', v, (n) => (o.threads = n)) },
  {
    names: ['--iterations'],
    scope: 'run',
    value: 'required',
    apply: (o, v) => positiveInt('--iterations', v, (n) => (o.iterations = n)),
  },
  { names: ['--reportable'], scope: 'run', apply: (o) => void (o.reportable = true) },
  { names: ['--noreportable'], scope: 'run', apply: (o) => void (o.noreportable = true) },
  { names: ['--output-formats'], scope: 'run', value: 'required', apply: (o, v) => void (o.outputFormats = v) },
  { names: ['--json'], scope: 'run', value: 'inline', apply: (o, v) => void (o.json = v) },
  { names: ['--no-parse'], scope: 'run', apply: (o) => void (o.parse = false) },
];

const DEFAULT_TUNE: Partial<Record<CommandName, string>> = { compile: 'base', run: 'base' };
const TAKES_BENCHMARKS: ReadonlySet<CommandName> = new Set(['compile', 'run', 'setup', 'clean']);

function defaultOptions(command: CommandName): CommandOptions {
  return {
    verbose: false,
    quiet: false,
    dryRun: false,
    tune: DEFAULT_TUNE[command],
    speed: false,
    rate: false,
    extraSettings: [],
    numaMemory: true,
    rebuild: false,
    ignoreErrors: false,
    size: command === 'run' ? 'ref' : undefined,
    reportable: false,
    noreportable: false,
    parse: true,
  };
}

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

function findOption(command: CommandName, name: string): OptionDef | undefined {
  return OPTIONS.find((def) => def.names.includes(name) && SCOPE_COMMANDS[def.scope].includes(command));
}

/** `--name=value` → `['--name', 'value']`; anything else → `[arg, undefined]`. */
function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq < 0) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

export function parseCli(argv: readonly string[]): CliCommand {
  const first = argv[0];
  if (first === undefined || first === '--help' || first === '-h' || first === 'help') {
    const topic = argv[1];
    return { kind: 'help', command: first === 'help' && topic && isCommandName(topic) ? topic : undefined };
  }
  if (first === '--version' || first === '-V') return { kind: 'version' };
  if (!isCommandName(first)) return { kind: 'help', error: `Unknown command: ${first}` };

  const command = first;
  const options = defaultOptions(command);
  const benchmarks: string[] = [];
  let positionalOnly = false;

  for (let i = 1; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (positionalOnly || !arg.startsWith('-') || arg === '-') {
      if (!TAKES_BENCHMARKS.has(command)) return { kind: 'help', command, error: `Unexpected argument: ${arg}` };
      benchmarks.push(arg);
      continue;
    }
    if (arg === '--') {
      positionalOnly = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') return { kind: 'help', command };

    const [name, inline] = splitInline(arg);
    const def = findOption(command, name);
    if (!def) return { kind: 'help', command, error: `Unknown option for ${command}: ${name}` };

    let value = '';
    if (def.value === 'required') {
      if (inline !== undefined) {
        value = inline;
      } else {
        const next = argv[i + 1];
        if (next === undefined) return { kind: 'help', command, error: `${name} requires a value` };
        value = next;
        i += 1;
      }
      if (!value) return { kind: 'help', command, error: `${name} requires a value` };
    } else if (def.value === 'inline') {
      value = inline ?? '';
    } else if (inline !== undefined) {
      return { kind: 'help', command, error: `${name} does not take a value` };
    }

    const error = def.apply(options, value);
    if (error) return { kind: 'help', command, error };
  }

  if (TAKES_BENCHMARKS.has(command) && benchmarks.length === 0) {
    return { kind: 'help', command, error: 'At least one benchmark or suite is required' };
  }

  return { kind: 'command', command, benchmarks, options };
}

const COMMAND_SUMMARIES: Record<CommandName, string> = {
  compile: 'Build benchmarks without running them',
  run: 'Build (if needed) and run benchmarks, then report results',
  setup: 'Prepare run directories without running',
  clean: 'Remove build and run directories',
  update: 'Apply the latest SPEC CPU 2017 updates (runcpu --update)',
  topology: 'Show NUMA nodes and CPU lists for affinity options',
};

const SCOPE_HELP: Record<Scope, readonly string[]> = {
  all: ['  -v, --verbose                Debug logging; runcpu at --verbose=5', '  -q, --quiet                  Errors only', '  -h, --help                   Show this help'],
  spec: [
    '  -s, --spec-root <dir>        SPEC CPU 2017 installation (or env SPEC_PATH)',
    '  -n, --dry-run                Print the runcpu command instead of running it',
  ],
  config: [
    '  -c, --config <file>          Config file (default: generated from the Example-gcc template)',
    '  -t, --tune <base|peak|all>   Tuning level',
    '      --speed | --rate         Resolve short names to speed (_s) or rate (_r) variants',
    '      --cores <n>              Copies/threads for the generated config',
    '      --compiler <gcc|intel>   Compiler for the generated config (default: auto)',
    '      --set <section:key=value>  Extra config setting (repeatable)',
    '      --numa-node <n>          Bind CPUs (and memory) to a NUMA node',
    '      --cpu-cores <list>       Bind to CPUs, e.g. 0-3 or 0,2,4',
    '      --no-numa-memory         Do not bind memory to --numa-node',
  ],
  build: [
    '      --rebuild                Force a rebuild',
    '      --parallel-test <n>      Parallel test workloads',
    '      --ignore-errors          Continue past benchmark errors',
  ],
  run: [
    '      --size <test|train|ref>  Workload size (default: ref)',
    '      --copies <n>             Rate copies',
    '      --threads <n>            Speed threads',
    '      --iterations <n>         Iterations',
    '      --reportable | --noreportable',
    '      --output-formats <list>  runcpu output formats (default: rsf,pdf; "all" for runcpu default)',
    '      --json[=<file>]          Save parsed results as JSON',
    '      --no-parse               Do not parse results',
  ],
};

export function formatCliUsage(command?: CommandName): string {
  if (!command) {
    return [
      'Usage:',
      '  specer <command> [options] [benchmarks...]',
      '',
      'Commands:',
      ...COMMAND_NAMES.map((name) => `  ${name.padEnd(10)} ${COMMAND_SUMMARIES[name]}`),
      '',
      'Options:',
      '  -h, --help                   Show help (specer help <command> for command options)',
      '  -V, --version                Show version',
      '',
      'Examples:',
      '  specer compile gcc --rate --spec-root /opt/spec2017',
      '  specer run intrate --cores 8 --json',
      '  specer run 519.lbm_r --numa-node 0 --size test',
      '',
    ].join('\n');
  }

  const scopes = SCOPES.filter((scope) => SCOPE_COMMANDS[scope].includes(command));
  const positional = TAKES_BENCHMARKS.has(command) ? ' <benchmarks...>' : '';
  return [
    'Usage:',
    `  specer ${command} [options]${positional}`,
    '',
    COMMAND_SUMMARIES[command],
    '',
    'Options:',
    ...scopes.flatMap((scope) => SCOPE_HELP[scope]),
    '',
  ].join('\n');
}
