import { z } from 'zod';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

/**
 * Everything the tool reads from the process environment, resolved once at startup.
 *
 * Detection and generation code receives this value instead of consulting `process.env`.
 */
export type Settings = Readonly<{
  /** Fallback installation root used when `--spec-root` is absent. */
  specPath?: string;
  /** oneAPI root override, tried by the compiler detector before well-known locations. */
  oneapiRoot?: string;
  logLevel: LogLevel;
  searchPath: string;
  home?: string;
}>;

type Env = Record<string, string | undefined>;

const optionalPath = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  SPEC_PATH: optionalPath,
  SPEC_ROOT: optionalPath,
  ONEAPI_ROOT: optionalPath,
  SPECER_LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || undefined)
    .pipe(z.enum(logLevels).default('info')),
  PATH: z.string().optional().default(''),
  HOME: optionalPath,
});

export function loadSettings(env: Env = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  return Object.freeze({
    specPath: raw.SPEC_PATH ?? raw.SPEC_ROOT,
    oneapiRoot: raw.ONEAPI_ROOT,
    logLevel: raw.SPECER_LOG_LEVEL,
    searchPath: raw.PATH,
    home: raw.HOME,
  });
}

export function searchPathEntries(settings: Pick<Settings, 'searchPath'>): string[] {
  return settings.searchPath.split(':').filter((entry) => entry.length > 0);
}
