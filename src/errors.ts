/** Malformed user input: reported with an explanation and a non-zero exit. */
export class UsageError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'UsageError';
    this.hint = hint;
  }
}

export class RuncpuNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`runcpu not found at ${path}`);
    this.name = 'RuncpuNotFoundError';
    this.path = path;
  }
}

/** The wrapped tool exited non-zero; its exit code is passed through unchanged. */
export class CommandFailedError extends Error {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super(`Command failed with exit code ${exitCode}`);
    this.name = 'CommandFailedError';
    this.exitCode = exitCode;
  }
}

export const EXIT_INTERRUPTED = 130;

/** The user interrupted the wrapped tool; exits with `EXIT_INTERRUPTED`. */
export class InterruptedError extends Error {
  readonly exitCode = EXIT_INTERRUPTED;

  constructor() {
    super('Operation cancelled by user');
    this.name = 'InterruptedError';
  }
}

/** `code` of a Node system error (`ENOENT`, `EACCES`, ...), when there is one. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

export class ConfigGenerationError extends Error {
  constructor(message = 'Could not auto-generate config file from template') {
    super(message);
    this.name = 'ConfigGenerationError';
  }
}
