import { parseBenchmarkFromOutput } from '../benchmarks.ts';
import { CommandFailedError, InterruptedError } from '../errors.ts';
import type { Logger } from '../logger.ts';
import type { CommandRunner, OutputStream } from './process.ts';

export interface OutputSink {
  write(stream: OutputStream, line: string): void;
}

export const processOutputSink: OutputSink = {
  write(stream, line) {
    (stream === 'stdout' ? process.stdout : process.stderr).write(`${line}\n`);
  },
};

export interface ExecuteOptions {
  runner: CommandRunner;
  log: Logger;
  /** Show runcpu's own output; progress is still logged when hidden. */
  echo: boolean;
  /** Keep the combined output for result parsing. */
  capture: boolean;
  /** Answer runcpu's confirmation prompt (`--update`). */
  autoConfirm?: boolean;
  /** Layered over `baseEnv`, e.g. the oneAPI compiler environment. */
  env?: Readonly<Record<string, string>>;
  baseEnv?: Readonly<Record<string, string | undefined>>;
  sink?: OutputSink;
  now?: () => number;
}

export interface ExecutionResult {
  output: string;
  elapsedSec: number;
}

/**
 * Runs a built runcpu command to completion. Throws `CommandFailedError` with runcpu's
 * exit code on failure and `InterruptedError` after Ctrl-C.
 */
export async function executeCommand(argv: readonly string[], options: ExecuteOptions): Promise<ExecutionResult> {
  const { log } = options;
  const sink = options.sink ?? processOutputSink;
  const now = options.now ?? (() => performance.now());
  const captured: string[] = [];
  let current: string | undefined;

  const env = { ...(options.baseEnv ?? process.env), ...options.env };
  const started = now();

  const exit = await options.runner.run(
    argv,
    { env, input: options.autoConfirm ? 'y\n' : undefined },
    (line, stream) => {
      if (options.capture) captured.push(line);
      if (options.echo) sink.write(stream, line);

      const benchmark = parseBenchmarkFromOutput(line);
      if (benchmark && benchmark !== current) {
        current = benchmark;
        log.info({ benchmark }, 'Running benchmark');
      }
    },
  );

  if (exit.interrupted) {
    log.warn('Operation cancelled by user');
    throw new InterruptedError();
  }
  if (exit.exitCode !== 0) {
    log.error({ exitCode: exit.exitCode }, 'Command failed');
    throw new CommandFailedError(exit.exitCode);
  }

  return { output: captured.join('\n'), elapsedSec: (now() - started) / 1000 };
}
