import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

import { errorCode, RuncpuNotFoundError } from '../errors.ts';

export type OutputStream = 'stdout' | 'stderr';

export interface CommandRunOptions {
  env: Readonly<Record<string, string | undefined>>;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

export interface CommandExit {
  exitCode: number;
  /** The user pressed Ctrl-C while the command ran. */
  interrupted: boolean;
}

/**
 * Runs one external command and reports its output line by line.
 *
 * `NodeCommandRunner` spawns real processes; tests substitute a scripted runner.
 */
export interface CommandRunner {
  run(
    argv: readonly string[],
    options: CommandRunOptions,
    onLine: (line: string, stream: OutputStream) => void,
  ): Promise<CommandExit>;
}

function forwardLines(stream: Readable | null, name: OutputStream, onLine: (line: string, stream: OutputStream) => void): Promise<void> {
  if (!stream) return Promise.resolve();
  const rl = createInterface({ input: stream, crlfDelay: Infinity });
  rl.on('line', (line) => onLine(line, name));
  return new Promise((resolve) => rl.once('close', () => resolve()));
}

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGKILL: 137,
  SIGTERM: 143,
};

function signalExitCode(signal: NodeJS.Signals | null): number {
  return (signal && SIGNAL_EXIT_CODES[signal]) || 1;
}

export class NodeCommandRunner implements CommandRunner {
  /** `signals` is where Ctrl-C arrives; the process itself unless a caller supplies another emitter. */
  constructor(private readonly signals: NodeJS.EventEmitter = process) {}

  run(
    argv: readonly string[],
    options: CommandRunOptions,
    onLine: (line: string, stream: OutputStream) => void,
  ): Promise<CommandExit> {
    const [command, ...args] = argv;
    if (!command) return Promise.reject(new Error('Empty command'));

    return new Promise<CommandExit>((resolve, reject) => {
      let interrupted = false;
      const child = spawn(command, args, {
        env: options.env,
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      });

      const onSigint = () => {
        interrupted = true;
        child.kill('SIGINT');
      };
      const signals = this.signals;
      signals.on('SIGINT', onSigint);

      const drained = Promise.all([forwardLines(child.stdout, 'stdout', onLine), forwardLines(child.stderr, 'stderr', onLine)]);

      child.once('error', (err) => {
        signals.off('SIGINT', onSigint);
        reject(errorCode(err) === 'ENOENT' ? new RuncpuNotFoundError(command) : err);
      });

      child.once('close', (code, signal) => {
        signals.off('SIGINT', onSigint);
        drained
          .then(() => resolve({ exitCode: code ?? signalExitCode(signal), interrupted }))
          .catch(reject);
      });

      if (options.input !== undefined && child.stdin) {
        // The updater may exit before reading its prompt answer.
        child.stdin.on('error', (err) => {
          if (errorCode(err) !== 'EPIPE') reject(err);
        });
        child.stdin.end(options.input);
      }
    });
  }
}
