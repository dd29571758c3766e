import { spawnSync } from 'node:child_process';
import { accessSync, constants, statSync } from 'node:fs';
import { availableParallelism } from 'node:os';

export interface ProbeResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

export interface ProbeRunOptions {
  timeoutMs: number;
  /** Extra variables layered over the current environment. */
  env?: Readonly<Record<string, string>>;
}

/**
 * Read-only view of the host used by compiler detection and NUMA discovery.
 *
 * `run` returns `undefined` when the program could not be started or did not finish
 * within the timeout; callers treat that as "not detected".
 */
export interface SystemProbe {
  run(command: string, args: readonly string[], options: ProbeRunOptions): ProbeResult | undefined;
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
  isExecutable(path: string): boolean;
  cpuCount(): number | undefined;
}

export class NodeSystemProbe implements SystemProbe {
  run(command: string, args: readonly string[], options: ProbeRunOptions): ProbeResult | undefined {
    const result = spawnSync(command, args, {
      encoding: 'utf8',
      timeout: options.timeoutMs,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 16 * 1024 * 1024,
    });
    if (result.error) return undefined;
    return { status: result.status, stdout: result.stdout, stderr: result.stderr };
  }

  isFile(path: string): boolean {
    try {
      return statSync(path).isFile();
    } catch {
      return false;
    }
  }

  isDirectory(path: string): boolean {
    try {
      return statSync(path).isDirectory();
    } catch {
      return false;
    }
  }

  isExecutable(path: string): boolean {
    if (!this.isFile(path)) return false;
    try {
      accessSync(path, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  cpuCount(): number | undefined {
    const count = availableParallelism();
    return Number.isInteger(count) && count > 0 ? count : undefined;
  }
}

/** `which <name>`; the resolved path, or `undefined` on any failure. */
export function which(probe: SystemProbe, name: string, timeoutMs = 5_000): string | undefined {
  const result = probe.run('which', [name], { timeoutMs });
  if (!result || result.status !== 0) return undefined;
  const resolved = result.stdout.trim().split('\n')[0]?.trim();
  return resolved ? resolved : undefined;
}
