#!/usr/bin/env -S node --import tsx
import { formatCliUsage, parseCli } from './cli/args.ts';
import { runInvocation } from './cli/app.ts';
import { NodeSystemProbe } from './compiler/probe.ts';
import { CommandFailedError, InterruptedError, RuncpuNotFoundError, UsageError } from './errors.ts';
import { createLogger } from './logger.ts';
import { NodeCommandRunner } from './runcpu/process.ts';
import { loadSettings } from './settings.ts';
import { formatOneLineError } from './text.ts';
import { SPECER_VERSION } from './version.ts';

async function main(argv: readonly string[]): Promise<number> {
  const command = parseCli(argv);

  if (command.kind === 'help') {
    if (command.error) process.stderr.write(`Error: ${command.error}\n\n`);
    process.stdout.write(formatCliUsage(command.command));
    return command.error ? 1 : 0;
  }
  if (command.kind === 'version') {
    process.stdout.write(`specer ${SPECER_VERSION}\n`);
    return 0;
  }

  const settings = loadSettings(process.env);
  const log = createLogger({ level: settings.logLevel, verbose: command.options.verbose, quiet: command.options.quiet });

  try {
    return await runInvocation(command, {
      settings,
      log,
      probe: new NodeSystemProbe(),
      runner: new NodeCommandRunner(),
      out: (line) => process.stdout.write(`${line}\n`),
    });
  } catch (err) {
    if (err instanceof UsageError) {
      process.stderr.write(`Error: ${err.message}\n`);
      if (err.hint) process.stderr.write(`${err.hint}\n`);
      return 1;
    }
    if (err instanceof CommandFailedError) return err.exitCode;
    if (err instanceof InterruptedError) return err.exitCode;
    if (err instanceof RuncpuNotFoundError) {
      log.error({ path: err.path }, "'runcpu' not found; check --spec-root or SPEC_PATH");
      return 1;
    }
    log.error({ err: formatOneLineError(err, 512) }, 'specer failed');
    return 1;
  }
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (err) {
  // Settings validation runs before the logger exists.
  process.stderr.write(`${formatOneLineError(err, 512)}\n`);
  process.exitCode = 1;
}
