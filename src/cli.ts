#!/usr/bin/env node

import { parseCliArgs, UsageError, USAGE, type CliCommand } from './commands/args.js';
import { runLocalCommand, runStatusCommand, runStreamCommand } from './commands/run.js';
import { loadEtlConfig, resolveDataPath } from './shared/config.js';
import { log, setLogFile } from './shared/debug.js';
import { errorMessage } from './shared/errors.js';
import type { RunSummary } from './shared/types.js';

function printSummary(summary: RunSummary): void {
  process.stdout.write(
    `Succeeded: ${summary.succeeded}, Skipped: ${summary.skipped}, Failed: ${summary.failed}\n`,
  );
}

async function main(argv: readonly string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      process.stderr.write(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  if (command.command === 'help') {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = loadEtlConfig();

  if (command.command === 'status') {
    process.stdout.write(runStatusCommand(config) + '\n');
    return 0;
  }

  setLogFile(resolveDataPath(config.logPath));
  const started = Date.now();
  const summary =
    command.command === 'stream'
      ? await runStreamCommand(command.range, config)
      : await runLocalCommand(config);
  printSummary(summary);
  log('info', 'cli', `${command.command} finished`, { seconds: (Date.now() - started) / 1000 });
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log('error', 'cli', 'Run aborted', { error: errorMessage(err) });
    process.exitCode = 1;
  },
);
