import type { StreamRange } from '../pipeline/streaming-pipeline.js';

export type CliCommand =
  | { command: 'stream'; range: StreamRange }
  | { command: 'local' }
  | { command: 'status' }
  | { command: 'help' };

export const USAGE = `Usage: disnet-etl <command>

Commands:
  stream [start] [end] [step]  Integrate DrugCombDB combinations by index
                               (defaults 1 2 1; end is exclusive; resumes
                               from the checkpoint when one exists)
  local                        Integrate pending rows of the local mirror
  status                       Show staging, mirror and audit counts
  help                         Show this message
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseIndex(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw.trim()) || !Number.isSafeInteger(value)) {
    throw new UsageError(`${name} must be an integer, got '${raw}'`);
  }
  return value;
}

/**
 * Parses the arguments after the executable and script name.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  switch (command) {
    case 'stream': {
      if (rest.length > 3) {
        throw new UsageError('stream takes at most three arguments: start end step');
      }
      const range: StreamRange = {
        start: parseIndex(rest[0], 'start', 1),
        end: parseIndex(rest[1], 'end', 2),
        step: parseIndex(rest[2], 'step', 1),
      };
      if (range.step < 1) {
        throw new UsageError(`step must be at least 1, got ${range.step}`);
      }
      return { command: 'stream', range };
    }
    case 'local':
    case 'status':
      if (rest.length > 0) {
        throw new UsageError(`${command} takes no arguments`);
      }
      return { command };
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    default:
      throw new UsageError(`Unknown command '${command}'`);
  }
}
