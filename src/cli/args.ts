import { UsageError } from '../utils/errors.js';

export const USAGE = `Usage: todo [ITEM]
> Further details.
>
SENT!

examples:
$ todo need to do something
$ todo "I've to do something"
`;

export interface ParsedArgs {
  help: boolean;
  title: string;
}

const HELP_FLAGS = new Set(['-h', '-help', '--help']);

/**
 * Flags are only recognised before the first positional argument, so
 * `todo call -5 people` keeps `-5` in the subject.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  let help = false;
  let flagsDone = false;

  for (const arg of argv) {
    if (flagsDone || arg === '-' || !arg.startsWith('-')) {
      flagsDone = true;
      positional.push(arg);
      continue;
    }
    if (arg === '--') {
      flagsDone = true;
      continue;
    }
    if (HELP_FLAGS.has(arg)) {
      help = true;
      continue;
    }
    throw new UsageError(`flag provided but not defined: ${arg}`);
  }

  return { help, title: positional.join(' ') };
}
