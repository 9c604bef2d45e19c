import type { LogLevelName } from './config/ParserConfig';

export const USAGE = 'Usage: cs2-log-replay <log-file...> [--events]';

export interface CliArgs {
  files: string[];
  printEvents: boolean;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  return {
    files: argv.filter(arg => !arg.startsWith('--')),
    printEvents: argv.includes('--events'),
  };
}

/**
 * Events go to stdout as JSON lines, so console logging is held at warn
 * (stderr) while they are printed.
 */
export function resolveConsoleLevel(level: LogLevelName, printEvents: boolean): LogLevelName {
  if (!printEvents) return level;
  return level === 'error' ? 'error' : 'warn';
}
