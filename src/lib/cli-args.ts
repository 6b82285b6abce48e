import { isCommandName } from './mastodon-client-types.js';

/** Global options that consume the following argument as their value. */
const VALUE_OPTIONS = new Set(['--instance', '--limit', '--timeout']);

export type CliInvocation =
  | { kind: 'run'; argv: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'usage' }
  | { kind: 'unknown'; command: string };

/**
 * Index of the first positional argument, skipping global options and their
 * values. `--opt=value` counts as one token.
 */
export function findCommandIndex(args: readonly string[]): number {
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? '';
    if (arg === '--') {
      return i + 1 < args.length ? i + 1 : -1;
    }
    if (arg.startsWith('-')) {
      if (VALUE_OPTIONS.has(arg)) {
        i += 1;
      }
      continue;
    }
    return i;
  }
  return -1;
}

/**
 * Decide what to do with the raw arguments before commander sees them, so an
 * unknown command can be reported through the same channels as other errors.
 */
export function resolveCliInvocation(args: readonly string[], programName: string): CliInvocation {
  const index = findCommandIndex(args);
  const command = index >= 0 ? args[index] : undefined;

  if (command === undefined) {
    if (args.includes('--help') || args.includes('-h')) {
      return { kind: 'help' };
    }
    if (args.includes('--version') || args.includes('-V')) {
      return { kind: 'version' };
    }
    return { kind: 'usage' };
  }

  if (command === 'help' || isCommandName(command)) {
    return { kind: 'run', argv: ['node', programName, ...args] };
  }

  return { kind: 'unknown', command };
}
