/**
 * Shared CLI flag helpers.
 *
 * Centralized utilities for reading flags and positional arguments
 * from CLI argument arrays.
 */

/** Config file read when --config is not given. */
export const DEFAULT_CONFIG_FILE = 'conftree.json';

/** Flags that consume the argument after them. */
export const VALUE_FLAGS = ['--config', '--format', '--out', '--exclude', '--indent'];

/**
 * Extract a named flag's value from an argument array.
 * Returns the string following `flag`, or undefined if not present.
 */
export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/**
 * Every value of a repeatable flag, in order.
 */
export function getFlagValues(args: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length - 1; i++) {
    if (args[i] === flag) {
      values.push(args[i + 1]);
      i++;
    }
  }
  return values;
}

/**
 * Arguments that are neither flags nor flag values.
 */
export function getPositionals(args: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.includes(arg)) {
      i++;
    } else if (!arg.startsWith('-')) {
      positionals.push(arg);
    }
  }
  return positionals;
}
