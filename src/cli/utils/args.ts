import type { OutputFormat } from '../../lib/formatters.js';

/**
 * Indices of values that belong to `--flag <value>` pairs
 */
function flagValueIndices(args: string[], flagsWithValues: string[]): Set<number> {
  const indices = new Set<number>();
  args.forEach((arg, i) => {
    if (flagsWithValues.includes(arg) && i + 1 < args.length) {
      indices.add(i + 1);
    }
  });
  return indices;
}

/**
 * Find all positional arguments in args, skipping flags and their values.
 * --flag <value> pairs are identified by their indices so we never mistake
 * a flag's value for a positional argument even if they are equal strings.
 */
export function findPositionals(args: string[], flagsWithValues: string[]): string[] {
  const skip = flagValueIndices(args, flagsWithValues);
  return args.filter((arg, i) => !arg.startsWith('-') && !skip.has(i));
}

/**
 * Find the first positional argument
 */
export function findPositional(args: string[], flagsWithValues: string[]): string | undefined {
  return findPositionals(args, flagsWithValues)[0];
}

/**
 * Value following a flag, if present
 */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : undefined;
}

/**
 * --json wins over --xml; human output otherwise
 */
export function getOutputFormat(args: string[]): OutputFormat {
  if (args.includes('--json')) return 'json';
  if (args.includes('--xml')) return 'xml';
  return 'human';
}
