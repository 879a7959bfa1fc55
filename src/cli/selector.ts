/**
 * Selector options shared by the source commands
 */

import { InvalidArgumentError, type Command } from 'commander';
import { InvalidSelectorError } from '../types/errors.js';
import { parseSelector } from '../validation/releaseSchemas.js';
import type { Selector } from '../ingestion/types.js';

export interface SelectorOptions {
  readonly latest?: boolean;
  readonly version?: string;
  readonly all?: boolean;
  readonly from?: string;
  readonly to?: string;
}

/**
 * Add --latest, --version, --all and --from/--to to a command
 */
export function addSelectorOptions(command: Command, versionHint: string, rangeHint: string): Command {
  return command
    .option('--latest', 'Fetch the latest release')
    .option('--version <version>', `Fetch one release (${versionHint})`)
    .option('--all', 'Fetch every available release')
    .option('--from <bound>', `Start of an inclusive range (${rangeHint}); requires --to`)
    .option('--to <bound>', 'End of an inclusive range; requires --from');
}

/**
 * Build the selector named by the options; exactly one must be given
 *
 * @throws InvalidSelectorError
 */
export function selectorFromOptions(options: SelectorOptions): Selector {
  const hasRange = options.from !== undefined || options.to !== undefined;
  const chosen = [options.latest === true, options.version !== undefined, options.all === true, hasRange].filter(
    Boolean
  ).length;

  if (chosen !== 1) {
    throw new InvalidSelectorError('Specify exactly one of --latest, --version, --all or --from/--to');
  }
  if (hasRange && options.to === undefined) {
    throw new InvalidSelectorError('--from requires --to');
  }
  if (hasRange && options.from === undefined) {
    throw new InvalidSelectorError('--to requires --from');
  }

  if (options.latest) return parseSelector({ kind: 'latest' });
  if (options.all) return parseSelector({ kind: 'all' });
  if (options.version !== undefined) return parseSelector({ kind: 'exact', version: options.version });
  return parseSelector({ kind: 'range', from: options.from, to: options.to });
}

/**
 * Commander argument parser for --concurrency
 */
export function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 32) {
    throw new InvalidArgumentError('Must be an integer between 1 and 32.');
  }
  return parsed;
}
