/**
 * Web Command
 *
 * Usage:
 *   relnotes web --url <url> [--name <project>]
 *
 * A page has no history, so only its current state (--latest, the default)
 * can be fetched.
 */

import type { Command } from 'commander';
import { WebPageAdapter } from '../../adapters/web/WebPageAdapter.js';
import type { GlobalOptions } from '../context.js';
import { executeRun, type CliRuntime } from '../runtime.js';
import { addSelectorOptions, selectorFromOptions, type SelectorOptions } from '../selector.js';

interface WebOptions extends SelectorOptions, GlobalOptions {
  readonly url: string;
  readonly name?: string;
}

function withDefaultLatest(options: SelectorOptions): SelectorOptions {
  const none =
    !options.latest && !options.all && options.version === undefined && options.from === undefined && options.to === undefined;
  return none ? { ...options, latest: true } : options;
}

export function registerWebCommand(program: Command, runtime: CliRuntime): void {
  const command = program
    .command('web')
    .description('Fetch release notes from an arbitrary web page')
    .requiredOption('--url <url>', 'Page URL')
    .option('--name <project>', 'Project name (default: the URL host)');

  addSelectorOptions(command, 'not supported for web pages', 'not supported for web pages').action(
    async (_options: WebOptions, cmd: Command) => {
      const options = cmd.optsWithGlobals<WebOptions>();
      const selector = selectorFromOptions(withDefaultLatest(options));

      await executeRun(
        runtime,
        options,
        selector,
        context =>
          new WebPageAdapter({
            fetcher: context.fetcher,
            url: options.url,
            name: options.name,
            clock: runtime.deps.clock,
          })
      );
    }
  );
}
