/**
 * VS Code Command
 *
 * Usage:
 *   relnotes vscode (--latest | --version <major.minor> | --all | --from <a> --to <b>)
 */

import type { Command } from 'commander';
import { VsCodeUpdatesAdapter } from '../../adapters/vscode/VsCodeUpdatesAdapter.js';
import type { GlobalOptions } from '../context.js';
import { executeRun, type CliRuntime } from '../runtime.js';
import { addSelectorOptions, selectorFromOptions, type SelectorOptions } from '../selector.js';

interface VsCodeOptions extends SelectorOptions, GlobalOptions {}

export function registerVsCodeCommand(program: Command, runtime: CliRuntime): void {
  const command = program.command('vscode').description('Fetch Visual Studio Code release notes');

  addSelectorOptions(command, 'major.minor, e.g. 1.101', 'major.minor versions').action(
    async (_options: VsCodeOptions, cmd: Command) => {
      const options = cmd.optsWithGlobals<VsCodeOptions>();
      const selector = selectorFromOptions(options);

      await executeRun(
        runtime,
        options,
        selector,
        context =>
          new VsCodeUpdatesAdapter({
            fetcher: context.fetcher,
            updatesUrl: context.sourceConfig.vscode.updatesUrl,
            clock: runtime.deps.clock,
          })
      );
    }
  );
}
