/**
 * GitHub Command
 *
 * Usage:
 *   relnotes github --repo <owner/repo> (--latest | --version <tag> | --all | --from <a> --to <b>)
 *
 * Range bounds are either two versions or two YYYY-MM-DD publish dates.
 */

import type { Command } from 'commander';
import { GitHubClient } from '../../adapters/github/GitHubClient.js';
import { GitHubReleaseAdapter } from '../../adapters/github/GitHubReleaseAdapter.js';
import type { GlobalOptions } from '../context.js';
import { executeRun, type CliRuntime } from '../runtime.js';
import { addSelectorOptions, selectorFromOptions, type SelectorOptions } from '../selector.js';

interface GitHubOptions extends SelectorOptions, GlobalOptions {
  readonly repo: string;
  readonly token?: string;
}

export function registerGitHubCommand(program: Command, runtime: CliRuntime): void {
  const command = program
    .command('github')
    .description('Fetch release notes from a GitHub repository')
    .requiredOption('--repo <owner/repo>', 'Repository, e.g. microsoft/vscode')
    .option('--token <token>', 'GitHub token (default: GITHUB_TOKEN)');

  addSelectorOptions(command, 'a tag, with or without a leading v', 'versions or YYYY-MM-DD dates').action(
    async (_options: GitHubOptions, cmd: Command) => {
      const options = cmd.optsWithGlobals<GitHubOptions>();
      const selector = selectorFromOptions(options);

      await executeRun(runtime, options, selector, context => {
        const client = new GitHubClient({
          fetcher: context.fetcher,
          apiBaseUrl: context.sourceConfig.github.apiBaseUrl,
          perPage: context.sourceConfig.github.perPage,
          token: options.token ?? context.env.GITHUB_TOKEN,
        });
        return new GitHubReleaseAdapter({ repository: options.repo, client, clock: runtime.deps.clock });
      });
    }
  );
}
