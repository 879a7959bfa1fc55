/**
 * relnotes command-line program
 *
 * `runCli` parses argv, runs the selected command and resolves to the process
 * exit code: 0 when nothing failed, 1 when an identifier failed, 2 for usage
 * and configuration errors.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { isInvocationError, toAppError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { registerGitHubCommand } from './commands/github.js';
import { registerVsCodeCommand } from './commands/vscode.js';
import { registerWebCommand } from './commands/web.js';
import type { CliDependencies } from './context.js';
import { EXIT_CODES, type CliRuntime, type ExitCode } from './runtime.js';
import { parseConcurrency } from './selector.js';

const packageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'package.json not readable');
    return '0.0.0';
  }
}

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name('relnotes')
    .description('Fetch release notes and store them as normalized markdown files')
    .version(getVersion(), '-V', 'Output the version number')
    .option('--output <dir>', 'Store root (default: RELEASES_ROOT or ./releases)')
    .option('--concurrency <n>', 'Max releases fetched at once', parseConcurrency)
    .option('--json', 'Print the run summary as JSON')
    .exitOverride()
    .configureOutput({
      writeOut: text => runtime.out(text.trimEnd()),
      writeErr: text => runtime.err(text.trimEnd()),
    });

  registerGitHubCommand(program, runtime);
  registerVsCodeCommand(program, runtime);
  registerWebCommand(program, runtime);

  return program;
}

/**
 * Run the CLI against `argv` (arguments only, without node and script)
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<ExitCode> {
  const runtime: CliRuntime = {
    deps,
    out: deps.stdout ?? (line => process.stdout.write(`${line}\n`)),
    err: deps.stderr ?? (line => process.stderr.write(`${line}\n`)),
    exitCode: EXIT_CODES.SUCCESS,
  };

  const program = createProgram(runtime);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return runtime.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE;
    }
    if (isInvocationError(error)) {
      runtime.err(`Error: ${error.message}`);
      return EXIT_CODES.USAGE;
    }
    const appError = toAppError(error);
    logger.error({ error: appError.message, code: appError.code }, 'Run aborted');
    runtime.err(`Error: ${appError.message}`);
    return EXIT_CODES.FAILURES;
  }
}
