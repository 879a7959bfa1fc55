/**
 * State shared by the commands of one CLI invocation
 */

import type { SourceAdapter } from '../adapters/SourceAdapter.js';
import { exitCodeFor } from '../ingestion/RunOrchestrator.js';
import type { Selector } from '../ingestion/types.js';
import { createRunContext, type CliDependencies, type GlobalOptions, type RunContext } from './context.js';
import { formatSummary } from './output.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURES: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CliRuntime {
  readonly deps: CliDependencies;
  out(line: string): void;
  err(line: string): void;
  exitCode: ExitCode;
}

/**
 * Run one selector against the adapter built from the run context, print the
 * outcome lines (or the summary as JSON) and record the exit code
 */
export async function executeRun(
  runtime: CliRuntime,
  options: GlobalOptions,
  selector: Selector,
  createAdapter: (context: RunContext) => SourceAdapter
): Promise<void> {
  const context = await createRunContext(options, runtime.deps);
  const adapter = createAdapter(context);
  const summary = await context.orchestrator.run(adapter, selector);

  if (options.json) {
    runtime.out(JSON.stringify(summary, null, 2));
  } else {
    for (const line of formatSummary(summary, context.cwd)) {
      runtime.out(line);
    }
  }

  runtime.exitCode = exitCodeFor(summary) === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURES;
}
