/**
 * Wiring of one CLI invocation: environment, source configuration, HTTP
 * fetcher, store and orchestrator
 */

import { resolve } from 'path';
import { getEnv, type Env } from '../config/env.js';
import { AxiosHttpFetcher, type HttpFetcher } from '../config/httpClient.js';
import { loadSourceConfig, type SourceConfig } from '../config/sourceConfig.js';
import { RunOrchestrator } from '../ingestion/RunOrchestrator.js';
import type { Clock } from '../ingestion/types.js';
import { FileSystemReleaseStore } from '../store/FileSystemReleaseStore.js';
import type { RetryConfig } from '../utils/retry.js';

/**
 * Options available on every command
 */
export interface GlobalOptions {
  readonly output?: string;
  readonly concurrency?: number;
  readonly json?: boolean;
}

/**
 * Replaceable collaborators, for tests and embedding
 */
export interface CliDependencies {
  env?: Env;
  fetcher?: HttpFetcher;
  clock?: Clock;
  /** Merged over the retry policy from the environment */
  retry?: RetryConfig;
  cwd?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export interface RunContext {
  env: Env;
  sourceConfig: SourceConfig;
  fetcher: HttpFetcher;
  store: FileSystemReleaseStore;
  orchestrator: RunOrchestrator;
  cwd: string;
}

export function retryConfigFromEnv(env: Env): RetryConfig {
  return {
    maxAttempts: env.RETRY_MAX_ATTEMPTS,
    initialDelay: env.RETRY_INITIAL_DELAY_MS,
    maxDelay: env.RETRY_MAX_DELAY_MS,
  };
}

/**
 * @throws ConfigurationError for an invalid environment or configuration file
 */
export async function createRunContext(options: GlobalOptions, deps: CliDependencies = {}): Promise<RunContext> {
  const env = deps.env ?? getEnv();
  const cwd = deps.cwd ?? process.cwd();
  const sourceConfig = await loadSourceConfig({ configPath: env.RELNOTES_CONFIG, env, cwd });

  const fetcher =
    deps.fetcher ?? new AxiosHttpFetcher({ timeoutMs: env.HTTP_TIMEOUT_MS, userAgent: sourceConfig.userAgent });

  const store = new FileSystemReleaseStore(resolve(cwd, options.output ?? env.RELEASES_ROOT), { config: sourceConfig });

  const orchestrator = new RunOrchestrator({
    store,
    sourceConfig,
    concurrency: options.concurrency ?? env.FETCH_CONCURRENCY,
    retry: { ...retryConfigFromEnv(env), ...deps.retry },
    clock: deps.clock,
  });

  return { env, sourceConfig, fetcher, store, orchestrator, cwd };
}
