/**
 * Run Orchestrator - One invocation against one source
 *
 * Workflow:
 * 1. Validate the store root
 * 2. Resolve the selector to identifiers
 * 3. Per identifier, under a bounded pool: fetch (with retry) -> normalize ->
 *    resolve -> render -> write
 * 4. Summarize outcomes in identifier order
 *
 * Per-identifier errors never escape; selector and configuration errors abort
 * the run.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type { SourceAdapter } from '../adapters/SourceAdapter.js';
import { defaultSourceConfig, type SourceConfig } from '../config/sourceConfig.js';
import { renderRelease } from '../rendering/MarkdownRenderer.js';
import type { ReleaseStore } from '../store/ReleaseStore.js';
import { isInvocationError, RateLimitedError, toAppError } from '../types/errors.js';
import { appendContentHash } from '../utils/contentHash.js';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { createChildLogger } from '../utils/logger.js';
import { retryWithBackoff, type RetryConfig } from '../utils/retry.js';
import { normalizeDocument } from './normalizers/index.js';
import {
  dedupKeyOf,
  describeSelector,
  formatDedupKey,
  systemClock,
  type Clock,
  type RunOutcome,
  type RunSummary,
  type Selector,
} from './types.js';
import { VersionResolver } from './VersionResolver.js';

export const DEFAULT_CONCURRENCY = 4;

/**
 * Configuration for RunOrchestrator
 */
export interface RunOrchestratorConfig {
  store: ReleaseStore;
  /** Source configuration used by the normalizers (default: built-in) */
  sourceConfig?: SourceConfig;
  /** Max identifiers processed at once (default: 4) */
  concurrency?: number;
  /** Retry policy for upstream calls */
  retry?: RetryConfig;
  clock?: Clock;
}

/**
 * Process exit code for a finished run: 1 when any identifier failed
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.failed > 0 ? 1 : 0;
}

export class RunOrchestrator {
  private readonly store: ReleaseStore;
  private readonly sourceConfig: SourceConfig;
  private readonly concurrency: number;
  private readonly retry: RetryConfig;
  private readonly clock: Clock;

  constructor(config: RunOrchestratorConfig) {
    this.store = config.store;
    this.sourceConfig = config.sourceConfig ?? defaultSourceConfig;
    this.concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    this.retry = config.retry ?? {};
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Run one selector against one source
   *
   * @throws ConfigurationError when the store root is unusable
   * @throws InvalidSelectorError when the adapter cannot serve the selector
   */
  async run(adapter: SourceAdapter, selector: Selector): Promise<RunSummary> {
    const startedAt = this.clock().toISOString();
    const started = Date.now();
    const runLogger = createChildLogger({
      runId: randomUUID(),
      sourceKind: adapter.kind,
      selector: describeSelector(selector),
    });

    await this.store.validateRoot();

    const limiter = new ConcurrencyLimiter(this.concurrency);
    const retryConfig = this.retryConfigFor(limiter);

    let identifiers: string[];
    try {
      identifiers = await retryWithBackoff(
        () => adapter.resolveIdentifiers(selector),
        retryConfig,
        `resolve ${describeSelector(selector)}`
      );
    } catch (error) {
      if (isInvocationError(error)) {
        throw error;
      }
      const appError = toAppError(error);
      runLogger.error({ error: appError.message, code: appError.code }, 'Selector resolution failed');
      return this.summarize(adapter, selector, startedAt, started, [
        {
          identifier: describeSelector(selector),
          status: 'failed',
          reason: appError.message,
          errorCode: appError.code,
        },
      ], runLogger);
    }

    identifiers = Array.from(new Set(identifiers));
    runLogger.info({ count: identifiers.length, concurrency: this.concurrency }, 'Resolved identifiers');

    const resolver = new VersionResolver(this.store);
    const outcomes = await Promise.all(
      identifiers.map(identifier =>
        limiter.run(() => this.processIdentifier(adapter, identifier, resolver, retryConfig, runLogger))
      )
    );

    return this.summarize(adapter, selector, startedAt, started, outcomes, runLogger);
  }

  private async processIdentifier(
    adapter: SourceAdapter,
    identifier: string,
    resolver: VersionResolver,
    retryConfig: RetryConfig,
    runLogger: Logger
  ): Promise<RunOutcome> {
    let version: string | undefined;
    try {
      const raw = await retryWithBackoff(() => adapter.fetchDocument(identifier), retryConfig, identifier);
      const record = normalizeDocument(raw, this.clock, this.sourceConfig);
      version = record.version;
      const rendered = renderRelease(record);
      const key = dedupKeyOf(record);

      return await resolver.withKeyLock(key, async (): Promise<RunOutcome> => {
        const resolution = await resolver.resolve(identifier, key, rendered.contentHash);

        if (resolution.decision === 'SKIP') {
          resolver.complete(identifier);
          runLogger.debug({ identifier, key: formatDedupKey(key) }, 'Release unchanged, skipping');
          return { identifier, status: 'skipped', version: record.version, path: resolution.path, reason: 'unchanged' };
        }

        const path = await this.store.write(key, appendContentHash(rendered.text, rendered.contentHash));
        await resolver.recordWrite(key, path);
        resolver.complete(identifier);
        runLogger.info({ identifier, path, reason: resolution.reason }, 'Release written');
        return { identifier, status: 'written', version: record.version, path, reason: resolution.reason };
      });
    } catch (error) {
      if (!resolver.isTerminal(identifier)) {
        resolver.fail(identifier);
      }
      const appError = toAppError(error);
      runLogger.error({ identifier, error: appError.message, code: appError.code }, 'Identifier failed');
      return { identifier, status: 'failed', version, reason: appError.message, errorCode: appError.code };
    }
  }

  /**
   * Retry policy whose rate-limit retries also pause the pool
   */
  private retryConfigFor(limiter: ConcurrencyLimiter): RetryConfig {
    return {
      ...this.retry,
      onRetry: (error, attempt, delay) => {
        if (error instanceof RateLimitedError) {
          limiter.pauseFor(delay);
        }
        this.retry.onRetry?.(error, attempt, delay);
      },
    };
  }

  private summarize(
    adapter: SourceAdapter,
    selector: Selector,
    startedAt: string,
    started: number,
    outcomes: RunOutcome[],
    runLogger: Logger
  ): RunSummary {
    const summary: RunSummary = {
      sourceKind: adapter.kind,
      selector,
      outcomes,
      written: outcomes.filter(outcome => outcome.status === 'written').length,
      skipped: outcomes.filter(outcome => outcome.status === 'skipped').length,
      failed: outcomes.filter(outcome => outcome.status === 'failed').length,
      startedAt,
      durationMs: Date.now() - started,
    };

    runLogger.info(
      { written: summary.written, skipped: summary.skipped, failed: summary.failed, durationMs: summary.durationMs },
      'Run completed'
    );
    return summary;
  }
}
