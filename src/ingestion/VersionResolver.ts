/**
 * VersionResolver
 *
 * Decides per identifier whether a rendered release must be written or is
 * already captured. Each identifier moves through
 *
 *   UNSEEN -> SKIP | WRITE -> DONE
 *
 * with ERROR reachable from any non-terminal state. A store scope is listed
 * at most once per run; resolution and write of one dedup key are serialized.
 */

import { AppError, ErrorCode } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { ReleaseStore, StoreScope } from '../store/ReleaseStore.js';
import { formatDedupKey, type DedupKey } from './types.js';

export type ResolutionState = 'UNSEEN' | 'SKIP' | 'WRITE' | 'DONE' | 'ERROR';

const TRANSITIONS: Record<ResolutionState, readonly ResolutionState[]> = {
  UNSEEN: ['SKIP', 'WRITE', 'ERROR'],
  SKIP: ['DONE', 'ERROR'],
  WRITE: ['DONE', 'ERROR'],
  DONE: [],
  ERROR: [],
};

export type ResolutionReason = 'new' | 'changed' | 'unchanged';

export interface Resolution {
  decision: 'SKIP' | 'WRITE';
  reason: ResolutionReason;
  path: string;
}

export class IllegalTransitionError extends AppError {
  constructor(identifier: string, from: ResolutionState, to: ResolutionState) {
    super(`Illegal resolution transition for '${identifier}': ${from} -> ${to}`, ErrorCode.INTERNAL, false, {
      identifier,
      from,
      to,
    });
  }
}

function scopeId(scope: StoreScope): string {
  return `${scope.sourceKind}:${scope.projectName}`;
}

export class VersionResolver {
  private readonly states = new Map<string, ResolutionState>();
  /** Listing per scope: file path -> present */
  private readonly listings = new Map<string, Promise<Set<string>>>();
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly store: ReleaseStore) {}

  stateOf(identifier: string): ResolutionState {
    return this.states.get(identifier) ?? 'UNSEEN';
  }

  isTerminal(identifier: string): boolean {
    return TRANSITIONS[this.stateOf(identifier)].length === 0;
  }

  /**
   * Decide SKIP or WRITE for a rendered release by comparing content hashes
   */
  async resolve(identifier: string, key: DedupKey, contentHash: string): Promise<Resolution> {
    const path = this.store.pathFor(key);
    const listing = await this.listing(key);

    let resolution: Resolution;
    if (!listing.has(path)) {
      resolution = { decision: 'WRITE', reason: 'new', path };
    } else {
      const entry = await this.store.read(key);
      if (!entry) {
        resolution = { decision: 'WRITE', reason: 'new', path };
      } else if (entry.contentHash === contentHash) {
        resolution = { decision: 'SKIP', reason: 'unchanged', path };
      } else {
        resolution = { decision: 'WRITE', reason: 'changed', path };
      }
    }

    this.transition(identifier, resolution.decision);
    logger.debug({ identifier, key: formatDedupKey(key), ...resolution }, 'Resolved release');
    return resolution;
  }

  /**
   * Record that the entry at `path` now exists (after a write)
   */
  async recordWrite(key: DedupKey, path: string): Promise<void> {
    (await this.listing(key)).add(path);
  }

  complete(identifier: string): void {
    this.transition(identifier, 'DONE');
  }

  fail(identifier: string): void {
    this.transition(identifier, 'ERROR');
  }

  /**
   * Run `task` after every earlier task for the same dedup key has settled
   */
  async withKeyLock<T>(key: DedupKey, task: () => Promise<T>): Promise<T> {
    const id = formatDedupKey(key);
    const previous = this.locks.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(id, settled);

    try {
      return await run;
    } finally {
      if (this.locks.get(id) === settled) {
        this.locks.delete(id);
      }
    }
  }

  private listing(scope: StoreScope): Promise<Set<string>> {
    const id = scopeId(scope);
    let listing = this.listings.get(id);
    if (!listing) {
      listing = this.store
        .listVersions({ sourceKind: scope.sourceKind, projectName: scope.projectName })
        .then(versions => new Set(versions.values()));
      this.listings.set(id, listing);
    }
    return listing;
  }

  private transition(identifier: string, to: ResolutionState): void {
    const from = this.stateOf(identifier);
    if (!TRANSITIONS[from].includes(to)) {
      throw new IllegalTransitionError(identifier, from, to);
    }
    this.states.set(identifier, to);
  }
}
