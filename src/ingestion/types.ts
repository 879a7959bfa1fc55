/**
 * Core types of the ingestion pipeline: selectors, raw documents, canonical
 * release records and per-identifier run outcomes.
 */

import type { ErrorCode } from '../types/errors.js';

export type SourceKind = 'github' | 'vscode' | 'web';

export const SOURCE_KINDS: readonly SourceKind[] = ['github', 'vscode', 'web'];

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Which identifiers a single invocation processes
 */
export type Selector =
  | { kind: 'latest' }
  | { kind: 'exact'; version: string }
  | { kind: 'all' }
  | { kind: 'range'; from: string; to: string };

export function describeSelector(selector: Selector): string {
  switch (selector.kind) {
    case 'latest':
      return 'latest';
    case 'exact':
      return selector.version;
    case 'all':
      return 'all';
    case 'range':
      return `${selector.from}..${selector.to}`;
  }
}

export type RawPayload =
  | { type: 'json'; data: unknown }
  | { type: 'html'; html: string };

/**
 * Source-agnostic fetch result. Lives for one orchestration step.
 */
export interface RawDocument {
  sourceKind: SourceKind;
  /** Identifier the adapter fetched (tag, version, URL) */
  identifierHint: string;
  /** Project the adapter was configured for (owner/repo, page name) */
  projectHint?: string;
  payload: RawPayload;
  /** ISO timestamp */
  fetchedAt: string;
  originUrl: string;
}

export interface ReleaseSection {
  heading: string;
  body: string;
}

export interface DownloadLink {
  label: string;
  url: string;
}

/**
 * Canonical normalized release
 *
 * `(sourceKind, projectName, version)` is the dedup key and the file-path key.
 */
export interface ReleaseRecord {
  sourceKind: SourceKind;
  projectName: string;
  version: string;
  /** Release name when the source gives one that differs from the version */
  title?: string;
  releaseDate?: string;
  sections: ReleaseSection[];
  downloadLinks: DownloadLink[];
  /** Sorted, unique */
  contributors: string[];
  originUrl: string;
  fetchedAt: string;
  scrapedAt: string;
}

export interface DedupKey {
  sourceKind: SourceKind;
  projectName: string;
  version: string;
}

export function dedupKeyOf(record: Pick<ReleaseRecord, 'sourceKind' | 'projectName' | 'version'>): DedupKey {
  return { sourceKind: record.sourceKind, projectName: record.projectName, version: record.version };
}

export function formatDedupKey(key: DedupKey): string {
  return `${key.sourceKind}:${key.projectName}@${key.version}`;
}

export type OutcomeStatus = 'written' | 'skipped' | 'failed';

export interface RunOutcome {
  /** Identifier as resolved from the selector */
  identifier: string;
  status: OutcomeStatus;
  /** Normalized version, once known */
  version?: string;
  path?: string;
  /** 'new' | 'changed' | 'unchanged', or the failure message */
  reason?: string;
  errorCode?: ErrorCode;
}

export interface RunSummary {
  sourceKind: SourceKind;
  selector: Selector;
  outcomes: RunOutcome[];
  written: number;
  skipped: number;
  failed: number;
  startedAt: string;
  durationMs: number;
}
