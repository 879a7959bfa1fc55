/**
 * Human-readable run output
 */

import { relative, isAbsolute } from 'path';
import type { RunOutcome, RunSummary } from '../ingestion/types.js';

function displayPath(path: string, cwd: string): string {
  const rel = relative(cwd, path);
  return rel && !rel.startsWith('..') && !isAbsolute(rel) ? rel : path;
}

/**
 * One status line per identifier, e.g. `written  1.101  releases/vscode/1.101.md (new)`
 */
export function formatOutcome(outcome: RunOutcome, cwd: string): string {
  const status = outcome.status.padEnd(7);
  if (outcome.status === 'failed') {
    return `${status}  ${outcome.identifier}  ${outcome.reason ?? 'unknown error'}`;
  }
  const label = outcome.version ?? outcome.identifier;
  const path = outcome.path ? displayPath(outcome.path, cwd) : '-';
  return `${status}  ${label}  ${path} (${outcome.reason ?? outcome.status})`;
}

export function formatSummaryLine(summary: RunSummary): string {
  return `Summary: ${summary.written} written, ${summary.skipped} skipped, ${summary.failed} failed`;
}

export function formatSummary(summary: RunSummary, cwd: string): string[] {
  return [...summary.outcomes.map(outcome => formatOutcome(outcome, cwd)), formatSummaryLine(summary)];
}
