/**
 * ReleaseStore Interface
 *
 * One markdown file per dedup key. The directory listing is the only index:
 * what is already captured is recovered from the files at run start.
 */

import type { DedupKey, SourceKind } from '../ingestion/types.js';

/**
 * A project within a source kind; the unit a store directory listing covers
 */
export interface StoreScope {
  sourceKind: SourceKind;
  projectName: string;
}

export interface StoredEntry {
  path: string;
  /** File content including the content-hash line */
  text: string;
  /** Cached hash, or the hash recomputed from the text when the line is missing */
  contentHash: string;
}

/**
 * ReleaseStore interface
 *
 * All implementations must:
 * - Derive paths from the dedup key only, never outside the store root
 * - Replace entries atomically (readers see the old or the new content, never a partial file)
 */
export interface ReleaseStore {
  readonly root: string;

  /**
   * Ensure the store root exists, is a directory and is writable
   *
   * @throws ConfigurationError when it is not usable
   */
  validateRoot(): Promise<void>;

  /**
   * Absolute path of the entry for a dedup key
   *
   * @throws StorePathError when a key component is unsafe
   */
  pathFor(key: DedupKey): string;

  /**
   * Entries of a scope, keyed by file stem (the sanitized version)
   */
  listVersions(scope: StoreScope): Promise<Map<string, string>>;

  /**
   * Read the entry for a dedup key, or null if there is none
   */
  read(key: DedupKey): Promise<StoredEntry | null>;

  /**
   * Atomically create or replace the entry for a dedup key
   *
   * @param text - Complete file content
   * @returns Path written
   * @throws StorePermissionError, StorePathError
   */
  write(key: DedupKey, text: string): Promise<string>;
}
