/**
 * FileSystemReleaseStore
 *
 * Filesystem-based implementation of ReleaseStore.
 * Entries live under {root}/{source directory}[/{project}]/{version}.md
 */

import { promises as fs, constants as fsConstants } from 'fs';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { defaultSourceConfig, sourceDirectory, type SourceConfig } from '../config/sourceConfig.js';
import { computeContentHash, readContentHash } from '../utils/contentHash.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, StorePermissionError, systemErrorCode } from '../types/errors.js';
import type { DedupKey } from '../ingestion/types.js';
import type { ReleaseStore, StoreScope, StoredEntry } from './ReleaseStore.js';
import { resolveUnderRoot, sanitizeComponent } from './pathSafety.js';

export const ENTRY_EXTENSION = '.md';
const TEMP_EXTENSION = '.tmp';
const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

/**
 * Filesystem operations the store performs, replaceable in tests
 */
export interface StoreFileSystem {
  mkdir(path: string): Promise<void>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(path: string): Promise<void>;
  readFile(path: string): Promise<string>;
  readdir(path: string): Promise<string[]>;
  isDirectory(path: string): Promise<boolean>;
  assertWritable(path: string): Promise<void>;
}

export const nodeFileSystem: StoreFileSystem = {
  mkdir: async path => {
    await fs.mkdir(path, { recursive: true });
  },
  writeFile: (path, data) => fs.writeFile(path, data, 'utf8'),
  rename: (from, to) => fs.rename(from, to),
  unlink: path => fs.unlink(path),
  readFile: path => fs.readFile(path, 'utf8'),
  readdir: path => fs.readdir(path),
  isDirectory: async path => (await fs.stat(path)).isDirectory(),
  assertWritable: path => fs.access(path, fsConstants.W_OK),
};

export interface FileSystemReleaseStoreOptions {
  /** Source directory names (default: the built-in source configuration) */
  config?: SourceConfig;
  fileSystem?: StoreFileSystem;
}

function isPermissionError(error: unknown): boolean {
  const code = systemErrorCode(error);
  return code !== undefined && PERMISSION_CODES.has(code);
}

/**
 * FileSystemReleaseStore implementation
 */
export class FileSystemReleaseStore implements ReleaseStore {
  readonly root: string;
  private readonly config: SourceConfig;
  private readonly fs: StoreFileSystem;

  /**
   * @param root - Store root directory
   */
  constructor(root: string, options: FileSystemReleaseStoreOptions = {}) {
    this.root = root;
    this.config = options.config ?? defaultSourceConfig;
    this.fs = options.fileSystem ?? nodeFileSystem;
  }

  async validateRoot(): Promise<void> {
    try {
      await this.fs.mkdir(this.root);
    } catch (error) {
      throw new ConfigurationError(`Store root ${this.root} cannot be created: ${errorMessage(error)}`, {
        root: this.root,
        code: systemErrorCode(error),
      });
    }

    if (!(await this.fs.isDirectory(this.root))) {
      throw new ConfigurationError(`Store root ${this.root} is not a directory`, { root: this.root });
    }

    try {
      await this.fs.assertWritable(this.root);
    } catch (error) {
      throw new ConfigurationError(`Store root ${this.root} is not writable`, {
        root: this.root,
        code: systemErrorCode(error),
      });
    }
  }

  pathFor(key: DedupKey): string {
    const file = `${sanitizeComponent(key.version, 'version')}${ENTRY_EXTENSION}`;
    return resolveUnderRoot(this.root, ...this.scopeComponents(key), file);
  }

  async listVersions(scope: StoreScope): Promise<Map<string, string>> {
    const directory = resolveUnderRoot(this.root, ...this.scopeComponents(scope));
    const versions = new Map<string, string>();

    let names: string[];
    try {
      names = await this.fs.readdir(directory);
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') {
        return versions;
      }
      throw this.mapError(error, directory);
    }

    for (const name of names.sort()) {
      if (name.startsWith('.') || name.endsWith(TEMP_EXTENSION) || !name.endsWith(ENTRY_EXTENSION)) {
        continue;
      }
      versions.set(name.slice(0, -ENTRY_EXTENSION.length), join(directory, name));
    }

    logger.debug({ scope, directory, count: versions.size }, 'Listed store scope');
    return versions;
  }

  async read(key: DedupKey): Promise<StoredEntry | null> {
    const path = this.pathFor(key);
    let text: string;
    try {
      text = await this.fs.readFile(path);
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') {
        return null;
      }
      throw this.mapError(error, path);
    }

    return {
      path,
      text,
      contentHash: readContentHash(text) ?? computeContentHash(text),
    };
  }

  async write(key: DedupKey, text: string): Promise<string> {
    const filePath = this.pathFor(key);
    const directory = dirname(filePath);
    const tempPath = join(
      directory,
      `.${basename(filePath)}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_EXTENSION}`
    );

    // Write file atomically (write to temp file, then rename)
    try {
      await this.fs.mkdir(directory);
      await this.fs.writeFile(tempPath, text);
      await this.fs.rename(tempPath, filePath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      throw this.mapError(error, filePath);
    }

    logger.debug({ path: filePath, bytes: Buffer.byteLength(text, 'utf8') }, 'Store entry written');
    return filePath;
  }

  private scopeComponents(scope: StoreScope): string[] {
    const directory = sanitizeComponent(sourceDirectory(this.config, scope.sourceKind), 'source directory');
    switch (scope.sourceKind) {
      case 'github':
        return [directory, ...scope.projectName.split('/').map(part => sanitizeComponent(part, 'project name'))];
      case 'vscode':
        return [directory];
      case 'web':
        return [directory, sanitizeComponent(scope.projectName, 'project name')];
    }
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await this.fs.unlink(tempPath);
    } catch (cleanupError) {
      if (systemErrorCode(cleanupError) !== 'ENOENT') {
        logger.warn({ tempPath, error: errorMessage(cleanupError) }, 'Failed to remove temporary store file');
      }
    }
  }

  private mapError(error: unknown, path: string): unknown {
    if (isPermissionError(error)) {
      logger.error(
        { path, root: this.root, code: systemErrorCode(error) },
        'Permission denied in release store. Check file system permissions of the store root.'
      );
      return new StorePermissionError(path, error);
    }
    return error;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
