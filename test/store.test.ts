import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  FileSystemReleaseStore,
  nodeFileSystem,
  type StoreFileSystem,
} from '../src/store/FileSystemReleaseStore.js';
import { sanitizeComponent } from '../src/store/pathSafety.js';
import type { DedupKey } from '../src/ingestion/types.js';
import { ConfigurationError, StorePathError, StorePermissionError } from '../src/types/errors.js';
import { appendContentHash, computeContentHash } from '../src/utils/contentHash.js';

function systemError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

const widget: DedupKey = { sourceKind: 'github', projectName: 'acme/widget', version: '1.2.0' };

describe('FileSystemReleaseStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(join(tmpdir(), 'relnotes-store-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('pathFor', () => {
    it('should lay out entries by source kind and project', () => {
      const store = new FileSystemReleaseStore(root);

      expect(store.pathFor(widget)).toBe(join(root, 'github', 'acme', 'widget', '1.2.0.md'));
      expect(store.pathFor({ sourceKind: 'vscode', projectName: 'Visual Studio Code', version: '1.101' })).toBe(
        join(root, 'vscode', '1.101.md')
      );
      expect(store.pathFor({ sourceKind: 'web', projectName: 'acme-cli', version: '4.5.0' })).toBe(
        join(root, 'other-sources', 'acme-cli', '4.5.0.md')
      );
    });

    it('should refuse path traversal in any key component', () => {
      const store = new FileSystemReleaseStore(root);

      expect(() => store.pathFor({ sourceKind: 'web', projectName: '../../etc', version: '1.0' })).toThrow(
        StorePathError
      );
      expect(() => store.pathFor({ sourceKind: 'web', projectName: 'acme', version: '../../passwd' })).toThrow(
        StorePathError
      );
      expect(() => store.pathFor({ sourceKind: 'github', projectName: 'acme/..', version: '1.0' })).toThrow(
        StorePathError
      );
    });

    it('should replace characters that are unsafe in file names', () => {
      const store = new FileSystemReleaseStore(root);
      expect(store.pathFor({ sourceKind: 'web', projectName: 'acme', version: 'a:b?c' })).toBe(
        join(root, 'other-sources', 'acme', 'a_b_c.md')
      );
    });
  });

  describe('sanitizeComponent', () => {
    it('should strip leading and trailing dots and collapse underscores', () => {
      expect(sanitizeComponent('..hidden..', 'version')).toBe('hidden');
      expect(sanitizeComponent('a<>b', 'version')).toBe('a_b');
    });

    it('should reject values with nothing left', () => {
      expect(() => sanitizeComponent('???', 'version')).toThrow(StorePathError);
    });
  });

  describe('write and read', () => {
    it('should write an entry and read it back with its cached hash', async () => {
      const store = new FileSystemReleaseStore(root);
      const text = '# acme/widget - 1.2.0\n';
      const hash = computeContentHash(text);

      const path = await store.write(widget, appendContentHash(text, hash));
      const entry = await store.read(widget);

      expect(path).toBe(store.pathFor(widget));
      expect(entry?.contentHash).toBe(hash);
      expect(entry?.text).toBe(appendContentHash(text, hash));
    });

    it('should recompute the hash of an entry without the marker line', async () => {
      const store = new FileSystemReleaseStore(root);
      await store.write(widget, '# hand edited\n');

      expect((await store.read(widget))?.contentHash).toBe(computeContentHash('# hand edited\n'));
    });

    it('should return null for a missing entry', async () => {
      const store = new FileSystemReleaseStore(root);
      expect(await store.read(widget)).toBeNull();
    });

    it('should keep the previous content and leave no temp file when the rename fails', async () => {
      const store = new FileSystemReleaseStore(root);
      await store.write(widget, 'old content\n');

      const failing: StoreFileSystem = {
        ...nodeFileSystem,
        rename: async () => {
          throw systemError('EIO: i/o error, rename', 'EIO');
        },
      };
      const broken = new FileSystemReleaseStore(root, { fileSystem: failing });

      await expect(broken.write(widget, 'new content\n')).rejects.toThrow('EIO: i/o error, rename');

      const directory = join(root, 'github', 'acme', 'widget');
      expect(await fs.readFile(join(directory, '1.2.0.md'), 'utf8')).toBe('old content\n');
      expect(await fs.readdir(directory)).toEqual(['1.2.0.md']);
    });

    it('should map permission failures to StorePermissionError', async () => {
      const denied: StoreFileSystem = {
        ...nodeFileSystem,
        writeFile: async () => {
          throw systemError('EACCES: permission denied, open', 'EACCES');
        },
      };
      const store = new FileSystemReleaseStore(root, { fileSystem: denied });

      await expect(store.write(widget, 'text\n')).rejects.toBeInstanceOf(StorePermissionError);
    });
  });

  describe('listVersions', () => {
    it('should list entry stems and skip hidden and temporary files', async () => {
      const store = new FileSystemReleaseStore(root);
      await store.write(widget, 'a\n');
      await store.write({ ...widget, version: '1.3.0' }, 'b\n');
      const directory = join(root, 'github', 'acme', 'widget');
      await fs.writeFile(join(directory, '.1.4.0.md.123.abcdef.tmp'), 'partial');
      await fs.writeFile(join(directory, 'notes.txt'), 'other');

      const versions = await store.listVersions({ sourceKind: 'github', projectName: 'acme/widget' });

      expect(Array.from(versions.keys())).toEqual(['1.2.0', '1.3.0']);
      expect(versions.get('1.2.0')).toBe(join(directory, '1.2.0.md'));
    });

    it('should return an empty listing for a scope never written', async () => {
      const store = new FileSystemReleaseStore(root);
      const versions = await store.listVersions({ sourceKind: 'web', projectName: 'nothing-yet' });
      expect(versions.size).toBe(0);
    });
  });

  describe('validateRoot', () => {
    it('should create a missing root', async () => {
      const nested = join(root, 'a', 'b');
      await new FileSystemReleaseStore(nested).validateRoot();
      expect((await fs.stat(nested)).isDirectory()).toBe(true);
    });

    it('should reject a root that is a file', async () => {
      const file = join(root, 'not-a-directory');
      await fs.writeFile(file, 'x');

      await expect(new FileSystemReleaseStore(file).validateRoot()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject a root that is not writable', async () => {
      const readOnly: StoreFileSystem = {
        ...nodeFileSystem,
        assertWritable: async () => {
          throw systemError('EACCES: permission denied, access', 'EACCES');
        },
      };

      await expect(new FileSystemReleaseStore(root, { fileSystem: readOnly }).validateRoot()).rejects.toThrow(
        'is not writable'
      );
    });
  });
});
