import { describe, it, expect } from 'vitest';
import { IllegalTransitionError, VersionResolver } from '../src/ingestion/VersionResolver.js';
import type { DedupKey } from '../src/ingestion/types.js';
import { appendContentHash, computeContentHash } from '../src/utils/contentHash.js';
import { InMemoryReleaseStore } from './helpers/memoryStore.js';

const key: DedupKey = { sourceKind: 'vscode', projectName: 'Visual Studio Code', version: '1.101' };
const text = '# Visual Studio Code - 1.101\n';
const hash = computeContentHash(text);

describe('VersionResolver', () => {
  it('should decide WRITE for a key without an entry', async () => {
    const store = new InMemoryReleaseStore();
    const resolver = new VersionResolver(store);

    const resolution = await resolver.resolve('1.101', key, hash);

    expect(resolution).toEqual({ decision: 'WRITE', reason: 'new', path: store.pathFor(key) });
    expect(resolver.stateOf('1.101')).toBe('WRITE');
  });

  it('should decide SKIP when the stored hash matches', async () => {
    const store = new InMemoryReleaseStore();
    await store.write(key, appendContentHash(text, hash));
    const resolver = new VersionResolver(store);

    const resolution = await resolver.resolve('1.101', key, hash);

    expect(resolution.decision).toBe('SKIP');
    expect(resolution.reason).toBe('unchanged');
  });

  it('should decide WRITE when the upstream content changed', async () => {
    const store = new InMemoryReleaseStore();
    await store.write(key, appendContentHash(text, hash));
    const resolver = new VersionResolver(store);

    const resolution = await resolver.resolve('1.101', key, computeContentHash('# edited\n'));

    expect(resolution).toMatchObject({ decision: 'WRITE', reason: 'changed' });
  });

  it('should list each scope once per run', async () => {
    const store = new InMemoryReleaseStore();
    const resolver = new VersionResolver(store);

    await resolver.resolve('1.101', key, hash);
    await resolver.resolve('1.100', { ...key, version: '1.100' }, hash);

    expect(store.listCalls).toBe(1);
  });

  it('should see entries recorded during the run', async () => {
    const store = new InMemoryReleaseStore();
    const resolver = new VersionResolver(store);

    await resolver.resolve('1.101', key, hash);
    const path = await store.write(key, appendContentHash(text, hash));
    await resolver.recordWrite(key, path);
    resolver.complete('1.101');

    const again = await resolver.resolve('v1.101', key, hash);
    expect(again.decision).toBe('SKIP');
  });

  it('should move through terminal states', async () => {
    const resolver = new VersionResolver(new InMemoryReleaseStore());

    await resolver.resolve('1.101', key, hash);
    resolver.complete('1.101');

    expect(resolver.stateOf('1.101')).toBe('DONE');
    expect(resolver.isTerminal('1.101')).toBe(true);
    expect(resolver.isTerminal('1.100')).toBe(false);
  });

  it('should allow failing an identifier that was never resolved', () => {
    const resolver = new VersionResolver(new InMemoryReleaseStore());
    resolver.fail('1.101');
    expect(resolver.stateOf('1.101')).toBe('ERROR');
  });

  it('should reject illegal transitions', async () => {
    const resolver = new VersionResolver(new InMemoryReleaseStore());

    expect(() => resolver.complete('1.101')).toThrow(IllegalTransitionError);

    await resolver.resolve('1.101', key, hash);
    resolver.complete('1.101');
    expect(() => resolver.fail('1.101')).toThrow(IllegalTransitionError);
    await expect(resolver.resolve('1.101', key, hash)).rejects.toThrow(IllegalTransitionError);
  });

  it('should serialize tasks for the same key', async () => {
    const resolver = new VersionResolver(new InMemoryReleaseStore());
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    const first = resolver.withKeyLock(key, async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = resolver.withKeyLock(key, async () => {
      events.push('second');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    release();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should run the next task after a failed one', async () => {
    const resolver = new VersionResolver(new InMemoryReleaseStore());

    await expect(resolver.withKeyLock(key, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(resolver.withKeyLock(key, async () => 'ok')).resolves.toBe('ok');
  });
});
