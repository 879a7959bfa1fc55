import { describe, it, expect } from 'vitest';
import { renderRelease } from '../src/rendering/MarkdownRenderer.js';
import type { ReleaseRecord } from '../src/ingestion/types.js';
import {
  appendContentHash,
  computeContentHash,
  readContentHash,
  stripContentHash,
} from '../src/utils/contentHash.js';

const record: ReleaseRecord = {
  sourceKind: 'web',
  projectName: 'dataset-tools',
  version: '1.0',
  sections: [{ heading: 'Overview', body: 'Body text.' }],
  downloadLinks: [],
  contributors: [],
  originUrl: 'https://example.test/1.0',
  fetchedAt: '2025-01-01T00:00:00.000Z',
  scrapedAt: '2025-01-01T00:00:00.000Z',
};

function withBody(body: string, scrapedAt: string = record.scrapedAt): ReleaseRecord {
  return { ...record, scrapedAt, sections: [{ heading: 'Overview', body }] };
}

describe('Content hash', () => {
  it('should not depend on the scrape time', () => {
    expect(renderRelease(withBody('Body text.', '2025-02-01T12:30:00.000Z')).contentHash).toBe(
      renderRelease(withBody('Body text.')).contentHash
    );
  });

  it('should change when the content changes', () => {
    expect(renderRelease(withBody('Edited.')).contentHash).not.toBe(renderRelease(withBody('Body text.')).contentHash);
  });

  it('should see edits to body lines shaped like the scrape metadata', () => {
    const before = renderRelease(withBody('**Scraped**: data set A, 120 pages\n\n*Scraped from the archive on Monday*'));
    const after = renderRelease(withBody('**Scraped**: data set B, 140 pages\n\n*Scraped from the archive on Friday*'));

    expect(after.contentHash).not.toBe(before.contentHash);
  });

  it('should produce a SHA-256 hex digest', () => {
    expect(computeContentHash('x')).toBe('2d711642b726b04401627ca9fbac32f5c8530fb1903cc4db02258717921a4881');
  });

  it('should ignore line endings', () => {
    expect(computeContentHash('# Project\r\n\r\nBody\r\n')).toBe(computeContentHash('# Project\n\nBody\n'));
  });

  it('should store the hash as the last line and read it back', () => {
    const { text, contentHash } = renderRelease(record);
    const stored = appendContentHash(text, contentHash);

    expect(stored.endsWith(`<!-- content-sha256: ${contentHash} -->\n`)).toBe(true);
    expect(readContentHash(stored)).toBe(contentHash);
    expect(stripContentHash(stored)).toBe(text);
    expect(computeContentHash(stored)).toBe(computeContentHash(text));
  });

  it('should return null when the marker is missing', () => {
    expect(readContentHash('# Project - 1.0\n')).toBeNull();
  });
});
