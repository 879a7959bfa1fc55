import { describe, it, expect } from 'vitest';
import { normalizeDocument, clampScrapedAt } from '../src/ingestion/normalizers/index.js';
import { slugify } from '../src/ingestion/normalizers/web.js';
import type { RawDocument } from '../src/ingestion/types.js';
import { MalformedSourceError } from '../src/types/errors.js';
import { fixedClock, loadFixture, loadJsonFixture } from './helpers/fixtures.js';

const FETCHED_AT = '2025-06-20T10:00:00.000Z';
const clock = fixedClock(FETCHED_AT);

function githubDocument(data: unknown): RawDocument {
  return {
    sourceKind: 'github',
    identifierHint: 'v1.2.0',
    projectHint: 'acme/widget',
    payload: { type: 'json', data },
    fetchedAt: FETCHED_AT,
    originUrl: 'https://api.github.com/repos/acme/widget/releases/tags/v1.2.0',
  };
}

function htmlDocument(sourceKind: 'vscode' | 'web', html: string, originUrl: string, projectHint?: string): RawDocument {
  return {
    sourceKind,
    identifierHint: sourceKind === 'vscode' ? '1.101' : originUrl,
    projectHint,
    payload: { type: 'html', html },
    fetchedAt: FETCHED_AT,
    originUrl,
  };
}

describe('Normalizers', () => {
  describe('GitHub releases', () => {
    const record = normalizeDocument(githubDocument(loadJsonFixture('github/release-v1.2.0.json')), clock);

    it('should key the record by repository and normalized tag', () => {
      expect(record.sourceKind).toBe('github');
      expect(record.projectName).toBe('acme/widget');
      expect(record.version).toBe('1.2.0');
    });

    it('should keep a release name that differs from the tag as title', () => {
      expect(record.title).toBe('Spring release');
    });

    it('should use the publish date', () => {
      expect(record.releaseDate).toBe('2025-03-02');
    });

    it('should split the body into sections', () => {
      expect(record.sections).toEqual([
        { heading: 'Overview', body: 'Highlights of this release.' },
        { heading: 'Features', body: '- Faster startup (#12) by @alice\n- New `--quiet` flag' },
        { heading: 'Bug Fixes', body: '- Fix crash on empty input, thanks @bob' },
      ]);
    });

    it('should list valid assets as downloads', () => {
      expect(record.downloadLinks).toEqual([
        {
          label: 'widget-1.2.0.tar.gz',
          url: 'https://github.com/acme/widget/releases/download/v1.2.0/widget-1.2.0.tar.gz',
        },
        {
          label: 'widget-1.2.0.zip',
          url: 'https://github.com/acme/widget/releases/download/v1.2.0/widget-1.2.0.zip',
        },
      ]);
    });

    it('should collect the author and mentioned users as contributors', () => {
      expect(record.contributors).toEqual(['alice', 'bob', 'carol']);
    });

    it('should point at the release page', () => {
      expect(record.originUrl).toBe('https://github.com/acme/widget/releases/tag/v1.2.0');
      expect(record.scrapedAt).toBe(FETCHED_AT);
    });

    it('should leave out a title equal to the version', () => {
      const plain = normalizeDocument(githubDocument({ tag_name: 'v2.0.0', name: 'v2.0.0', body: null }), clock);
      expect(plain.title).toBeUndefined();
      expect(plain.sections).toEqual([]);
      expect(plain.originUrl).toBe('https://api.github.com/repos/acme/widget/releases/tags/v1.2.0');
    });

    it('should reject a payload without a tag', () => {
      expect(() => normalizeDocument(githubDocument({ name: 'No tag' }), clock)).toThrow(MalformedSourceError);
    });

    it('should reject a tag without a usable version', () => {
      expect(() => normalizeDocument(githubDocument({ tag_name: '---' }), clock)).toThrow(MalformedSourceError);
    });

    it('should reject an HTML payload', () => {
      const raw = { ...githubDocument({}), payload: { type: 'html' as const, html: '<p>x</p>' } };
      expect(() => normalizeDocument(raw, clock)).toThrow(MalformedSourceError);
    });
  });

  describe('Visual Studio Code updates pages', () => {
    const record = normalizeDocument(
      htmlDocument('vscode', loadFixture('vscode/v1_101.html'), 'https://code.visualstudio.com/updates/v1_101'),
      clock
    );

    it('should read the version and release date from the page', () => {
      expect(record.projectName).toBe('Visual Studio Code');
      expect(record.version).toBe('1.101');
      expect(record.title).toBe('May 2025 (version 1.101)');
      expect(record.releaseDate).toBe('June 12, 2025');
    });

    it('should label downloads with their platform', () => {
      expect(record.downloadLinks).toEqual([
        { label: 'Windows x64', url: 'https://update.code.visualstudio.com/1.101.0/win32-x64-user/stable' },
        { label: 'Windows Arm64', url: 'https://update.code.visualstudio.com/1.101.0/win32-arm64-user/stable' },
        { label: 'Mac Universal', url: 'https://update.code.visualstudio.com/1.101.0/darwin-universal/stable' },
      ]);
    });

    it('should split the page into one section per h2', () => {
      expect(record.sections.map(section => section.heading)).toEqual(['Overview', 'Chat', 'Thank you']);
      expect(record.sections[0].body).toBe('Welcome to the May 2025 release of Visual Studio Code.');
      expect(record.sections[1].body).toBe('Chat now supports `#fetch` in prompts.\n\n- Tool sets\n- MCP prompts');
    });

    it('should take contributors from the thank-you section', () => {
      expect(record.contributors).toEqual(['Alice-Dev', 'octocat']);
    });

    it('should fall back to the requested version when the page heading has none', () => {
      const fallback = normalizeDocument(
        htmlDocument('vscode', '<html><body><main><h1>Notes</h1><p>Text.</p></main></body></html>', 'https://code.visualstudio.com/updates/v1_101'),
        clock
      );
      expect(fallback.version).toBe('1.101');
    });
  });

  describe('Web pages', () => {
    const url = 'https://acme.test/changelog';
    const record = normalizeDocument(htmlDocument('web', loadFixture('web/changelog.html'), url, 'acme-cli'), clock);

    it('should take the version from the page heading', () => {
      expect(record.projectName).toBe('acme-cli');
      expect(record.version).toBe('4.5.0');
      expect(record.title).toBe('Acme CLI 4.5.0 released');
    });

    it('should use the published time metadata as release date', () => {
      expect(record.releaseDate).toBe('2025-04-10');
    });

    it('should split sections below the page title', () => {
      expect(record.sections).toEqual([
        { heading: 'Overview', body: 'This release focuses on speed.' },
        { heading: 'New', body: '- Parallel builds by [Dana](https://github.com/dana)' },
        { heading: 'Get it', body: '[Source tarball](https://downloads.acme.test/cli/acme-4.5.0.tar.gz) and' },
      ]);
    });

    it('should treat archive and installer links as downloads', () => {
      expect(record.downloadLinks).toEqual([
        { label: 'Source tarball', url: 'https://downloads.acme.test/cli/acme-4.5.0.tar.gz' },
        { label: 'acme-4.5.0-setup.exe', url: 'https://acme.test/files/acme-4.5.0-setup.exe' },
      ]);
    });

    it('should take contributors from GitHub profile links', () => {
      expect(record.contributors).toEqual(['dana']);
    });

    it('should keep the raw file name as label when its escapes are malformed', () => {
      const page = normalizeDocument(
        htmlDocument(
          'web',
          '<html><body><main><h1>Tool 2.0</h1><p>Fixes.</p>' +
            '<a href="https://dl.example.test/tool-%E0-2.0.zip"><img src="dl.png"></a></main></body></html>',
          url,
          'tool'
        ),
        clock
      );

      expect(page.version).toBe('2.0');
      expect(page.downloadLinks).toEqual([
        { label: 'tool-%E0-2.0.zip', url: 'https://dl.example.test/tool-%E0-2.0.zip' },
      ]);
    });

    it('should use a single section and a slug version for a page without headings', () => {
      const plain = normalizeDocument(
        htmlDocument('web', '<html><head><title>Notes</title></head><body><p>Fixed things.</p></body></html>', url, 'acme'),
        clock
      );

      expect(plain.version).toBe('notes');
      expect(plain.title).toBe('Notes');
      expect(plain.sections).toEqual([{ heading: 'Changes', body: 'Fixed things.' }]);
      expect(plain.releaseDate).toBeUndefined();
    });

    it('should find a release date written in the text', () => {
      const dated = normalizeDocument(
        htmlDocument('web', '<html><body><h1>Build 7</h1><p>Published: March 3, 2025</p></body></html>', url, 'acme'),
        clock
      );
      expect(dated.releaseDate).toBe('March 3, 2025');
      expect(dated.version).toBe('build-7');
    });

    it('should reject a page without any title', () => {
      expect(() =>
        normalizeDocument(htmlDocument('web', '<html><body><p>x</p></body></html>', url, 'acme'), clock)
      ).toThrow(MalformedSourceError);
    });
  });

  describe('slugify', () => {
    it('should lower-case and dash-separate text', () => {
      expect(slugify('Café Release: Ünicode & More!')).toBe('cafe-release-unicode-more');
    });
  });

  describe('clampScrapedAt', () => {
    it('should never be earlier than the fetch time', () => {
      expect(clampScrapedAt('2025-06-20T10:00:00.000Z', fixedClock('2025-06-20T09:00:00.000Z'))).toBe(
        '2025-06-20T10:00:00.000Z'
      );
      expect(clampScrapedAt('2025-06-20T10:00:00.000Z', fixedClock('2025-06-20T11:00:00.000Z'))).toBe(
        '2025-06-20T11:00:00.000Z'
      );
    });
  });
});
