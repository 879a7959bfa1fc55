/**
 * Generic web page normalizer
 */

import type { HtmlExtractor } from '../../extraction/html/HtmlExtractor.js';
import { MalformedSourceError } from '../../types/errors.js';
import type { RawDocument, ReleaseRecord, ReleaseSection } from '../types.js';
import {
  finalizeContributors,
  finalizeDownloads,
  finalizeSections,
  githubHandleFromUrl,
  LEAD_SECTION_HEADING,
  sourceDate,
} from './sections.js';
import { findVersionToken, normalizeVersion } from './version.js';

/** Heading of the single section of a page without sub-headings */
export const SINGLE_SECTION_HEADING = 'Changes';

const DOWNLOAD_EXTENSIONS = /\.(?:zip|tar\.gz|tgz|tar\.bz2|tar\.xz|7z|dmg|pkg|exe|msi|deb|rpm|appimage|snap|whl|jar|apk)$/i;

const MONTH = '(?:January|February|March|April|May|June|July|August|September|October|November|December)';
const DATE_VALUE = `(${MONTH}\\s+\\d{1,2},\\s+\\d{4}|\\d{4}-\\d{2}-\\d{2}|\\d{1,2}\\s+${MONTH}\\s+\\d{4})`;
const DATE_PATTERNS = [
  new RegExp(`Release date:\\s*${DATE_VALUE}`, 'i'),
  new RegExp(`Published:\\s*${DATE_VALUE}`, 'i'),
  new RegExp(`Date:\\s*${DATE_VALUE}`, 'i'),
  new RegExp(`\\b(${MONTH}\\s+\\d{1,2},\\s+\\d{4})\\b`),
  /\b(\d{4}-\d{2}-\d{2})\b/,
];

/**
 * Lower-case, dash-separated slug of free text
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 80)
    .replace(/-+$/, '');
}

function findDateInText(text: string): string | undefined {
  const plain = text.replace(/[*_`]/g, '');
  for (const pattern of DATE_PATTERNS) {
    const match = pattern.exec(plain);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Percent-decoded path segment, or the segment as is when its escapes are malformed
 */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return segment;
    }
    throw error;
  }
}

function downloadLabel(text: string, url: string): string {
  if (text) {
    return text;
  }
  const segments = new URL(url).pathname.split('/').filter(Boolean);
  const last = segments[segments.length - 1];
  return last === undefined ? url : decodeSegment(last);
}

export function normalizeWebPage(raw: RawDocument, scrapedAt: string, extractor: HtmlExtractor): ReleaseRecord {
  const context = { identifier: raw.identifierHint, originUrl: raw.originUrl };

  if (raw.payload.type !== 'html') {
    throw new MalformedSourceError('Web page payload must be HTML', context);
  }

  const projectName = raw.projectHint?.trim();
  if (!projectName) {
    throw new MalformedSourceError('Web page has no project name', context);
  }

  const extraction = extractor.extract(raw.payload.html, { level: 'auto', baseUrl: raw.originUrl });
  const title = extraction.heading ?? extraction.title;

  const token = title ? findVersionToken(title) : null;
  const version = token ? normalizeVersion(token) : title ? slugify(title) || null : null;
  if (!version) {
    throw new MalformedSourceError('Cannot determine a version for the web page: it has no usable title', context);
  }

  const sections: ReleaseSection[] =
    extraction.sections.length > 0
      ? [
          { heading: LEAD_SECTION_HEADING, body: extraction.lead },
          ...extraction.sections.map(section => ({ heading: section.heading, body: section.markdown })),
        ]
      : [{ heading: SINGLE_SECTION_HEADING, body: extraction.lead }];

  const releaseDate =
    sourceDate(extraction.metadata.publishedAt) ??
    findDateInText([extraction.lead, ...extraction.sections.map(section => section.markdown)].join('\n'));

  const downloads = extraction.links
    .filter(link => DOWNLOAD_EXTENSIONS.test(new URL(link.href).pathname))
    .map(link => ({ label: downloadLabel(link.text, link.href), url: link.href }));

  const contributors = extraction.links
    .map(link => githubHandleFromUrl(link.href))
    .filter((handle): handle is string => handle !== null);

  return {
    sourceKind: 'web',
    projectName,
    version,
    title: title && title !== version ? title : undefined,
    releaseDate,
    sections: finalizeSections(sections),
    downloadLinks: finalizeDownloads(downloads),
    contributors: finalizeContributors(contributors),
    originUrl: raw.originUrl,
    fetchedAt: raw.fetchedAt,
    scrapedAt,
  };
}
