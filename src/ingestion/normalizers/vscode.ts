/**
 * Visual Studio Code updates page normalizer
 *
 * Each monthly page has a "Month YYYY (version X.Y)" title, a release-date
 * line, a downloads paragraph and one h2 per feature area.
 */

import { isTag, isText, type AnyNode } from 'domhandler';
import { HtmlExtractor } from '../../extraction/html/HtmlExtractor.js';
import { resolveHref, textOf } from '../../extraction/html/markdown.js';
import { MalformedSourceError } from '../../types/errors.js';
import type { DownloadLink, RawDocument, ReleaseRecord, ReleaseSection } from '../types.js';
import {
  finalizeContributors,
  finalizeDownloads,
  finalizeSections,
  githubHandleFromUrl,
  LEAD_SECTION_HEADING,
} from './sections.js';
import { normalizeVersion } from './version.js';

const VERSION_IN_HEADING = /version\s+v?(\d+\.\d+)/i;
const RELEASE_DATE_IN_HEADING = /Release date:\s*([^)]+)/i;
const RELEASE_DATE_LINE = /Release date:\s*(.+)/i;
const DOWNLOADS_LINE = /^\s*Downloads\b/i;
const PLATFORM_LABEL = /([A-Za-z][A-Za-z ]*?)\s*:\s*$/;
const THANKS_HEADING = /thank|contribut/i;

export interface VsCodeNormalizerOptions {
  projectName: string;
  extractor: HtmlExtractor;
}

/**
 * Download links of the "Downloads: Windows: x64 Arm64 | Mac: ..." paragraph,
 * labelled with the platform they follow
 */
function parseDownloads(nodes: AnyNode[], baseUrl: string): DownloadLink[] {
  const links: DownloadLink[] = [];
  let platform = '';

  const visit = (node: AnyNode): void => {
    if (isText(node)) {
      const match = PLATFORM_LABEL.exec(node.data);
      if (match && !/^downloads$/i.test(match[1].trim())) {
        platform = match[1].trim();
      }
      return;
    }
    if (!isTag(node)) {
      return;
    }
    if (node.name === 'a') {
      const url = resolveHref(node.attribs.href, baseUrl);
      if (url) {
        const text = textOf(node);
        links.push({ label: [platform, text].filter(Boolean).join(' '), url });
      }
      return;
    }
    node.children.forEach(visit);
  };

  nodes.forEach(visit);
  return links;
}

export function normalizeVsCodePage(raw: RawDocument, scrapedAt: string, options: VsCodeNormalizerOptions): ReleaseRecord {
  const context = { identifier: raw.identifierHint, originUrl: raw.originUrl };

  if (raw.payload.type !== 'html') {
    throw new MalformedSourceError('Visual Studio Code updates payload must be HTML', context);
  }

  const parsed = options.extractor.parse(raw.payload.html);
  const { $, root } = parsed;

  const mainHeading = root.find('h1, h2').first();
  const headingText = mainHeading.text().replace(/\s+/g, ' ').trim();

  let version: string | null = null;
  const headingVersion = VERSION_IN_HEADING.exec(headingText);
  if (headingVersion) {
    version = headingVersion[1];
  } else {
    const anyHeading = root
      .find('h1, h2')
      .toArray()
      .map(el => VERSION_IN_HEADING.exec(textOf(el)))
      .find(match => match !== null);
    version = anyHeading ? anyHeading[1] : normalizeVersion(raw.identifierHint);
  }
  if (!version) {
    throw new MalformedSourceError('Cannot determine version of Visual Studio Code updates page', context);
  }

  let releaseDate: string | undefined;
  const dateInHeading = RELEASE_DATE_IN_HEADING.exec(headingText);
  if (dateInHeading) {
    releaseDate = dateInHeading[1].trim();
  } else {
    const dateParagraph = mainHeading.nextAll('p').first();
    const dateMatch = RELEASE_DATE_LINE.exec(dateParagraph.text().replace(/\s+/g, ' '));
    if (dateMatch) {
      releaseDate = dateMatch[1].trim();
      dateParagraph.remove();
    }
  }

  let downloads: DownloadLink[] = [];
  const downloadsParagraph = root
    .find('p')
    .filter((_, el) => DOWNLOADS_LINE.test($(el).text()))
    .first();
  if (downloadsParagraph.length > 0) {
    downloads = parseDownloads(downloadsParagraph.contents().toArray(), raw.originUrl);
    downloadsParagraph.remove();
  }

  const { lead, sections: htmlSections } = options.extractor.sections(parsed, { level: 2, baseUrl: raw.originUrl });

  const sections: ReleaseSection[] = [
    { heading: LEAD_SECTION_HEADING, body: lead },
    ...htmlSections.map(section => ({ heading: section.heading, body: section.markdown })),
  ];

  const contributors: string[] = [];
  for (const section of htmlSections) {
    if (!THANKS_HEADING.test(section.heading)) continue;
    for (const link of section.links) {
      const handle = githubHandleFromUrl(link.href);
      if (handle) {
        contributors.push(handle);
      }
    }
  }

  return {
    sourceKind: 'vscode',
    projectName: options.projectName,
    version,
    title: headingText && headingText !== version ? headingText : undefined,
    releaseDate: releaseDate || undefined,
    sections: finalizeSections(sections),
    downloadLinks: finalizeDownloads(downloads),
    contributors: finalizeContributors(contributors),
    originUrl: raw.originUrl,
    fetchedAt: raw.fetchedAt,
    scrapedAt,
  };
}
