/**
 * Content normalization: RawDocument -> ReleaseRecord
 *
 * Pure apart from reading the clock for `scrapedAt`.
 */

import { defaultSourceConfig, type SourceConfig } from '../../config/sourceConfig.js';
import { HtmlExtractor } from '../../extraction/html/HtmlExtractor.js';
import { validateReleaseRecord } from '../../validation/releaseSchemas.js';
import { systemClock, type Clock, type RawDocument, type ReleaseRecord } from '../types.js';
import { normalizeGitHubRelease } from './github.js';
import { normalizeVsCodePage } from './vscode.js';
import { normalizeWebPage } from './web.js';

/**
 * Scrape timestamp that is never earlier than the fetch timestamp
 */
export function clampScrapedAt(fetchedAt: string, clock: Clock): string {
  const now = clock();
  const fetched = Date.parse(fetchedAt);
  if (!isNaN(fetched) && now.getTime() < fetched) {
    return new Date(fetched).toISOString();
  }
  return now.toISOString();
}

/**
 * Normalize a fetched document into a canonical release record
 *
 * @throws MalformedSourceError when the project name or version cannot be determined
 */
export function normalizeDocument(
  raw: RawDocument,
  clock: Clock = systemClock,
  config: SourceConfig = defaultSourceConfig
): ReleaseRecord {
  const scrapedAt = clampScrapedAt(raw.fetchedAt, clock);
  const extractor = new HtmlExtractor({
    contentSelectors: config.web.contentSelectors,
    boilerplateSelectors: config.web.boilerplateSelectors,
  });

  switch (raw.sourceKind) {
    case 'github':
      return validateReleaseRecord(normalizeGitHubRelease(raw, scrapedAt));
    case 'vscode':
      return validateReleaseRecord(
        normalizeVsCodePage(raw, scrapedAt, { projectName: config.vscode.projectName, extractor })
      );
    case 'web':
      return validateReleaseRecord(normalizeWebPage(raw, scrapedAt, extractor));
  }
}

export { normalizeVersion, compareVersions, isVersionInRange, parseNumericVersion, findVersionToken } from './version.js';
export { splitMarkdownSections, finalizeSections, LEAD_SECTION_HEADING } from './sections.js';
