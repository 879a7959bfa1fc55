/**
 * Markdown rendering of release records
 *
 * Byte-deterministic: the same record always renders to the same text.
 */

import { computeContentHash } from '../utils/contentHash.js';
import type { ReleaseRecord } from '../ingestion/types.js';

export interface RenderedRelease {
  text: string;
  /** Hash of the rendering with the scrape time left out */
  contentHash: string;
}

/** Stands in for the scrape time in the hashed rendering */
const HASHED_SCRAPED_AT = '-';

function escapeLinkLabel(label: string): string {
  return label.replace(/([[\]])/g, '\\$1');
}

function singleLine(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Heading for a generated block, numbered when a source section already uses it
 */
function generatedHeading(name: string, taken: ReadonlySet<string>): string {
  let heading = name;
  for (let n = 2; taken.has(heading.toLowerCase()); n++) {
    heading = `${name} (${n})`;
  }
  return heading;
}

function renderText(record: ReleaseRecord, scrapedAt: string): string {
  const blocks: string[] = [];
  const sectionHeadings = new Set(record.sections.map(section => singleLine(section.heading).toLowerCase()));

  blocks.push(`# ${singleLine(record.projectName)} - ${singleLine(record.version)}`);

  const metadata: string[] = [];
  if (record.title) {
    metadata.push(`**Title**: ${singleLine(record.title)}`);
  }
  if (record.releaseDate) {
    metadata.push(`**Release Date**: ${singleLine(record.releaseDate)}`);
  }
  metadata.push(`**Source**: ${record.originUrl}`);
  metadata.push(`**Scraped**: ${scrapedAt}`);
  blocks.push(metadata.join('\n'));

  for (const section of record.sections) {
    blocks.push(`## ${singleLine(section.heading)}\n\n${section.body.trim()}`);
  }

  if (record.downloadLinks.length > 0) {
    const items = record.downloadLinks.map(link => `- [${escapeLinkLabel(singleLine(link.label))}](${link.url})`);
    blocks.push(`## ${generatedHeading('Downloads', sectionHeadings)}\n\n${items.join('\n')}`);
  }

  if (record.contributors.length > 0) {
    const items = record.contributors.map(handle => `- ${handle}`);
    blocks.push(`## ${generatedHeading('Contributors', sectionHeadings)}\n\n${items.join('\n')}`);
  }

  blocks.push(`---\n*Scraped from ${record.originUrl} on ${scrapedAt}*`);

  return `${blocks.join('\n\n')}\n`;
}

export function renderRelease(record: ReleaseRecord): RenderedRelease {
  return {
    text: renderText(record, record.scrapedAt),
    contentHash: computeContentHash(renderText(record, HASHED_SCRAPED_AT)),
  };
}
