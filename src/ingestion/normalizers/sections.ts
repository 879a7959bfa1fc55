/**
 * Section helpers shared by the normalizers
 */

import type { DownloadLink, ReleaseSection } from '../types.js';

export const LEAD_SECTION_HEADING = 'Overview';

const ATX_HEADING = /^(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE = /^[ \t]{0,3}(`{3,}|~{3,})/;

interface MarkdownHeading {
  line: number;
  level: number;
  text: string;
}

function findHeadings(lines: string[]): MarkdownHeading[] {
  const headings: MarkdownHeading[] = [];
  let fence: string | null = null;

  lines.forEach((line, index) => {
    const fenceMatch = FENCE.exec(line);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (fence === null) {
        fence = marker[0];
      } else if (marker[0] === fence) {
        fence = null;
      }
      return;
    }
    if (fence !== null) {
      return;
    }
    const match = ATX_HEADING.exec(line);
    if (match) {
      headings.push({ line: index, level: match[1].length, text: match[2] });
    }
  });

  return headings;
}

/**
 * Split a markdown document into sections at its top-most heading level
 *
 * Deeper headings stay inside the section body. Text before the first
 * heading becomes a section named `leadHeading`.
 */
export function splitMarkdownSections(markdown: string, leadHeading: string = LEAD_SECTION_HEADING): ReleaseSection[] {
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');
  const headings = findHeadings(lines);

  if (headings.length === 0) {
    return [{ heading: leadHeading, body: lines.join('\n') }];
  }

  const boundaryLevel = Math.min(...headings.map(heading => heading.level));
  const boundaries = headings.filter(heading => heading.level === boundaryLevel);

  const sections: ReleaseSection[] = [
    { heading: leadHeading, body: lines.slice(0, boundaries[0].line).join('\n') },
  ];

  boundaries.forEach((heading, index) => {
    const end = index + 1 < boundaries.length ? boundaries[index + 1].line : lines.length;
    sections.push({
      heading: heading.text,
      body: lines.slice(heading.line + 1, end).join('\n'),
    });
  });

  return sections;
}

function cleanBody(body: string): string {
  return body
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.replace(/[ \t]+$/, ''))
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Tidy sections for a ReleaseRecord
 *
 * Headings are whitespace-collapsed, sections sharing a heading are merged
 * in order of first appearance, and sections with no content are dropped.
 */
export function finalizeSections(sections: readonly ReleaseSection[]): ReleaseSection[] {
  const merged = new Map<string, string[]>();

  for (const section of sections) {
    const heading = section.heading.replace(/\s+/g, ' ').trim();
    const body = cleanBody(section.body);
    if (!heading || !body) {
      continue;
    }
    const bodies = merged.get(heading);
    if (bodies) {
      bodies.push(body);
    } else {
      merged.set(heading, [body]);
    }
  }

  return Array.from(merged, ([heading, bodies]) => ({ heading, body: bodies.join('\n\n') }));
}

/**
 * Deduplicated, sorted contributor handles
 */
export function finalizeContributors(handles: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const handle of handles) {
    const trimmed = handle.trim().replace(/^@/, '');
    if (trimmed) {
      unique.add(trimmed);
    }
  }
  return Array.from(unique).sort(compareHandles);
}

function compareHandles(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

const MENTION = /(^|[^\w`/@])@([A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9])){0,38})(?![\w-])/g;

/**
 * GitHub-style @mentions in free text, outside code spans and fences
 */
export function findMentions(text: string): string[] {
  const withoutCode = text
    .replace(/(`{3,}|~{3,})[\s\S]*?\1/g, ' ')
    .replace(/`[^`\n]*`/g, ' ');
  const handles: string[] = [];
  for (const match of withoutCode.matchAll(MENTION)) {
    handles.push(match[2]);
  }
  return handles;
}

const GITHUB_PROFILE = /^https?:\/\/(?:www\.)?github\.com\/([A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9])){0,38})\/?$/i;
const RESERVED_GITHUB_PATHS = new Set(['about', 'features', 'orgs', 'settings', 'sponsors', 'topics', 'marketplace', 'pricing', 'login', 'join']);

/**
 * GitHub handle of a profile URL (`https://github.com/octocat`), or null for any other URL
 */
export function githubHandleFromUrl(url: string): string | null {
  const match = GITHUB_PROFILE.exec(url);
  if (!match || RESERVED_GITHUB_PATHS.has(match[1].toLowerCase())) {
    return null;
  }
  return match[1];
}

/**
 * Release date as the source supplies it: ISO timestamps become YYYY-MM-DD,
 * any other date text is kept as written
 */
export function sourceDate(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.replace(/\s+/g, ' ').trim();
  const iso = /^(\d{4}-\d{2}-\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/.exec(trimmed);
  if (iso) {
    return iso[1];
  }
  return trimmed || undefined;
}

/**
 * Download links with unique URLs, first occurrence kept, source order preserved
 */
export function finalizeDownloads(links: readonly DownloadLink[]): DownloadLink[] {
  const seen = new Set<string>();
  const result: DownloadLink[] = [];
  for (const link of links) {
    if (seen.has(link.url)) continue;
    seen.add(link.url);
    result.push({ label: link.label.replace(/\s+/g, ' ').trim() || link.url, url: link.url });
  }
  return result;
}
