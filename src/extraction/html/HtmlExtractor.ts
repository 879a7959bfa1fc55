/**
 * HtmlExtractor - Extract release-note structure from HTML pages
 *
 * Removes boilerplate, locates the main content element and splits it into
 * heading-bounded sections rendered as markdown.
 */

import * as cheerio from 'cheerio';
import { isTag, type AnyNode, type Element } from 'domhandler';
import { logger } from '../../utils/logger.js';
import { nodesToMarkdown, resolveHref, textOf } from './markdown.js';

export interface HtmlLink {
  text: string;
  href: string;
}

export interface HtmlSection {
  heading: string;
  markdown: string;
  links: HtmlLink[];
}

/**
 * A parsed page with boilerplate removed
 */
export interface ParsedHtml {
  $: cheerio.CheerioAPI;
  /** Main content element */
  root: cheerio.Cheerio<Element>;
  /** <title>, or the first <h1> when there is none */
  title?: string;
  /** Text of the first <h1> in the content */
  heading?: string;
}

export interface SectionOptions {
  /** Heading level that starts a section; 'auto' picks the highest level below h1 present, if any */
  level?: number | 'auto';
  baseUrl?: string;
}

export interface HtmlExtractionResult {
  title?: string;
  heading?: string;
  /** Markdown of the content before the first section heading */
  lead: string;
  sections: HtmlSection[];
  links: HtmlLink[];
  metadata: {
    publishedAt?: string;
  };
}

export interface HtmlExtractorConfig {
  /** Candidate main-content selectors, in priority order */
  contentSelectors?: string[];
  boilerplateSelectors?: string[];
}

const DEFAULT_CONTENT_SELECTORS = ['main', 'article', '.content', '#content', '.main-content', '.post-content'];

const DEFAULT_BOILERPLATE_SELECTORS = [
  'nav',
  'header',
  'footer',
  'script',
  'style',
  'noscript',
  '[role="navigation"]',
];

const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6';

function headingLevel(node: AnyNode): number | null {
  if (!isTag(node)) {
    return null;
  }
  const match = /^h([1-6])$/.exec(node.name);
  return match ? parseInt(match[1], 10) : null;
}

export class HtmlExtractor {
  private readonly contentSelectors: string[];
  private readonly boilerplateSelectors: string[];

  constructor(config: HtmlExtractorConfig = {}) {
    this.contentSelectors = config.contentSelectors ?? DEFAULT_CONTENT_SELECTORS;
    this.boilerplateSelectors = config.boilerplateSelectors ?? DEFAULT_BOILERPLATE_SELECTORS;
  }

  /**
   * Load a page, strip boilerplate and find its main content
   */
  parse(htmlContent: string): ParsedHtml {
    const $ = cheerio.load(htmlContent);

    const documentTitle = $('title').first().text().replace(/\s+/g, ' ').trim();

    for (const selector of this.boilerplateSelectors) {
      $(selector).remove();
    }

    let root: cheerio.Cheerio<Element> | undefined;
    for (const selector of this.contentSelectors) {
      const candidate = $<Element, string>(selector).first();
      if (candidate.length > 0 && candidate.text().trim().length > 0) {
        root = candidate;
        break;
      }
    }
    if (!root) {
      root = $('body').first();
    }
    if (root.length === 0) {
      root = $.root().children().first();
    }

    const heading = root.find('h1').first().text().replace(/\s+/g, ' ').trim() || undefined;

    return {
      $,
      root,
      title: documentTitle || heading,
      heading,
    };
  }

  /**
   * Split the content into sections at headings of the given level
   *
   * A section runs from its heading to the next heading of the same or a
   * higher level. Empty sections are kept; callers decide what to drop.
   */
  sections(parsed: ParsedHtml, options: SectionOptions = {}): { lead: string; sections: HtmlSection[] } {
    const { $, root } = parsed;
    const level = options.level === undefined || options.level === 'auto'
      ? this.detectSectionLevel(parsed)
      : options.level;
    if (level === null) {
      return { lead: nodesToMarkdown(this.withoutTitle(root.contents().toArray()), { baseUrl: options.baseUrl }), sections: [] };
    }

    const isBoundary = (node: AnyNode): boolean => {
      const nodeLevel = headingLevel(node);
      if (nodeLevel !== null) {
        return nodeLevel <= level;
      }
      return isTag(node) && $(node).find(HEADING_SELECTOR).toArray().some(el => (headingLevel(el) ?? 7) <= level);
    };

    const headings = root
      .find(HEADING_SELECTOR)
      .toArray()
      .filter(el => headingLevel(el) === level);

    if (headings.length === 0) {
      return { lead: nodesToMarkdown(this.withoutTitle(root.contents().toArray()), { baseUrl: options.baseUrl }), sections: [] };
    }

    const sections: HtmlSection[] = headings.map(headingElement => {
      const nodes: AnyNode[] = [];
      let sibling = headingElement.next;
      while (sibling && !isBoundary(sibling)) {
        nodes.push(sibling);
        sibling = sibling.next;
      }
      return {
        heading: textOf(headingElement),
        markdown: nodesToMarkdown(nodes, { baseUrl: options.baseUrl }),
        links: this.linksIn($, nodes, options.baseUrl),
      };
    });

    const leadNodes: AnyNode[] = [];
    let previous = headings[0].prev;
    while (previous) {
      leadNodes.unshift(previous);
      previous = previous.prev;
    }

    return {
      lead: nodesToMarkdown(this.withoutTitle(leadNodes), { baseUrl: options.baseUrl }),
      sections,
    };
  }

  /**
   * Links inside the main content, resolved against `baseUrl`
   */
  links(parsed: ParsedHtml, baseUrl?: string): HtmlLink[] {
    return this.linksIn(parsed.$, parsed.root.toArray(), baseUrl);
  }

  /**
   * Parse a page and extract everything at once
   */
  extract(htmlContent: string, options: SectionOptions = {}): HtmlExtractionResult {
    const parsed = this.parse(htmlContent);
    const { lead, sections } = this.sections(parsed, options);
    const links = this.links(parsed, options.baseUrl);
    const { $ } = parsed;

    const metadata: HtmlExtractionResult['metadata'] = {};
    const publishedAt =
      $('meta[property="article:published_time"]').attr('content') ||
      $('meta[name="date"]').attr('content') ||
      parsed.root.find('time[datetime]').first().attr('datetime');
    if (publishedAt) {
      metadata.publishedAt = publishedAt.trim();
    }

    logger.debug(
      { title: parsed.title, sectionCount: sections.length, linksDiscovered: links.length },
      'HTML extraction completed'
    );

    return {
      title: parsed.title,
      heading: parsed.heading,
      lead,
      sections,
      links,
      metadata,
    };
  }

  /**
   * Highest heading level below h1 present in the content, or null when there is none
   */
  private detectSectionLevel(parsed: ParsedHtml): number | null {
    const levels = parsed.root
      .find(HEADING_SELECTOR)
      .toArray()
      .map(el => headingLevel(el) ?? 7)
      .filter(level => level >= 2 && level <= 6);
    return levels.length > 0 ? Math.min(...levels) : null;
  }

  private withoutTitle(nodes: AnyNode[]): AnyNode[] {
    return nodes.filter(node => headingLevel(node) !== 1);
  }

  private linksIn($: cheerio.CheerioAPI, nodes: AnyNode[], baseUrl?: string): HtmlLink[] {
    const links: HtmlLink[] = [];
    for (const node of nodes) {
      if (!isTag(node)) continue;
      const anchors = node.name === 'a' ? [node] : $(node).find('a[href]').toArray();
      for (const anchor of anchors) {
        const href = resolveHref(anchor.attribs.href, baseUrl);
        if (href) {
          links.push({ text: textOf(anchor), href });
        }
      }
    }
    return links;
  }
}
