/**
 * VsCodeUpdatesAdapter - Monthly release notes of Visual Studio Code
 *
 * The updates index links every release page as `/updates/vX_Y`; a release
 * page for version X.Y lives at `{updatesUrl}vX_Y`.
 */

import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import { fetchClassified, type HttpFetcher } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { InvalidSelectorError, MalformedSourceError, NotFoundError } from '../../types/errors.js';
import { compareVersions, isVersionInRange, normalizeVersion } from '../../ingestion/normalizers/version.js';
import {
  describeSelector,
  systemClock,
  type Clock,
  type RawDocument,
  type Selector,
} from '../../ingestion/types.js';
import type { SourceAdapter } from '../SourceAdapter.js';

const VERSION_FORMAT = /^\d+\.\d+$/;
const VERSION_IN_HEADING = /version\s+v?(\d+\.\d+)/i;
const RELEASE_PAGE_LINK = /\/updates\/v(\d+)_(\d+)(?:[/?#]|$)/;

export interface VsCodeUpdatesAdapterOptions {
  fetcher: HttpFetcher;
  /** Updates index URL, e.g. https://code.visualstudio.com/updates/ */
  updatesUrl: string;
  clock?: Clock;
}

export class VsCodeUpdatesAdapter implements SourceAdapter {
  readonly kind = 'vscode' as const;
  private readonly fetcher: HttpFetcher;
  private readonly updatesUrl: string;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: VsCodeUpdatesAdapterOptions) {
    this.fetcher = options.fetcher;
    this.updatesUrl = options.updatesUrl.endsWith('/') ? options.updatesUrl : `${options.updatesUrl}/`;
    this.clock = options.clock ?? systemClock;
    this.logger = createChildLogger({ adapter: 'vscode' });
  }

  /**
   * Release page URL of a version: 1.101 -> {updatesUrl}v1_101
   */
  releasePageUrl(version: string): string {
    return `${this.updatesUrl}v${version.replace('.', '_')}`;
  }

  async resolveIdentifiers(selector: Selector): Promise<string[]> {
    switch (selector.kind) {
      case 'latest':
        return [await this.latestVersion()];
      case 'exact':
        return [this.requireVersion(selector.version)];
      case 'all': {
        const versions = await this.availableVersions();
        if (versions.length === 0) {
          throw new NotFoundError('Visual Studio Code releases', this.updatesUrl);
        }
        return versions;
      }
      case 'range': {
        const from = this.requireVersion(selector.from);
        const to = this.requireVersion(selector.to);
        const versions = (await this.availableVersions()).filter(version => isVersionInRange(version, from, to));
        if (versions.length === 0) {
          throw new NotFoundError('Visual Studio Code releases', describeSelector(selector));
        }
        return versions;
      }
    }
  }

  async fetchDocument(identifier: string): Promise<RawDocument> {
    const version = this.requireVersion(identifier);
    const url = this.releasePageUrl(version);
    const response = await fetchClassified(this.fetcher, url, 'Visual Studio Code release notes', version);

    return {
      sourceKind: 'vscode',
      identifierHint: version,
      payload: { type: 'html', html: response.body },
      fetchedAt: this.clock().toISOString(),
      originUrl: url,
    };
  }

  /**
   * Version named by the first "version X.Y" heading of the updates index
   */
  private async latestVersion(): Promise<string> {
    const $ = await this.loadIndex();
    for (const heading of $('h1, h2, h3').toArray()) {
      const match = VERSION_IN_HEADING.exec($(heading).text());
      if (match) {
        return match[1];
      }
    }

    const [newest] = this.versionsFromLinks($);
    if (newest) {
      this.logger.debug({ version: newest }, 'No version heading on the updates index, using the newest linked release');
      return newest;
    }
    throw new MalformedSourceError('Cannot determine the latest Visual Studio Code version from the updates index', {
      url: this.updatesUrl,
    });
  }

  /**
   * Every release linked from the updates index, newest first
   */
  private async availableVersions(): Promise<string[]> {
    const versions = this.versionsFromLinks(await this.loadIndex());
    this.logger.debug({ count: versions.length }, 'Listed Visual Studio Code releases');
    return versions;
  }

  private versionsFromLinks($: cheerio.CheerioAPI): string[] {
    const versions = new Set<string>();
    $('a[href]').each((_, element) => {
      const match = RELEASE_PAGE_LINK.exec($(element).attr('href') ?? '');
      if (match) {
        versions.add(`${parseInt(match[1], 10)}.${parseInt(match[2], 10)}`);
      }
    });
    return Array.from(versions).sort((a, b) => compareVersions(b, a));
  }

  private async loadIndex(): Promise<cheerio.CheerioAPI> {
    const response = await fetchClassified(this.fetcher, this.updatesUrl, 'Visual Studio Code updates index', 'index');
    return cheerio.load(response.body);
  }

  private requireVersion(input: string): string {
    const version = normalizeVersion(input);
    if (!version || !VERSION_FORMAT.test(version)) {
      throw new InvalidSelectorError(`Visual Studio Code versions have the form X.Y (e.g. 1.101), got '${input}'`);
    }
    return version;
  }
}
