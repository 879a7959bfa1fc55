/**
 * WebPageAdapter - A single release-notes page, as it is now
 */

import { fetchClassified, type HttpFetcher } from '../../config/httpClient.js';
import { ConfigurationError, InvalidSelectorError } from '../../types/errors.js';
import {
  describeSelector,
  systemClock,
  type Clock,
  type RawDocument,
  type Selector,
} from '../../ingestion/types.js';
import type { SourceAdapter } from '../SourceAdapter.js';

export interface WebPageAdapterOptions {
  fetcher: HttpFetcher;
  url: string;
  /** Project name; defaults to the URL host */
  name?: string;
  clock?: Clock;
}

/**
 * Whether a string is an absolute http(s) URL
 */
export function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) {
    return false;
  }
  const { protocol, host } = new URL(value);
  return (protocol === 'http:' || protocol === 'https:') && host.length > 0;
}

export class WebPageAdapter implements SourceAdapter {
  readonly kind = 'web' as const;
  readonly url: string;
  readonly projectName: string;
  private readonly fetcher: HttpFetcher;
  private readonly clock: Clock;

  constructor(options: WebPageAdapterOptions) {
    if (!isHttpUrl(options.url)) {
      throw new ConfigurationError(`Web source URL must be an http(s) URL, got '${options.url}'`);
    }
    this.url = options.url;
    this.projectName = options.name?.trim() || new URL(options.url).host;
    this.fetcher = options.fetcher;
    this.clock = options.clock ?? systemClock;
  }

  async resolveIdentifiers(selector: Selector): Promise<string[]> {
    if (selector.kind !== 'latest') {
      throw new InvalidSelectorError(
        `Web pages can only be fetched as they are now (latest); '${describeSelector(selector)}' is not supported`
      );
    }
    return [this.url];
  }

  async fetchDocument(identifier: string): Promise<RawDocument> {
    const response = await fetchClassified(this.fetcher, identifier, 'Web page', identifier);
    return {
      sourceKind: 'web',
      identifierHint: identifier,
      projectHint: this.projectName,
      payload: { type: 'html', html: response.body },
      fetchedAt: this.clock().toISOString(),
      originUrl: identifier,
    };
  }
}
