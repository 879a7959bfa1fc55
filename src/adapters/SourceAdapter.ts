/**
 * Source Adapter contract
 *
 * An adapter turns a selector into a finite list of concrete identifiers and
 * fetches the raw document behind each. It performs network I/O only.
 */

import type { RawDocument, Selector, SourceKind } from '../ingestion/types.js';

export interface SourceAdapter {
  readonly kind: SourceKind;

  /**
   * Resolve a selector to concrete identifiers (tags, versions, URLs)
   *
   * @throws InvalidSelectorError when the adapter does not support the selector
   * @throws NotFoundError when a range or listing selects nothing
   */
  resolveIdentifiers(selector: Selector): Promise<string[]>;

  /**
   * Fetch the raw document for one identifier
   *
   * @throws NotFoundError, RateLimitedError, TransientFetchError, UpstreamRequestError
   */
  fetchDocument(identifier: string): Promise<RawDocument>;
}

/**
 * Lazily fetch every document a selector denotes, in identifier order
 */
export async function* fetchDocuments(adapter: SourceAdapter, selector: Selector): AsyncGenerator<RawDocument> {
  const identifiers = await adapter.resolveIdentifiers(selector);
  for (const identifier of identifiers) {
    yield await adapter.fetchDocument(identifier);
  }
}
