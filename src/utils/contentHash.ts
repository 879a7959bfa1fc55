import crypto from 'crypto';

/**
 * Marker appended as the last line of every store entry, caching the content hash
 */
export const CONTENT_HASH_PREFIX = '<!-- content-sha256: ';
const CONTENT_HASH_LINE = /\n?<!-- content-sha256: ([a-f0-9]{64}) -->\n?$/;

/**
 * Compute the content hash of a rendered document
 *
 * The marker line, if present, is not part of the hashed content.
 *
 * @returns SHA-256 hex digest of the text with line endings normalized
 */
export function computeContentHash(renderedText: string): string {
  const normalized = stripContentHash(renderedText).replace(/\r\n/g, '\n');
  return crypto.createHash('sha256').update(normalized, 'utf8').digest('hex');
}

/**
 * Append the content-hash marker line to rendered text
 */
export function appendContentHash(renderedText: string, contentHash: string): string {
  const base = renderedText.endsWith('\n') ? renderedText : `${renderedText}\n`;
  return `${base}${CONTENT_HASH_PREFIX}${contentHash} -->\n`;
}

/**
 * Read the cached hash from a stored entry, or null when the marker is absent
 */
export function readContentHash(storedText: string): string | null {
  const match = CONTENT_HASH_LINE.exec(storedText);
  return match ? match[1] : null;
}

/**
 * Remove the content-hash marker line, if present
 */
export function stripContentHash(storedText: string): string {
  return storedText.replace(CONTENT_HASH_LINE, '\n');
}
