/**
 * Version normalization shared by all sources
 *
 * Two identifiers that denote the same logical release must normalize to the
 * same string, since the version is part of the dedup key.
 */

const TAG_REF_PREFIX = /^refs\/tags\//i;
const WORD_PREFIX = /^(?:release[-_/ ]?|version[-_ ]?|ver\.?\s*)(?=[vV]?\d)/i;
const V_PREFIX = /^[vV](?=\d)/;
const UNDERSCORE_BETWEEN_DIGITS = /(\d)_(?=\d)/g;

/**
 * Normalize a raw version or tag to its canonical form
 *
 * `v1.101.0`, `1.101.0` and `refs/tags/v1.101.0` all become `1.101.0`;
 * `v1_101` becomes `1.101`.
 *
 * @returns The canonical version, or null if nothing usable remains
 */
export function normalizeVersion(input: string | null | undefined): string | null {
  if (typeof input !== 'string') {
    return null;
  }

  let version = input.trim();
  version = version.replace(TAG_REF_PREFIX, '');
  version = version.replace(WORD_PREFIX, '');
  version = version.replace(V_PREFIX, '');
  version = version.replace(UNDERSCORE_BETWEEN_DIGITS, '$1.');
  version = version.trim();

  if (!/[A-Za-z0-9]/.test(version)) {
    return null;
  }
  return version;
}

/**
 * Numeric components of a dotted version, or null if it is not purely numeric (`1.101`, `2.0.3`)
 */
export function parseNumericVersion(version: string): number[] | null {
  if (!/^\d+(?:\.\d+)*$/.test(version)) {
    return null;
  }
  return version.split('.').map(part => parseInt(part, 10));
}

/**
 * Compare two dotted numeric versions; missing components count as 0.
 * Non-numeric versions compare lexicographically after numeric ones.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseNumericVersion(a);
  const right = parseNumericVersion(b);

  if (!left || !right) {
    if (left) return -1;
    if (right) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}

/**
 * Whether `version` lies in the inclusive range [from, to] (bounds in either order)
 */
export function isVersionInRange(version: string, from: string, to: string): boolean {
  const [low, high] = compareVersions(from, to) <= 0 ? [from, to] : [to, from];
  return compareVersions(version, low) >= 0 && compareVersions(version, high) <= 0;
}

/**
 * First version-like token (`1.2`, `10.4.1`) in free text
 */
export function findVersionToken(text: string): string | null {
  const match = /\bv?(\d+(?:\.\d+)+)\b/i.exec(text);
  return match ? match[1] : null;
}
