/**
 * Filesystem-safe path components derived from dedup-key values
 */

import { isAbsolute, relative, resolve, sep } from 'path';
import { StorePathError } from '../types/errors.js';

const UNSAFE_CHARACTERS = /[<>:"/\\|?*\x00-\x1f]/g;

/**
 * Sanitize one path component
 *
 * Unsafe characters become `_`, leading and trailing dots and spaces are
 * stripped and runs of `_` collapse.
 *
 * @throws StorePathError when the value is or contains a `.`/`..` segment, or nothing is left
 */
export function sanitizeComponent(value: string, field: string): string {
  const segments = value.split(/[\\/]/);
  if (segments.some(segment => segment.trim() === '..' || segment.trim() === '.')) {
    throw new StorePathError(`Refusing path traversal in ${field}: '${value}'`, { field, value });
  }

  const sanitized = value
    .replace(UNSAFE_CHARACTERS, '_')
    .replace(/^[. ]+|[. ]+$/g, '')
    .replace(/_+/g, '_');

  if (!sanitized || sanitized === '_') {
    throw new StorePathError(`Empty path component for ${field}: '${value}'`, { field, value });
  }
  return sanitized;
}

/**
 * Resolve `components` under `root`, failing if the result escapes it
 */
export function resolveUnderRoot(root: string, ...components: string[]): string {
  const absoluteRoot = resolve(root);
  const target = resolve(absoluteRoot, ...components);
  const rel = relative(absoluteRoot, target);
  if (rel === '' || rel.startsWith(`..${sep}`) || rel === '..' || isAbsolute(rel)) {
    throw new StorePathError(`Resolved path escapes the store root: ${target}`, { root: absoluteRoot, target });
  }
  return target;
}
