/**
 * Release Validation Schemas
 *
 * Zod schemas for the upstream GitHub release payload, the canonical
 * ReleaseRecord and run selectors. Records are validated at the normalizer
 * boundary before they reach the store.
 */

import { z } from 'zod';
import { MalformedSourceError, InvalidSelectorError } from '../types/errors.js';
import type { ReleaseRecord, Selector } from '../ingestion/types.js';

/**
 * Release asset as returned by the GitHub REST API
 */
export const githubAssetSchema = z.object({
  name: z.string().min(1),
  browser_download_url: z.string().url(),
});

/**
 * Release as returned by `GET /repos/{owner}/{repo}/releases[/...]`
 *
 * Only `tag_name` is required; everything else degrades to absent.
 */
export const githubReleaseSchema = z
  .object({
    id: z.number().optional(),
    tag_name: z.string().min(1),
    name: z.string().nullish(),
    body: z.string().nullish(),
    html_url: z.string().nullish(),
    draft: z.boolean().optional(),
    prerelease: z.boolean().optional(),
    created_at: z.string().nullish(),
    published_at: z.string().nullish(),
    author: z.object({ login: z.string() }).passthrough().nullish().catch(null),
    assets: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type GitHubRelease = z.infer<typeof githubReleaseSchema>;
export type GitHubAsset = z.infer<typeof githubAssetSchema>;

export const githubReleaseListSchema = z.array(z.unknown());

/**
 * Parse a release payload, failing with MalformedSourceError
 */
export function parseGitHubRelease(data: unknown, context?: Record<string, unknown>): GitHubRelease {
  const result = githubReleaseSchema.safeParse(data);
  if (!result.success) {
    throw new MalformedSourceError(
      `GitHub release payload is malformed: ${formatZodIssues(result.error)}`,
      context
    );
  }
  return result.data;
}

/**
 * Assets that carry a name and a download URL; others are ignored
 */
export function validAssets(release: GitHubRelease): GitHubAsset[] {
  const assets: GitHubAsset[] = [];
  for (const candidate of release.assets ?? []) {
    const parsed = githubAssetSchema.safeParse(candidate);
    if (parsed.success) {
      assets.push(parsed.data);
    }
  }
  return assets;
}

/**
 * Canonical release record schema
 */
export const releaseRecordSchema = z.object({
  sourceKind: z.enum(['github', 'vscode', 'web']),
  projectName: z.string().trim().min(1),
  version: z.string().trim().min(1),
  title: z.string().min(1).optional(),
  releaseDate: z.string().min(1).optional(),
  sections: z.array(z.object({ heading: z.string().min(1), body: z.string().min(1) })),
  downloadLinks: z.array(z.object({ label: z.string(), url: z.string().url() })),
  contributors: z.array(z.string().min(1)),
  originUrl: z.string().min(1),
  fetchedAt: z.string().datetime(),
  scrapedAt: z.string().datetime(),
});

/**
 * Validate a normalized record before it reaches the store
 */
export function validateReleaseRecord(record: ReleaseRecord): ReleaseRecord {
  const result = releaseRecordSchema.safeParse(record);
  if (!result.success) {
    throw new MalformedSourceError(
      `Normalized release record is invalid: ${formatZodIssues(result.error)}`,
      { sourceKind: record.sourceKind, version: record.version }
    );
  }
  return record;
}

const dateBound = /^\d{4}-\d{2}-\d{2}$/;
const versionBound = /^v?\d+(?:[._]\d+)*$/i;

export const selectorSchema = z
  .union([
    z.object({ kind: z.literal('latest') }),
    z.object({ kind: z.literal('exact'), version: z.string().trim().min(1, 'version must not be empty') }),
    z.object({ kind: z.literal('all') }),
    z.object({ kind: z.literal('range'), from: z.string().trim().min(1), to: z.string().trim().min(1) }),
  ])
  .superRefine((selector, ctx) => {
    if (selector.kind !== 'range') {
      return;
    }
    const bothDates = dateBound.test(selector.from) && dateBound.test(selector.to);
    const bothVersions = versionBound.test(selector.from) && versionBound.test(selector.to);
    if (!bothDates && !bothVersions) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'range bounds must both be dates (YYYY-MM-DD) or both be versions (X.Y[.Z])',
      });
    }
  });

/**
 * Validate a selector, failing with InvalidSelectorError
 */
export function parseSelector(input: unknown): Selector {
  const result = selectorSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSelectorError(`Invalid selector: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

export function isDateBound(value: string): boolean {
  return dateBound.test(value);
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
