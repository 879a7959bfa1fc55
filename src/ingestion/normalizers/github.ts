/**
 * GitHub release normalizer
 *
 * Maps a REST API release payload to a ReleaseRecord. The markdown body is
 * split at its headings; contributors are the release author plus anyone
 * @mentioned in the body.
 */

import { MalformedSourceError } from '../../types/errors.js';
import { parseGitHubRelease, validAssets } from '../../validation/releaseSchemas.js';
import type { RawDocument, ReleaseRecord } from '../types.js';
import {
  finalizeContributors,
  finalizeDownloads,
  finalizeSections,
  findMentions,
  sourceDate,
  splitMarkdownSections,
} from './sections.js';
import { normalizeVersion } from './version.js';

export function normalizeGitHubRelease(raw: RawDocument, scrapedAt: string): ReleaseRecord {
  const context = { identifier: raw.identifierHint, originUrl: raw.originUrl };

  if (raw.payload.type !== 'json') {
    throw new MalformedSourceError('GitHub release payload must be JSON', context);
  }
  const release = parseGitHubRelease(raw.payload.data, context);

  const projectName = raw.projectHint?.trim();
  if (!projectName) {
    throw new MalformedSourceError('GitHub release has no repository to attribute it to', context);
  }

  const version = normalizeVersion(release.tag_name);
  if (!version) {
    throw new MalformedSourceError(`Cannot determine version from tag '${release.tag_name}'`, context);
  }

  const name = release.name?.trim();
  const title = name && name !== release.tag_name && normalizeVersion(name) !== version ? name : undefined;

  const body = release.body ?? '';
  const contributors = findMentions(body);
  if (release.author?.login) {
    contributors.push(release.author.login);
  }

  return {
    sourceKind: 'github',
    projectName,
    version,
    title,
    releaseDate: sourceDate(release.published_at ?? release.created_at),
    sections: finalizeSections(splitMarkdownSections(body)),
    downloadLinks: finalizeDownloads(
      validAssets(release).map(asset => ({ label: asset.name, url: asset.browser_download_url }))
    ),
    contributors: finalizeContributors(contributors),
    originUrl: release.html_url || raw.originUrl,
    fetchedAt: raw.fetchedAt,
    scrapedAt,
  };
}
