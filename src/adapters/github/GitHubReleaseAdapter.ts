/**
 * GitHubReleaseAdapter - Releases of one GitHub repository
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../../utils/logger.js';
import { ConfigurationError, NotFoundError } from '../../types/errors.js';
import {
  githubReleaseSchema,
  isDateBound,
  parseGitHubRelease,
  type GitHubRelease,
} from '../../validation/releaseSchemas.js';
import { isVersionInRange, normalizeVersion } from '../../ingestion/normalizers/version.js';
import {
  describeSelector,
  systemClock,
  type Clock,
  type RawDocument,
  type Selector,
} from '../../ingestion/types.js';
import type { SourceAdapter } from '../SourceAdapter.js';
import type { GitHubClient } from './GitHubClient.js';

export const REPOSITORY_PATTERN = /^[A-Za-z0-9._-]+\/[A-Za-z0-9._-]+$/;

/** Upper bound on listing pages (at 100 per page) */
const MAX_PAGES = 100;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface GitHubReleaseAdapterOptions {
  /** `owner/repo` */
  repository: string;
  client: GitHubClient;
  clock?: Clock;
}

interface CachedRelease {
  data: unknown;
  url: string;
}

export class GitHubReleaseAdapter implements SourceAdapter {
  readonly kind = 'github' as const;
  readonly repository: string;
  private readonly owner: string;
  private readonly repo: string;
  private readonly client: GitHubClient;
  private readonly clock: Clock;
  private readonly logger: Logger;
  /** Payloads obtained while resolving, keyed by tag */
  private readonly payloads = new Map<string, CachedRelease>();

  constructor(options: GitHubReleaseAdapterOptions) {
    if (!REPOSITORY_PATTERN.test(options.repository)) {
      throw new ConfigurationError(`Repository must be in the form owner/repo, got '${options.repository}'`);
    }
    this.repository = options.repository;
    const [owner, repo] = options.repository.split('/');
    this.owner = owner;
    this.repo = repo;
    this.client = options.client;
    this.clock = options.clock ?? systemClock;
    this.logger = createChildLogger({ adapter: 'github', repository: options.repository });
  }

  async resolveIdentifiers(selector: Selector): Promise<string[]> {
    switch (selector.kind) {
      case 'latest': {
        const { url, data } = await this.client.getLatestRelease(this.owner, this.repo);
        const release = parseGitHubRelease(data, { url });
        this.payloads.set(release.tag_name, { data, url });
        return [release.tag_name];
      }
      case 'exact':
        return [selector.version];
      case 'all': {
        const releases = await this.listAll();
        if (releases.length === 0) {
          throw new NotFoundError('GitHub releases', this.repository);
        }
        return releases.map(release => release.tag_name);
      }
      case 'range': {
        const releases = (await this.listAll()).filter(release => this.inRange(release, selector.from, selector.to));
        if (releases.length === 0) {
          throw new NotFoundError('GitHub releases', `${this.repository} ${describeSelector(selector)}`);
        }
        return releases.map(release => release.tag_name);
      }
    }
  }

  async fetchDocument(identifier: string): Promise<RawDocument> {
    const cached = this.payloads.get(identifier) ?? (await this.fetchByTag(identifier));
    const parsed = githubReleaseSchema.safeParse(cached.data);
    const htmlUrl = parsed.success ? parsed.data.html_url : undefined;

    return {
      sourceKind: 'github',
      identifierHint: identifier,
      projectHint: this.repository,
      payload: { type: 'json', data: cached.data },
      fetchedAt: this.clock().toISOString(),
      originUrl: htmlUrl || cached.url,
    };
  }

  /**
   * Fetch a release by tag; a tag without a leading `v` is retried once as `v{tag}`
   */
  private async fetchByTag(tag: string): Promise<CachedRelease> {
    try {
      return await this.client.getReleaseByTag(this.owner, this.repo, tag);
    } catch (error) {
      if (!(error instanceof NotFoundError) || /^v/i.test(tag)) {
        throw error;
      }
      this.logger.debug({ tag }, 'Release tag not found, retrying with v prefix');
      try {
        return await this.client.getReleaseByTag(this.owner, this.repo, `v${tag}`);
      } catch (fallbackError) {
        if (fallbackError instanceof NotFoundError) {
          throw new NotFoundError('GitHub release', tag, { repository: this.repository, tried: [tag, `v${tag}`] });
        }
        throw fallbackError;
      }
    }
  }

  /**
   * Every non-draft release, newest first, following pagination until a short page
   */
  private async listAll(): Promise<GitHubRelease[]> {
    const releases: GitHubRelease[] = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const items = await this.client.listReleases(this.owner, this.repo, page);

      for (const item of items) {
        const parsed = githubReleaseSchema.safeParse(item);
        if (!parsed.success) {
          this.logger.warn({ page }, 'Skipping release entry without a tag');
          continue;
        }
        if (parsed.data.draft) {
          continue;
        }
        releases.push(parsed.data);
        this.payloads.set(parsed.data.tag_name, {
          data: item,
          url: parsed.data.html_url || this.client.releaseTagUrl(this.owner, this.repo, parsed.data.tag_name),
        });
      }

      if (items.length < this.client.perPage) {
        break;
      }
    }

    this.logger.debug({ count: releases.length }, 'Listed releases');
    return releases;
  }

  private inRange(release: GitHubRelease, from: string, to: string): boolean {
    if (isDateBound(from) && isDateBound(to)) {
      const published = Date.parse(release.published_at ?? release.created_at ?? '');
      if (isNaN(published)) {
        return false;
      }
      const a = Date.parse(`${from}T00:00:00Z`);
      const b = Date.parse(`${to}T00:00:00Z`);
      const start = Math.min(a, b);
      const endExclusive = Math.max(a, b) + DAY_MS;
      return published >= start && published < endExclusive;
    }

    const version = normalizeVersion(release.tag_name);
    const low = normalizeVersion(from);
    const high = normalizeVersion(to);
    if (!version || !low || !high) {
      return false;
    }
    return isVersionInRange(version, low, high);
  }
}
