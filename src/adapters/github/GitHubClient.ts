/**
 * GitHub API Client
 *
 * Release endpoints of the GitHub REST API. Non-2xx responses surface as the
 * fetch error taxonomy (NotFoundError, RateLimitedError, ...).
 */

import { fetchClassified, type HttpFetcher } from '../../config/httpClient.js';
import { MalformedSourceError } from '../../types/errors.js';
import { githubReleaseListSchema } from '../../validation/releaseSchemas.js';

export interface GitHubClientOptions {
  fetcher: HttpFetcher;
  apiBaseUrl?: string;
  token?: string;
  /** Page size for release listings (max 100) */
  perPage?: number;
}

export interface GitHubResponse<T> {
  url: string;
  data: T;
}

export class GitHubClient {
  private readonly fetcher: HttpFetcher;
  private readonly baseUrl: string;
  private readonly token?: string;
  readonly perPage: number;

  constructor(options: GitHubClientOptions) {
    this.fetcher = options.fetcher;
    this.baseUrl = (options.apiBaseUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.token = options.token;
    this.perPage = options.perPage ?? 100;
  }

  /**
   * Get the latest published (non-draft, non-prerelease) release
   */
  async getLatestRelease(owner: string, repo: string): Promise<GitHubResponse<unknown>> {
    const url = `${this.repoUrl(owner, repo)}/releases/latest`;
    return { url, data: await this.fetchJson(url, 'GitHub release', `${owner}/${repo}@latest`) };
  }

  /**
   * Get a release by its tag name
   */
  async getReleaseByTag(owner: string, repo: string, tag: string): Promise<GitHubResponse<unknown>> {
    const url = this.releaseTagUrl(owner, repo, tag);
    return { url, data: await this.fetchJson(url, 'GitHub release', tag) };
  }

  /**
   * Get one page (1-based) of releases, newest first
   */
  async listReleases(owner: string, repo: string, page: number): Promise<unknown[]> {
    const url = `${this.repoUrl(owner, repo)}/releases?per_page=${this.perPage}&page=${page}`;
    const data = await this.fetchJson(url, 'GitHub releases', `${owner}/${repo}`);
    const parsed = githubReleaseListSchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedSourceError(`Expected a list of releases from ${url}`, { url });
    }
    return parsed.data;
  }

  releaseTagUrl(owner: string, repo: string, tag: string): string {
    return `${this.repoUrl(owner, repo)}/releases/tags/${encodeURIComponent(tag)}`;
  }

  private repoUrl(owner: string, repo: string): string {
    return `${this.baseUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
  }

  private async fetchJson(url: string, resource: string, identifier: string): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await fetchClassified(this.fetcher, url, resource, identifier, headers);
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new MalformedSourceError(`Invalid JSON from ${url}`, {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
