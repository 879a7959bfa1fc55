/**
 * relnotes - release notes ingestion and normalization
 */

export type { SourceAdapter } from './adapters/SourceAdapter.js';
export { fetchDocuments } from './adapters/SourceAdapter.js';
export { GitHubClient, type GitHubClientOptions } from './adapters/github/GitHubClient.js';
export { GitHubReleaseAdapter, type GitHubReleaseAdapterOptions } from './adapters/github/GitHubReleaseAdapter.js';
export { VsCodeUpdatesAdapter, type VsCodeUpdatesAdapterOptions } from './adapters/vscode/VsCodeUpdatesAdapter.js';
export { WebPageAdapter, type WebPageAdapterOptions } from './adapters/web/WebPageAdapter.js';

export { AxiosHttpFetcher, fetchClassified, type HttpFetcher, type HttpResponse } from './config/httpClient.js';
export { loadSourceConfig, defaultSourceConfig, type SourceConfig } from './config/sourceConfig.js';

export { normalizeDocument, normalizeVersion, compareVersions, isVersionInRange } from './ingestion/normalizers/index.js';
export { RunOrchestrator, exitCodeFor, type RunOrchestratorConfig } from './ingestion/RunOrchestrator.js';
export { VersionResolver, type Resolution, type ResolutionState } from './ingestion/VersionResolver.js';
export * from './ingestion/types.js';

export { renderRelease, type RenderedRelease } from './rendering/MarkdownRenderer.js';
export type { ReleaseStore, StoreScope, StoredEntry } from './store/ReleaseStore.js';
export { FileSystemReleaseStore, type FileSystemReleaseStoreOptions } from './store/FileSystemReleaseStore.js';
export { parseSelector } from './validation/releaseSchemas.js';
export * from './types/errors.js';

export { runCli } from './cli/program.js';
