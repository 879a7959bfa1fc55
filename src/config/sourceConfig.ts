/**
 * Source Configuration
 *
 * Per-source defaults for all adapters and the store layout. A JSON file
 * (`RELNOTES_CONFIG`, else `./relnotes.config.json`) may override any of them.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError, systemErrorCode } from '../types/errors.js';
import type { SourceKind } from '../ingestion/types.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_CONFIG_FILE = 'relnotes.config.json';

const httpUrl = z.string().url().refine(value => /^https?:\/\//.test(value), {
  message: 'Must be an http(s) URL',
});

export const sourceConfigSchema = z.object({
  userAgent: z.string().min(1),
  github: z.object({
    apiBaseUrl: httpUrl,
    perPage: z.number().int().min(1).max(100),
    directory: z.string().min(1),
  }),
  vscode: z.object({
    updatesUrl: httpUrl,
    projectName: z.string().min(1),
    directory: z.string().min(1),
  }),
  web: z.object({
    directory: z.string().min(1),
    contentSelectors: z.array(z.string().min(1)).min(1),
    boilerplateSelectors: z.array(z.string().min(1)),
  }),
});

export type SourceConfig = z.infer<typeof sourceConfigSchema>;

const overrideSchema = z.object({
  userAgent: sourceConfigSchema.shape.userAgent.optional(),
  github: sourceConfigSchema.shape.github.partial().optional(),
  vscode: sourceConfigSchema.shape.vscode.partial().optional(),
  web: sourceConfigSchema.shape.web.partial().optional(),
}).strict();

export type SourceConfigOverrides = z.infer<typeof overrideSchema>;

export const defaultSourceConfig: SourceConfig = {
  userAgent: 'relnotes/1.0 (+https://github.com/relnotes/relnotes)',
  github: {
    apiBaseUrl: 'https://api.github.com',
    perPage: 100,
    directory: 'github',
  },
  vscode: {
    updatesUrl: 'https://code.visualstudio.com/updates/',
    projectName: 'Visual Studio Code',
    directory: 'vscode',
  },
  web: {
    directory: 'other-sources',
    contentSelectors: ['main', 'article', '.content', '#content', '.main-content', '.post-content'],
    boilerplateSelectors: ['nav', 'header', 'footer', 'script', 'style', 'noscript', '[role="navigation"]'],
  },
};

/**
 * Merge overrides onto a base configuration
 * @throws {ConfigurationError} When the result does not match the schema
 */
export function mergeSourceConfig(base: SourceConfig, overrides: SourceConfigOverrides): SourceConfig {
  const parsed = sourceConfigSchema.safeParse({
    userAgent: overrides.userAgent ?? base.userAgent,
    github: { ...base.github, ...overrides.github },
    vscode: { ...base.vscode, ...overrides.vscode },
    web: { ...base.web, ...overrides.web },
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid source configuration:\n  - ${issues.join('\n  - ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Parse raw JSON text of a configuration file
 * @throws {ConfigurationError} When the text is not JSON or does not match the schema
 */
export function parseSourceConfigOverrides(text: string, origin: string): SourceConfigOverrides {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${origin} is not valid JSON`, {
      origin,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = overrideSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Configuration file ${origin} is invalid:\n  - ${issues.join('\n  - ')}`, {
      origin,
      issues,
    });
  }
  return parsed.data;
}

export interface LoadSourceConfigOptions {
  /** Explicit file path; when given the file must exist */
  configPath?: string;
  /** Environment-level overrides applied after the file */
  env?: {
    GITHUB_API_BASE_URL?: string;
    VSCODE_UPDATES_URL?: string;
    SCRAPER_USER_AGENT?: string;
  };
  cwd?: string;
}

/**
 * Load the effective source configuration
 *
 * Order: defaults, then the configuration file, then environment variables.
 */
export async function loadSourceConfig(options: LoadSourceConfigOptions = {}): Promise<SourceConfig> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const filePath = resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  let config = defaultSourceConfig;

  let text: string | null = null;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const code = systemErrorCode(error);
    if (code !== 'ENOENT' || explicit) {
      throw new ConfigurationError(`Cannot read configuration file ${filePath}`, { filePath, code });
    }
  }

  if (text !== null) {
    config = mergeSourceConfig(config, parseSourceConfigOverrides(text, filePath));
    logger.debug({ filePath }, 'Loaded source configuration file');
  }

  const env = options.env ?? {};
  if (env.GITHUB_API_BASE_URL || env.VSCODE_UPDATES_URL || env.SCRAPER_USER_AGENT) {
    config = mergeSourceConfig(config, {
      userAgent: env.SCRAPER_USER_AGENT,
      github: env.GITHUB_API_BASE_URL ? { apiBaseUrl: env.GITHUB_API_BASE_URL } : undefined,
      vscode: env.VSCODE_UPDATES_URL ? { updatesUrl: env.VSCODE_UPDATES_URL } : undefined,
    });
  }

  return config;
}

/**
 * Directory name under the store root for a source kind
 */
export function sourceDirectory(config: SourceConfig, kind: SourceKind): string {
  switch (kind) {
    case 'github':
      return config.github.directory;
    case 'vscode':
      return config.vscode.directory;
    case 'web':
      return config.web.directory;
  }
}
