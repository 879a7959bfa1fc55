/**
 * Environment Variable Validation
 *
 * Centralized parsing and validation of all environment variables.
 * All problems are collected and reported together as one ConfigurationError.
 */

// Load dotenv early so that values from .env are visible to the parsers below
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY: boolean;

  // Store Configuration
  RELEASES_ROOT: string;
  RELNOTES_CONFIG?: string;

  // Sources
  GITHUB_TOKEN?: string;
  GITHUB_API_BASE_URL?: string;
  VSCODE_UPDATES_URL?: string;
  SCRAPER_USER_AGENT?: string;

  // Fetching
  HTTP_TIMEOUT_MS: number;
  FETCH_CONCURRENCY: number;
  RETRY_MAX_ATTEMPTS: number;
  RETRY_INITIAL_DELAY_MS: number;
  RETRY_MAX_DELAY_MS: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {ConfigurationError} If any variable holds an invalid value
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'production';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel && !['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'].includes(logLevel)) {
    errors.push(`LOG_LEVEL: Invalid value "${logLevel}". Must be fatal, error, warn, info, debug, trace, or silent.`);
  }

  const httpTimeout = parseNumericEnv(process.env.HTTP_TIMEOUT_MS, 30000);
  if (httpTimeout < 1) {
    errors.push(`HTTP_TIMEOUT_MS: Invalid value "${process.env.HTTP_TIMEOUT_MS}". Must be at least 1.`);
  }

  const concurrency = parseNumericEnv(process.env.FETCH_CONCURRENCY, 4);
  if (concurrency < 1 || concurrency > 32) {
    errors.push(`FETCH_CONCURRENCY: Invalid value "${process.env.FETCH_CONCURRENCY}". Must be between 1 and 32.`);
  }

  const retryMaxAttempts = parseNumericEnv(process.env.RETRY_MAX_ATTEMPTS, 3);
  if (retryMaxAttempts < 0 || retryMaxAttempts > 10) {
    errors.push(`RETRY_MAX_ATTEMPTS: Invalid value "${process.env.RETRY_MAX_ATTEMPTS}". Must be between 0 and 10.`);
  }

  const retryInitialDelay = parseNumericEnv(process.env.RETRY_INITIAL_DELAY_MS, 1000);
  const retryMaxDelay = parseNumericEnv(process.env.RETRY_MAX_DELAY_MS, 30000);
  if (retryInitialDelay < 0) {
    errors.push(`RETRY_INITIAL_DELAY_MS: Invalid value "${process.env.RETRY_INITIAL_DELAY_MS}". Must not be negative.`);
  }
  if (retryMaxDelay < retryInitialDelay) {
    errors.push(`RETRY_MAX_DELAY_MS (${retryMaxDelay}) cannot be smaller than RETRY_INITIAL_DELAY_MS (${retryInitialDelay}).`);
  }

  for (const name of ['GITHUB_API_BASE_URL', 'VSCODE_UPDATES_URL'] as const) {
    const value = process.env[name];
    if (value && !/^https?:\/\//.test(value)) {
      errors.push(`${name}: Invalid value "${value}". Must be an http(s) URL.`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Environment validation failed:\n  - ${errors.join('\n  - ')}`, { errors });
  }

  validatedEnv = {
    NODE_ENV: nodeEnv === 'development' || nodeEnv === 'test' ? nodeEnv : 'production',
    LOG_LEVEL: logLevel,
    LOG_PRETTY: parseBooleanEnv(process.env.LOG_PRETTY, false),
    RELEASES_ROOT: process.env.RELEASES_ROOT || 'releases',
    RELNOTES_CONFIG: process.env.RELNOTES_CONFIG,
    GITHUB_TOKEN: process.env.GITHUB_TOKEN || undefined,
    GITHUB_API_BASE_URL: process.env.GITHUB_API_BASE_URL,
    VSCODE_UPDATES_URL: process.env.VSCODE_UPDATES_URL,
    SCRAPER_USER_AGENT: process.env.SCRAPER_USER_AGENT,
    HTTP_TIMEOUT_MS: httpTimeout,
    FETCH_CONCURRENCY: concurrency,
    RETRY_MAX_ATTEMPTS: retryMaxAttempts,
    RETRY_INITIAL_DELAY_MS: retryInitialDelay,
    RETRY_MAX_DELAY_MS: retryMaxDelay,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
