/**
 * Configuration for a harvesting run.
 *
 * Values come from defaults, then environment variables (a .env file is
 * loaded by the CLI), then command-line flags.
 */

import { ConfigError } from './errors';
import { MissingLocationPolicy } from './types';

export interface HarvestConfig {
  // Upstream
  token?: string;
  baseUrl: string;
  searchQuery: string;

  // Caps and thresholds
  maxRepositories: number;          // Repositories to accept
  maxContributors: number;          // Contributors per repository
  minContributions: number;         // Min contributions for a contributor
  minCommits: number;               // Min commit count for a repository
  maxCommitsPerContributor: number; // Commits fetched per contributor

  // Concurrency
  maxWorkers: number;               // Harvest pool size
  expansionConcurrency: number;     // Contributor listing pool size

  // Row policy
  missingLocation: MissingLocationPolicy;

  // Request behaviour
  rateLimitMarginMs: number;        // Added to the announced reset time
  maxNetworkRetries: number;
  networkRetryDelayMs: number;      // Base of the exponential backoff
  maxQuotaWaits: number;            // Rate-limit waits allowed per request
  requestTimeoutMs: number;
}

export const DEFAULT_CONFIG: HarvestConfig = {
  baseUrl: 'https://api.github.com',
  searchQuery: 'stars:>=1000 -language:HTML -language:Markdown',

  maxRepositories: 100,
  maxContributors: 50,
  minContributions: 100,
  minCommits: 1000,
  maxCommitsPerContributor: 1000,

  maxWorkers: 50,
  expansionConcurrency: 50,

  missingLocation: 'drop',

  rateLimitMarginMs: 10_000,
  maxNetworkRetries: 5,
  networkRetryDelayMs: 5_000,
  maxQuotaWaits: 10,
  requestTimeoutMs: 30_000,
};

type NumericKey = {
  [K in keyof HarvestConfig]-?: HarvestConfig[K] extends number ? K : never;
}[keyof HarvestConfig];

const INT_MAPPINGS: [string, NumericKey][] = [
  ['HARVEST_MAX_REPOS', 'maxRepositories'],
  ['HARVEST_MAX_CONTRIBUTORS', 'maxContributors'],
  ['HARVEST_MIN_CONTRIBUTIONS', 'minContributions'],
  ['HARVEST_MIN_COMMITS', 'minCommits'],
  ['HARVEST_MAX_COMMITS', 'maxCommitsPerContributor'],
  ['HARVEST_WORKERS', 'maxWorkers'],
  ['HARVEST_EXPANSION_CONCURRENCY', 'expansionConcurrency'],
  ['HARVEST_RATE_LIMIT_MARGIN_MS', 'rateLimitMarginMs'],
  ['HARVEST_MAX_NETWORK_RETRIES', 'maxNetworkRetries'],
  ['HARVEST_NETWORK_RETRY_DELAY_MS', 'networkRetryDelayMs'],
  ['HARVEST_MAX_QUOTA_WAITS', 'maxQuotaWaits'],
  ['HARVEST_REQUEST_TIMEOUT_MS', 'requestTimeoutMs'],
];

export function isMissingLocationPolicy(value: string): value is MissingLocationPolicy {
  return value === 'drop' || value === 'sentinel';
}

/**
 * Load configuration from environment variables or use defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const config: HarvestConfig = { ...DEFAULT_CONFIG };

  const token = env.GITHUB_TOKEN || env.GH_TOKEN;
  if (token) config.token = token;
  if (env.GITHUB_API_URL) config.baseUrl = env.GITHUB_API_URL;
  if (env.HARVEST_SEARCH_QUERY) config.searchQuery = env.HARVEST_SEARCH_QUERY;

  for (const [envKey, configKey] of INT_MAPPINGS) {
    const raw = env[envKey];
    if (raw) {
      config[configKey] = parseInt(raw, 10);
    }
  }

  const policy = env.HARVEST_MISSING_LOCATION;
  if (policy) {
    if (!isMissingLocationPolicy(policy)) {
      throw new ConfigError([`HARVEST_MISSING_LOCATION must be "drop" or "sentinel", got "${policy}"`]);
    }
    config.missingLocation = policy;
  }

  return config;
}

/**
 * Check caps and thresholds, reporting every problem at once.
 */
export function validateConfig(config: HarvestConfig): HarvestConfig {
  const problems: string[] = [];

  const positive: NumericKey[] = [
    'maxRepositories',
    'maxContributors',
    'maxCommitsPerContributor',
    'maxWorkers',
    'expansionConcurrency',
    'requestTimeoutMs',
  ];
  for (const key of positive) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      problems.push(`${key} must be a positive integer (got ${config[key]})`);
    }
  }

  const nonNegative: NumericKey[] = [
    'minContributions',
    'minCommits',
    'rateLimitMarginMs',
    'maxNetworkRetries',
    'networkRetryDelayMs',
    'maxQuotaWaits',
  ];
  for (const key of nonNegative) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      problems.push(`${key} must be a non-negative integer (got ${config[key]})`);
    }
  }

  if (!config.searchQuery.trim()) {
    problems.push('searchQuery must not be empty');
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}
