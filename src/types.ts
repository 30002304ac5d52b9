/**
 * Core type definitions for the repository harvester.
 */

// ============================================================================
// Constants
// ============================================================================

/** Placeholder written wherever upstream data is unavailable. */
export const NOT_AVAILABLE = 'N/A';

/** Location recorded when the user lookup itself fails. */
export const UNKNOWN_LOCATION = 'Unknown';

// ============================================================================
// Rate Limiting
// ============================================================================

/**
 * Named quota bucket. GitHub tracks search requests separately from
 * everything else.
 */
export type LimitClass = 'search' | 'core';

export interface RateBudgetSnapshot {
  remaining: number;
  resetAt: number | null;      // Unix seconds
  observedAt: number;          // ms since epoch
}

export interface ApiResponse<T = unknown> {
  status: number;
  data: T;
  headers: Record<string, string>;
}

// ============================================================================
// Domain Types
// ============================================================================

export type RepoCategory = 'corporate' | 'educational' | 'open_source';

export interface Repository {
  id: number;
  fullName: string;
  name: string;
  ownerLogin: string;
  language: string | null;
  description: string;
  topics: string[];
  stars: number;
  commitCount: number;
  category: RepoCategory;
}

export interface Contributor {
  login: string;
  contributions: number;
}

/**
 * Unit of harvesting work: one accepted repository paired with one of its
 * accepted contributors.
 */
export interface WorkItem {
  repository: Repository;
  contributor: Contributor;
}

export interface CommitRecord {
  sha: string;
  date: string;
  message: string;
}

/**
 * Flattened output row. Column order of the CSV follows RESULT_COLUMNS.
 */
export interface ResultRow {
  repo_id: number;
  repo_name: string;
  repo_type: RepoCategory;
  stars: number;
  contributor_login: string;
  contributor_location: string;
  contributions: number;
  commit_sha: string;
  commit_date: string;
  commit_message: string;
}

export const RESULT_COLUMNS: ReadonlyArray<keyof ResultRow> = [
  'repo_id',
  'repo_name',
  'repo_type',
  'stars',
  'contributor_login',
  'contributor_location',
  'contributions',
  'commit_sha',
  'commit_date',
  'commit_message',
];

/** What to do with a contributor whose profile has no location. */
export type MissingLocationPolicy = 'drop' | 'sentinel';

// ============================================================================
// Run Results
// ============================================================================

export interface CollectStats {
  repositories: number;
  failedRepositories: number;
  workItems: number;
  failedWorkItems: number;
  rows: number;
  durationMs: number;
}

export interface CollectResult {
  rows: ResultRow[];
  stats: CollectStats;
}

export interface DatasetSummary {
  uniqueRepositories: number;
  uniqueContributors: number;
  totalRows: number;
  rowsWithCommits: number;
  rowsWithoutCommits: number;
  rowsByCategory: Record<RepoCategory, number>;
}
