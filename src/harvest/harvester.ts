/**
 * Commit harvesting: per-contributor commit history flattened into rows.
 */

import { GitHubClient } from '../apiClient';
import { commitSchema } from '../githubSchemas';
import { errorMessage } from '../errors';
import {
  CommitRecord,
  MissingLocationPolicy,
  NOT_AVAILABLE,
  ResultRow,
  UNKNOWN_LOCATION,
  WorkItem,
} from '../types';
import { BoundedPool, BatchProgress, cleanMessage, formatDate, shortSha } from '../utils';
import { Paginator } from './paginator';

const MAX_COMMITS_PAGE_SIZE = 100;
const COMMITS_PAGE_DELAY_MS = 200;
const PROGRESS_EVERY = 5;

export interface HarvesterOptions {
  missingLocation: MissingLocationPolicy;
}

export interface HarvestResult {
  rows: ResultRow[];
  failedItems: number;
}

/**
 * Normalize one raw commit, or null when it lacks the commit object.
 */
export function toCommitRecord(raw: unknown): CommitRecord | null {
  const parsed = commitSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const { sha, commit } = parsed.data;
  return {
    sha: shortSha(sha),
    date: formatDate(commit.author?.date),
    message: cleanMessage(commit.message),
  };
}

function toRow(item: WorkItem, location: string, record: CommitRecord | null): ResultRow {
  const { repository, contributor } = item;
  return {
    repo_id: repository.id,
    repo_name: repository.fullName,
    repo_type: repository.category,
    stars: repository.stars,
    contributor_login: contributor.login,
    contributor_location: location,
    contributions: contributor.contributions,
    commit_sha: record ? record.sha : NOT_AVAILABLE,
    commit_date: record ? record.date : NOT_AVAILABLE,
    commit_message: record ? record.message : NOT_AVAILABLE,
  };
}

export class CommitHarvester {
  private paginator: Paginator;

  constructor(private client: GitHubClient, private options: HarvesterOptions) {
    this.paginator = new Paginator(client);
  }

  /**
   * Commits authored by the work item's contributor in its repository,
   * newest first, at most maxCommits.
   */
  async fetchCommits(item: WorkItem, maxCommits: number): Promise<CommitRecord[]> {
    const { repository, contributor } = item;
    return this.paginator.collect(
      {
        path: `/repos/${repository.ownerLogin}/${repository.name}/commits`,
        params: { author: contributor.login },
        perPage: Math.min(MAX_COMMITS_PAGE_SIZE, maxCommits),
        maxItems: maxCommits,
        pageDelayMs: COMMITS_PAGE_DELAY_MS,
      },
      toCommitRecord
    );
  }

  /**
   * Rows for one work item: one per commit, or a single N/A row when the
   * contributor has no commits. A contributor without a profile location
   * yields no rows under the "drop" policy.
   */
  async harvestItem(item: WorkItem, maxCommits: number): Promise<ResultRow[]> {
    const login = item.contributor.login;

    const profileLocation = await this.client.getUserLocation(login);
    if (profileLocation === null && this.options.missingLocation === 'drop') {
      console.log(`    Skipped contributor without location: ${login}`);
      return [];
    }
    const location = profileLocation ?? UNKNOWN_LOCATION;

    console.log(`    Getting commits for ${login} in ${item.repository.fullName}...`);
    const commits = await this.fetchCommits(item, maxCommits);

    const rows =
      commits.length > 0
        ? commits.map((record) => toRow(item, location, record))
        : [toRow(item, location, null)];

    console.log(`    Processed contributor: ${login} (${commits.length} commits)`);
    return rows;
  }

  /**
   * Harvest all work items on a pool of maxWorkers. Rows arrive in
   * completion order; a failing item is logged and dropped.
   */
  async harvest(items: WorkItem[], maxWorkers: number, maxCommits: number): Promise<HarvestResult> {
    const pool = new BoundedPool({ maxConcurrent: maxWorkers });

    const tasks = items.map((item) => () => this.harvestItem(item, maxCommits));

    const { results, failures } = await pool.run(tasks, {
      onProgress: (progress: BatchProgress) => {
        if (progress.completed % PROGRESS_EVERY === 0 || progress.completed === progress.total) {
          console.log(`Processed contributors: ${progress.completed}/${progress.total}`);
        }
      },
      onError: (error, index) => {
        const item = items[index];
        console.error(
          `Error processing contributor ${item.contributor.login} in ${item.repository.fullName}: ${errorMessage(error)}`
        );
      },
    });

    return { rows: results.flat(), failedItems: failures };
  }
}
