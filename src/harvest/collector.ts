/**
 * Dataset collector: discovery, then contributor expansion on one pool, then
 * commit harvesting on a second pool.
 */

import { GitHubClient, GitHubClientConfig } from '../apiClient';
import { HarvestConfig } from '../config';
import { errorMessage } from '../errors';
import { CollectResult, Repository, WorkItem } from '../types';
import { BoundedPool } from '../utils';
import { RepositoryDiscovery } from './discovery';
import { ContributorExpansion } from './expansion';
import { CommitHarvester } from './harvester';

/**
 * Build a client for a run. Extra options (budget, clock, transport) pass
 * through untouched.
 */
export function createClient(config: HarvestConfig, extra: Partial<GitHubClientConfig> = {}): GitHubClient {
  return new GitHubClient({
    token: config.token,
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    rateLimitMarginMs: config.rateLimitMarginMs,
    maxNetworkRetries: config.maxNetworkRetries,
    networkRetryDelayMs: config.networkRetryDelayMs,
    maxQuotaWaits: config.maxQuotaWaits,
    ...extra,
  });
}

export class DatasetCollector {
  private discovery: RepositoryDiscovery;
  private expansion: ContributorExpansion;
  private harvester: CommitHarvester;

  constructor(private config: HarvestConfig, client: GitHubClient = createClient(config)) {
    this.discovery = new RepositoryDiscovery(client, { searchQuery: config.searchQuery });
    this.expansion = new ContributorExpansion(client);
    this.harvester = new CommitHarvester(client, { missingLocation: config.missingLocation });
  }

  /**
   * Run the whole crawl. Never throws: a failure before harvesting yields an
   * empty dataset.
   */
  async collect(): Promise<CollectResult> {
    const startTime = Date.now();
    const stats = {
      repositories: 0,
      failedRepositories: 0,
      workItems: 0,
      failedWorkItems: 0,
      rows: 0,
      durationMs: 0,
    };

    try {
      const repositories = await this.discovery.discover(this.config.maxRepositories, this.config.minCommits);
      stats.repositories = repositories.length;

      const { workItems, failures } = await this.expand(repositories);
      stats.workItems = workItems.length;
      stats.failedRepositories = failures;
      console.log(`\nTotal contributors collected for processing: ${workItems.length}`);

      console.log('Processing contributors and fetching commits in parallel...');
      const { rows, failedItems } = await this.harvester.harvest(
        workItems,
        this.config.maxWorkers,
        this.config.maxCommitsPerContributor
      );
      stats.failedWorkItems = failedItems;
      stats.rows = rows.length;
      stats.durationMs = Date.now() - startTime;

      return { rows, stats };
    } catch (error) {
      console.error(`Collection failed: ${errorMessage(error)}`);
      stats.durationMs = Date.now() - startTime;
      return { rows: [], stats };
    }
  }

  private async expand(repositories: Repository[]): Promise<{ workItems: WorkItem[]; failures: number }> {
    console.log(`\nStarting parallel analysis of ${repositories.length} technical repositories...`);

    const pool = new BoundedPool({ maxConcurrent: this.config.expansionConcurrency });
    const tasks = repositories.map(
      (repository) => () =>
        this.expansion.workItemsFor(repository, this.config.maxContributors, this.config.minContributions)
    );

    const { results, failures } = await pool.run(tasks, {
      onError: (error, index) => {
        console.error(`Error analyzing repository ${repositories[index].fullName}: ${errorMessage(error)}`);
      },
    });

    return { workItems: results.flat(), failures };
  }
}
