/**
 * Contributor expansion: the high-volume contributors of one repository.
 */

import { GitHubClient } from '../apiClient';
import { contributorSchema } from '../githubSchemas';
import { Contributor, Repository, WorkItem } from '../types';
import { Paginator } from './paginator';

const CONTRIBUTORS_PAGE_SIZE = 100;
const CONTRIBUTORS_PAGE_DELAY_MS = 100;

export class ContributorExpansion {
  private paginator: Paginator;

  constructor(client: GitHubClient) {
    this.paginator = new Paginator(client);
  }

  /**
   * List up to maxContributors contributors with at least minContributions
   * contributions, in upstream order. Anonymous contributors are excluded by
   * the query.
   */
  async expand(repository: Repository, maxContributors: number, minContributions: number): Promise<Contributor[]> {
    const contributors = await this.paginator.collect<Contributor>(
      {
        path: `/repos/${repository.ownerLogin}/${repository.name}/contributors`,
        params: { anon: '0' },
        perPage: CONTRIBUTORS_PAGE_SIZE,
        maxItems: maxContributors,
        pageDelayMs: CONTRIBUTORS_PAGE_DELAY_MS,
      },
      (raw) => {
        const parsed = contributorSchema.safeParse(raw);
        if (!parsed.success || parsed.data.contributions < minContributions) {
          return null;
        }
        return { login: parsed.data.login, contributions: parsed.data.contributions };
      }
    );

    console.log(
      `  ${repository.fullName}: ${contributors.length} contributors after filtering (minimum ${minContributions} contributions)`
    );
    return contributors;
  }

  /**
   * Expand a repository straight into its work items.
   */
  async workItemsFor(repository: Repository, maxContributors: number, minContributions: number): Promise<WorkItem[]> {
    console.log(
      `Analyzing repository: ${repository.fullName} (${repository.language ?? 'No language'}, ` +
        `${repository.commitCount} commits, type: ${repository.category}, stars: ${repository.stars})`
    );
    const contributors = await this.expand(repository, maxContributors, minContributions);
    return contributors.map((contributor) => ({ repository, contributor }));
  }
}
