/**
 * Repository discovery: popular technical repositories with enough history.
 */

import { GitHubClient } from '../apiClient';
import { searchRepositorySchema, searchResponseSchema, SearchRepository } from '../githubSchemas';
import { assessTechnical, classifyRepository } from '../classifier';
import { errorMessage } from '../errors';
import { Repository } from '../types';
import { Paginator } from './paginator';

const MAX_SEARCH_PAGE_SIZE = 50;
/** Candidates requested per accepted repository, to absorb filter rejects. */
const OVER_FETCH_FACTOR = 3;
const SEARCH_PAGE_DELAY_MS = 1000;

export interface DiscoveryOptions {
  searchQuery: string;
}

function searchItems(body: unknown): unknown[] | null {
  const parsed = searchResponseSchema.safeParse(body);
  return parsed.success ? parsed.data.items : null;
}

function repositoryName(raw: SearchRepository): string {
  return raw.name || raw.full_name.split('/').pop() || raw.full_name;
}

function toRepository(raw: SearchRepository, commitCount: number): Repository {
  return {
    id: raw.id,
    fullName: raw.full_name,
    name: repositoryName(raw),
    ownerLogin: raw.owner.login,
    language: raw.language,
    description: raw.description ?? '',
    topics: raw.topics,
    stars: raw.stargazers_count,
    commitCount,
    category: classifyRepository(raw),
  };
}

export class RepositoryDiscovery {
  private paginator: Paginator;

  constructor(private client: GitHubClient, private options: DiscoveryOptions) {
    this.paginator = new Paginator(client);
  }

  /**
   * Accept up to targetCount repositories, in search order, whose commit
   * count is at least minCommits.
   *
   * A failure part-way through returns what was accepted until then.
   */
  async discover(targetCount: number, minCommits: number): Promise<Repository[]> {
    console.log('Getting popular technical repositories...');
    console.log(
      `Filtering: skipping repositories without a programming language, content collections and with < ${minCommits} commits`
    );

    const accepted: Repository[] = [];

    try {
      await this.paginator.collect(
        {
          path: '/search/repositories',
          params: { q: this.options.searchQuery, sort: 'stars', order: 'desc' },
          perPage: Math.min(MAX_SEARCH_PAGE_SIZE, targetCount * OVER_FETCH_FACTOR),
          maxItems: targetCount,
          limitClass: 'search',
          pageDelayMs: SEARCH_PAGE_DELAY_MS,
          extractItems: searchItems,
        },
        async (raw) => {
          const repository = await this.evaluate(raw, minCommits);
          if (repository) {
            accepted.push(repository);
            console.log(`Found suitable repositories: ${accepted.length}/${targetCount}`);
          }
          return repository;
        }
      );
    } catch (error) {
      console.error(`Repository search stopped early: ${errorMessage(error)}`);
    }

    return accepted;
  }

  private async evaluate(raw: unknown, minCommits: number): Promise<Repository | null> {
    const parsed = searchRepositorySchema.safeParse(raw);
    if (!parsed.success) {
      console.warn('Skipped: malformed search result');
      return null;
    }
    const candidate = parsed.data;

    const assessment = assessTechnical(candidate);
    if (!assessment.technical) {
      console.log(`Skipped: ${assessment.reason} - ${candidate.full_name}`);
      return null;
    }

    console.log(`Checking commits for ${candidate.full_name}...`);
    let commitCount: number;
    try {
      commitCount = await this.client.getCommitCount(candidate.owner.login, repositoryName(candidate));
    } catch (error) {
      console.error(`Skipped: commit count lookup failed for ${candidate.full_name}: ${errorMessage(error)}`);
      return null;
    }

    if (commitCount < minCommits) {
      console.log(`Skipped: too few commits (${commitCount} < ${minCommits}) - ${candidate.full_name}`);
      return null;
    }

    const repository = toRepository(candidate, commitCount);
    console.log(
      `Added repository: ${repository.fullName} (${commitCount} commits, ` +
        `${repository.language ?? 'No language'}, stars: ${repository.stars})`
    );
    return repository;
  }
}
