/**
 * Summary Tests
 *
 * Tests dataset counts and the printed report.
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { printSummary, summarizeRows } from '../../sink';
import { CollectStats, ResultRow } from '../../types';

function row(overrides: Partial<ResultRow>): ResultRow {
  return {
    repo_id: 1,
    repo_name: 'acme/one',
    repo_type: 'open_source',
    stars: 1000,
    contributor_login: 'alice',
    contributor_location: 'Paris',
    contributions: 300,
    commit_sha: 'aaaa1111',
    commit_date: '2024-01-01 00:00:00',
    commit_message: 'Work',
    ...overrides,
  };
}

const rows: ResultRow[] = [
  row({}),
  row({ commit_sha: 'aaaa2222' }),
  row({
    repo_id: 2,
    repo_name: 'google/two',
    repo_type: 'corporate',
    contributor_login: 'dave',
    commit_sha: 'N/A',
    commit_date: 'N/A',
    commit_message: 'N/A',
  }),
];

describe('summarizeRows', () => {
  it('counts repositories, contributors and commit coverage', () => {
    expect(summarizeRows(rows)).toEqual({
      uniqueRepositories: 2,
      uniqueContributors: 2,
      totalRows: 3,
      rowsWithCommits: 2,
      rowsWithoutCommits: 1,
      rowsByCategory: { corporate: 1, educational: 0, open_source: 2 },
    });
  });

  it('handles an empty dataset', () => {
    expect(summarizeRows([])).toEqual({
      uniqueRepositories: 0,
      uniqueContributors: 0,
      totalRows: 0,
      rowsWithCommits: 0,
      rowsWithoutCommits: 0,
      rowsByCategory: { corporate: 0, educational: 0, open_source: 0 },
    });
  });
});

describe('printSummary', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prints the totals and the output path', () => {
    const lines: string[] = [];
    jest.spyOn(console, 'log').mockImplementation((message?: unknown) => {
      lines.push(String(message));
    });
    const stats: CollectStats = {
      repositories: 2,
      failedRepositories: 0,
      workItems: 3,
      failedWorkItems: 1,
      rows: 3,
      durationMs: 2500,
    };

    printSummary(summarizeRows(rows), stats, 'out/data.csv');

    const output = lines.join('\n');
    expect(output).toContain('COLLECTION SUMMARY');
    expect(output).toContain('out/data.csv');
    expect(output).toContain('2.50s');
  });
});
