/**
 * End-of-run report for a harvested dataset.
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { CollectStats, DatasetSummary, NOT_AVAILABLE, RepoCategory, ResultRow } from '../types';
import { formatDuration } from '../utils';

export function summarizeRows(rows: ResultRow[]): DatasetSummary {
  const repositories = new Set<number>();
  const contributors = new Set<string>();
  const rowsByCategory: Record<RepoCategory, number> = {
    corporate: 0,
    educational: 0,
    open_source: 0,
  };
  let rowsWithCommits = 0;

  for (const row of rows) {
    repositories.add(row.repo_id);
    contributors.add(row.contributor_login);
    rowsByCategory[row.repo_type]++;
    if (row.commit_sha !== NOT_AVAILABLE) {
      rowsWithCommits++;
    }
  }

  return {
    uniqueRepositories: repositories.size,
    uniqueContributors: contributors.size,
    totalRows: rows.length,
    rowsWithCommits,
    rowsWithoutCommits: rows.length - rowsWithCommits,
    rowsByCategory,
  };
}

export function printSummary(summary: DatasetSummary, stats: CollectStats, outputPath: string): void {
  console.log('');
  console.log(chalk.bold.cyan('═══════════════════════════════════════════'));
  console.log(chalk.bold.cyan('            COLLECTION SUMMARY'));
  console.log(chalk.bold.cyan('═══════════════════════════════════════════'));

  const table = new Table({
    style: { head: [], border: [] },
  });
  table.push(
    [chalk.gray('Unique repositories'), `${summary.uniqueRepositories}`],
    [chalk.gray('Unique contributors'), `${summary.uniqueContributors}`],
    [chalk.gray('Total records'), `${summary.totalRows}`],
    [chalk.gray('Records with commit data'), chalk.green(`${summary.rowsWithCommits}`)],
    [chalk.gray('Records without commit data'), chalk.yellow(`${summary.rowsWithoutCommits}`)],
    [chalk.gray('Failed repositories'), colorFailures(stats.failedRepositories)],
    [chalk.gray('Failed contributors'), colorFailures(stats.failedWorkItems)],
    [chalk.gray('Duration'), formatDuration(stats.durationMs)],
    [chalk.gray('Output file'), outputPath]
  );
  console.log(table.toString());

  const byType = new Table({
    head: [chalk.white('Repository type'), chalk.white('Records')],
    style: { head: [], border: [] },
  });
  for (const [category, count] of Object.entries(summary.rowsByCategory)) {
    byType.push([category, `${count}`]);
  }
  console.log(byType.toString());
}

function colorFailures(count: number): string {
  return count > 0 ? chalk.red(`${count}`) : `${count}`;
}
