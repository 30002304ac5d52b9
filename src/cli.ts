/**
 * Command-line surface of the harvester.
 *
 * Commands:
 *   repo-harvester collect   - Crawl GitHub and write the dataset to CSV
 */

import { Command, InvalidArgumentError } from 'commander';
import { HarvestConfig, isMissingLocationPolicy, loadConfig, validateConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { DatasetCollector } from './harvest';
import { printSummary, summarizeRows, writeRowsCsv } from './sink';
import { fileTimestamp, formatDuration } from './utils';

export interface CollectOptions {
  token?: string;
  repos?: number;
  contributors?: number;
  minContributions?: number;
  minCommits?: number;
  maxCommits?: number;
  workers?: number;
  query?: string;
  missingLocation?: string;
  output?: string;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Apply command-line flags on top of an environment-derived config.
 */
export function applyCollectOptions(base: HarvestConfig, options: CollectOptions): HarvestConfig {
  const config: HarvestConfig = { ...base };

  if (options.token) config.token = options.token;
  if (options.repos !== undefined) config.maxRepositories = options.repos;
  if (options.contributors !== undefined) config.maxContributors = options.contributors;
  if (options.minContributions !== undefined) config.minContributions = options.minContributions;
  if (options.minCommits !== undefined) config.minCommits = options.minCommits;
  if (options.maxCommits !== undefined) config.maxCommitsPerContributor = options.maxCommits;
  if (options.workers !== undefined) config.maxWorkers = options.workers;
  if (options.query) config.searchQuery = options.query;

  if (options.missingLocation !== undefined) {
    if (!isMissingLocationPolicy(options.missingLocation)) {
      throw new ConfigError([`--missing-location must be "drop" or "sentinel", got "${options.missingLocation}"`]);
    }
    config.missingLocation = options.missingLocation;
  }

  return validateConfig(config);
}

export function defaultOutputPath(now: Date = new Date()): string {
  return `github_data_${fileTimestamp(now)}.csv`;
}

function printConfiguration(config: HarvestConfig): void {
  console.log('Starting GitHub data collection...');
  console.log('Configuration:');
  console.log(`  Repositories: ${config.maxRepositories}`);
  console.log(`  Contributors per repo: ${config.maxContributors}`);
  console.log(`  Min contributions: ${config.minContributions}`);
  console.log(`  Min commits per repo: ${config.minCommits}`);
  console.log(`  Max commits per contributor: ${config.maxCommitsPerContributor}`);
  console.log(`  Worker pool size: ${config.maxWorkers}`);
  console.log(`  Missing location policy: ${config.missingLocation}`);
  console.log('');
}

async function runCollect(options: CollectOptions): Promise<number> {
  let config: HarvestConfig;
  try {
    config = applyCollectOptions(loadConfig(), options);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }

  if (!config.token) {
    console.error('Error: GitHub token is required for data collection.');
    console.error('Use --token argument or set GITHUB_TOKEN environment variable.');
    return 1;
  }

  printConfiguration(config);

  const collector = new DatasetCollector(config);
  const { rows, stats } = await collector.collect();
  console.log(`Collection completed in ${formatDuration(stats.durationMs)}`);

  const outputPath = options.output || defaultOutputPath();
  writeRowsCsv(rows, outputPath);
  printSummary(summarizeRows(rows), stats, outputPath);
  return 0;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('repo-harvester')
    .description('Collect a repository / contributor / commit dataset from the GitHub API')
    .version('1.0.0');

  program
    .command('collect')
    .description('Collect GitHub repository data into a CSV file')
    .option('--token <token>', 'GitHub API token (or use GITHUB_TOKEN env variable)')
    .option('--repos <number>', 'Maximum repositories to analyze (default: 100)', parseNonNegativeInt)
    .option('--contributors <number>', 'Maximum contributors per repository (default: 50)', parseNonNegativeInt)
    .option('--min-contributions <number>', 'Minimum contributions per contributor (default: 100)', parseNonNegativeInt)
    .option('--min-commits <number>', 'Minimum commits per repository (default: 1000)', parseNonNegativeInt)
    .option('--max-commits <number>', 'Maximum commits per contributor (default: 1000)', parseNonNegativeInt)
    .option('--workers <number>', 'Number of concurrent harvest workers (default: 50)', parseNonNegativeInt)
    .option('--query <query>', 'Repository search query')
    .option('--missing-location <policy>', 'Contributors without a location: drop | sentinel (default: drop)')
    .option('-o, --output <path>', 'Output CSV filename')
    .action(async (options: CollectOptions) => {
      process.exitCode = await runCollect(options);
    });

  return program;
}
