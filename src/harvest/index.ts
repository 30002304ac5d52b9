export { Paginator, type PageQuery, type AcceptFn } from './paginator';
export { RepositoryDiscovery, type DiscoveryOptions } from './discovery';
export { ContributorExpansion } from './expansion';
export { CommitHarvester, toCommitRecord, type HarvesterOptions, type HarvestResult } from './harvester';
export { DatasetCollector, createClient } from './collector';
