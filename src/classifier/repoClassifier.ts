/**
 * Keyword heuristics that decide whether a repository holds code and what
 * kind of project it is.
 */

import { SearchRepository } from '../githubSchemas';
import { RepoCategory } from '../types';
import { safeLower } from '../utils';
import keywords from './keywords.json';

// ============================================================================
// Keyword Tables
// ============================================================================

const CORPORATE_OWNERS = new Set(keywords.corporateOwners);
const EDUCATIONAL_KEYWORDS = keywords.educationalKeywords;
const EDUCATIONAL_TOPICS = new Set(keywords.educationalTopics);
const NON_TECH_KEYWORDS = keywords.nonTechKeywords;
const KNOWN_NON_TECH_REPOS = keywords.knownNonTechRepos;
const NON_TECH_PATTERNS: RegExp[] = keywords.nonTechPatterns.map((source) => new RegExp(source));
const NON_PROGRAMMING_LANGUAGES = new Set(keywords.nonProgrammingLanguages);

/** Indicators needed before a keyword count decides the outcome. */
const KEYWORD_THRESHOLD = 2;

export type ClassifiableRepository = Pick<
  SearchRepository,
  'name' | 'full_name' | 'owner' | 'organization' | 'language' | 'description' | 'topics'
>;

export interface TechnicalAssessment {
  technical: boolean;
  reason?: string;
}

// ============================================================================
// Functions
// ============================================================================

function countKeywords(text: string, words: string[]): number {
  return words.filter((word) => text.includes(word)).length;
}

function isLikelyNonTech(repo: ClassifiableRepository): boolean {
  const fullName = safeLower(repo.full_name);
  const description = safeLower(repo.description);

  if (KNOWN_NON_TECH_REPOS.some((marker) => fullName.includes(marker))) {
    return true;
  }

  const text = `${fullName} ${description}`;
  return NON_TECH_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Check that a repository is a software project rather than a collection of
 * books, lists or course material.
 */
export function assessTechnical(repo: ClassifiableRepository): TechnicalAssessment {
  if (!repo.language || NON_PROGRAMMING_LANGUAGES.has(repo.language)) {
    return { technical: false, reason: 'no programming language' };
  }

  const text = `${safeLower(repo.name)} ${safeLower(repo.description)}`;
  if (countKeywords(text, NON_TECH_KEYWORDS) >= KEYWORD_THRESHOLD) {
    return { technical: false, reason: 'non-technical content' };
  }

  if (isLikelyNonTech(repo)) {
    return { technical: false, reason: 'likely non-technical' };
  }

  return { technical: true };
}

export function isTechnicalRepository(repo: ClassifiableRepository): boolean {
  return assessTechnical(repo).technical;
}

export function classifyRepository(repo: ClassifiableRepository): RepoCategory {
  const ownerLogin = safeLower(repo.owner.login);
  if (CORPORATE_OWNERS.has(ownerLogin) || repo.organization) {
    return 'corporate';
  }

  const text = `${safeLower(repo.name)} ${safeLower(repo.description)}`;
  if (countKeywords(text, EDUCATIONAL_KEYWORDS) >= KEYWORD_THRESHOLD) {
    return 'educational';
  }

  if (repo.topics.some((topic) => EDUCATIONAL_TOPICS.has(safeLower(topic)))) {
    return 'educational';
  }

  return 'open_source';
}
