import Fuse, { type IFuseOptions } from 'fuse.js';
import chalk from 'chalk';
import type { ApplicationRecord } from '../storage/records/index.js';
import { statusColor } from './format.js';

/**
 * Fuzzy search result
 */
export interface FuzzySearchResult {
  item: ApplicationRecord;
  score: number;
  matches?: Array<{
    key: string;
    indices: Array<[number, number]>;
  }>;
}

/**
 * Default fuse.js options for application search
 */
const FUSE_OPTIONS: IFuseOptions<ApplicationRecord> = {
  // Search in these fields, company first
  keys: [
    { name: 'company', weight: 0.45 },
    { name: 'position', weight: 0.35 },
    { name: 'status', weight: 0.1 },
    { name: 'portalUrl', weight: 0.1 },
  ],
  // Include matches for highlighting
  includeMatches: true,
  // Include score for ranking
  includeScore: true,
  // Threshold - 0 is exact match, 1 is match anything
  threshold: 0.4,
  // A single character is enough to start matching
  minMatchCharLength: 1,
  // "acme" finds "Acme"
  isCaseSensitive: false,
  // Keep matching after the first hit so every span is highlighted
  findAllMatches: true,
  // Ignore location (search anywhere in the string)
  ignoreLocation: true,
};

export function createRecordSearch(records: readonly ApplicationRecord[]): Fuse<ApplicationRecord> {
  return new Fuse([...records], FUSE_OPTIONS);
}

/**
 * Rank records against a loose query. An empty query returns everything.
 */
export function fuzzySearchRecords(
  records: readonly ApplicationRecord[],
  query: string
): FuzzySearchResult[] {
  if (!query.trim()) {
    return records.map(item => ({
      item,
      score: 0,
    }));
  }

  const results = createRecordSearch(records).search(query);

  return results.map(result => ({
    item: result.item,
    score: result.score ?? 0,
    matches: result.matches?.map(match => ({
      key: match.key ?? '',
      indices: match.indices.map(([start, end]): [number, number] => [start, end]),
    })),
  }));
}

/**
 * Highlight matching parts of a string
 */
export function highlightMatches(
  text: string,
  indices: ReadonlyArray<readonly [number, number]>
): string {
  if (indices.length === 0) {
    return text;
  }

  let result = '';
  let lastEnd = 0;

  const sortedIndices = [...indices].sort((a, b) => a[0] - b[0]);

  for (const [start, end] of sortedIndices) {
    if (start < lastEnd) {
      continue;
    }
    if (start > lastEnd) {
      result += text.slice(lastEnd, start);
    }
    result += chalk.yellow.bold(text.slice(start, end + 1));
    lastEnd = end + 1;
  }

  if (lastEnd < text.length) {
    result += text.slice(lastEnd);
  }

  return result;
}

/**
 * Format a search hit with highlighted company and position.
 */
export function formatSearchResult(result: FuzzySearchResult): string {
  const { item, matches } = result;

  const companyMatch = matches?.find(m => m.key === 'company');
  const positionMatch = matches?.find(m => m.key === 'position');
  const company = companyMatch ? highlightMatches(item.company, companyMatch.indices) : item.company;
  const position = positionMatch ? highlightMatches(item.position, positionMatch.indices) : item.position;

  const num = chalk.gray(`${item.id + 1}.`.padStart(4));
  return `${num} ${chalk.cyan(company)} ${chalk.gray('·')} ${position} ${chalk.gray(`(${item.dateApplied})`)} ${statusColor(item.status)(item.status)}`;
}

/**
 * Score threshold for "good" matches
 */
export const GOOD_MATCH_THRESHOLD = 0.3;
export const WEAK_MATCH_THRESHOLD = 0.6;

export function getMatchQuality(score: number): string {
  if (score <= GOOD_MATCH_THRESHOLD) {
    return chalk.green('●');
  } else if (score <= WEAK_MATCH_THRESHOLD) {
    return chalk.yellow('●');
  } else {
    return chalk.red('○');
  }
}
