/**
 * Destination/tag matching
 *
 * A destination is scored against free-text query terms through the
 * synonyms of the tags it carries:
 *
 *   best(q)  = max over the destination's tags of relevance × (2 if a synonym
 *              equals q, 1 if a synonym contains q), first matching synonym
 *              per tag
 *   coverage = matched queries / n
 *   average  = Σ best(q) / n
 *   score    = 0.4 × coverage + 0.6 × average
 *
 * The score is not a probability. An exact match doubles the relevance, so
 * with relevance 1 a destination scores up to 0.4 + 0.6 × 2 = 1.6 and
 * thresholds must be treated as open-ended.
 */

import type {
  Destination,
  LanguageCode,
  ScoredDestination,
  Tag,
} from "@/types";
import { getTagSynonyms } from "./names";

export const COVERAGE_WEIGHT = 0.4;
export const QUALITY_WEIGHT = 0.6;
export const EXACT_MATCH_MULTIPLIER = 2.0;
export const PARTIAL_MATCH_MULTIPLIER = 1.0;

/**
 * Anything that can resolve a tag id (TagRegistry in practice)
 */
export interface TagLookup {
  getTag(id: string): Tag | undefined;
}

export interface QueryMatch {
  query: string;
  /** Tag that produced the best score, null when nothing matched */
  tagId: string | null;
  synonym: string | null;
  bestScore: number;
  exact: boolean;
}

export interface MatchBreakdown {
  score: number;
  matchedCount: number;
  coverage: number;
  average: number;
  queries: QueryMatch[];
}

export interface RankOptions {
  minScore: number;
  limit: number;
}

function emptyBreakdown(queries: string[]): MatchBreakdown {
  return {
    score: 0,
    matchedCount: 0,
    coverage: 0,
    average: 0,
    queries: queries.map((query) => ({
      query,
      tagId: null,
      synonym: null,
      bestScore: 0,
      exact: false,
    })),
  };
}

/**
 * Best match of one query term against a destination's tags
 */
function matchQuery(
  query: string,
  destination: Destination,
  language: LanguageCode,
  tags: TagLookup,
): QueryMatch {
  const needle = query.toLowerCase();
  const best: QueryMatch = {
    query,
    tagId: null,
    synonym: null,
    bestScore: 0,
    exact: false,
  };

  for (const [tagId, relevance] of Object.entries(destination.tags)) {
    const tag = tags.getTag(tagId);
    if (!tag) continue; // dangling reference

    for (const synonym of getTagSynonyms(tag, language)) {
      const haystack = synonym.toLowerCase();
      if (!haystack.includes(needle)) continue;

      const exact = haystack === needle;
      const score =
        relevance * (exact ? EXACT_MATCH_MULTIPLIER : PARTIAL_MATCH_MULTIPLIER);
      if (score > best.bestScore) {
        best.tagId = tagId;
        best.synonym = synonym;
        best.bestScore = score;
        best.exact = exact;
      }
      break; // first matching synonym decides for this tag
    }
  }

  return best;
}

/**
 * Score a destination and keep the per-query detail
 */
export function explainTagMatch(
  destination: Destination,
  queries: string[],
  language: LanguageCode,
  tags: TagLookup,
): MatchBreakdown {
  if (queries.length === 0 || Object.keys(destination.tags).length === 0) {
    return emptyBreakdown(queries);
  }

  const matches = queries.map((query) =>
    matchQuery(query, destination, language, tags),
  );

  const matchedCount = matches.filter((m) => m.bestScore > 0).length;
  const total = matches.reduce((sum, m) => sum + m.bestScore, 0);
  const coverage = matchedCount / queries.length;
  const average = total / queries.length;

  return {
    score: COVERAGE_WEIGHT * coverage + QUALITY_WEIGHT * average,
    matchedCount,
    coverage,
    average,
    queries: matches,
  };
}

export function calculateTagMatchScore(
  destination: Destination,
  queries: string[],
  language: LanguageCode,
  tags: TagLookup,
): number {
  return explainTagMatch(destination, queries, language, tags).score;
}

/**
 * Score every destination, keep those at or above `minScore`, best first.
 * Full scan: no index is kept over destinations.
 */
export function rankDestinations(
  destinations: Iterable<Destination>,
  queries: string[],
  language: LanguageCode,
  tags: TagLookup,
  options: RankOptions,
): ScoredDestination[] {
  const results: ScoredDestination[] = [];

  for (const destination of destinations) {
    const score = calculateTagMatchScore(destination, queries, language, tags);
    if (score >= options.minScore) {
      results.push({ destination, score });
    }
  }

  return results
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, options.limit));
}

/**
 * One-line summary of a breakdown, e.g. for logs
 */
export function formatMatchSummary(breakdown: MatchBreakdown): string {
  const parts = breakdown.queries.map((m) => {
    if (!m.tagId) return `${m.query}=-`;
    const kind = m.exact ? "exact" : "partial";
    return `${m.query}=${m.tagId}:${kind}:${m.bestScore.toFixed(2)}`;
  });
  return `[${parts.join(", ")}] coverage=${breakdown.coverage.toFixed(2)} average=${breakdown.average.toFixed(2)} → ${breakdown.score.toFixed(3)}`;
}
