/**
 * Role-aware re-ranking
 *
 * Role relevance, per candidate:
 *   + keywordPoints     per distinct role keyword present in the content
 *   + roleTagPoints     when the chunk's role tags contain the role
 *   + contentTypePoints when the chunk's content type suits the role
 * divided by the candidate's word count (at least 1).
 *
 * Candidates are then ordered by `(1 - distance) + relevance`.
 */

import type { Lexicon } from '../config/lexicon.js';
import { isPartition, type RankedResult, type SearchHit } from '../core/types.js';
import { isStringArray, wordCount } from '../shared/utils.js';

export function combinedScore(distance: number, roleRelevanceScore: number): number {
  return 1 - distance + roleRelevanceScore;
}

/**
 * Descending combined score, ties by ascending distance
 */
export function compareRanked(a: RankedResult, b: RankedResult): number {
  return b.combinedScore - a.combinedScore || a.distance - b.distance;
}

export class RoleRanker {
  constructor(private readonly lexicon: Lexicon) {}

  relevance(candidate: Pick<SearchHit, 'content' | 'metadata'>, role: string): number {
    const { scoring } = this.lexicon;
    const content = candidate.content.toLowerCase();
    const keywords = isPartition(role) ? this.lexicon.roleKeywords[role] : [];
    const bonusTypes = isPartition(role) ? this.lexicon.roleContentTypes[role] : [];

    let score = 0;
    for (const keyword of keywords) {
      if (content.includes(keyword)) {
        score += scoring.keywordPoints;
      }
    }

    const roleTags = candidate.metadata.roleTags;
    if (isStringArray(roleTags) && roleTags.includes(role)) {
      score += scoring.roleTagPoints;
    }

    const contentType = candidate.metadata.contentType;
    if (typeof contentType === 'string' && bonusTypes.includes(contentType)) {
      score += scoring.contentTypePoints;
    }

    return score / Math.max(wordCount(candidate.content), 1);
  }

  /**
   * Score, order and truncate candidates
   */
  rank(candidates: readonly SearchHit[], role: string, limit: number): RankedResult[] {
    return candidates
      .map((candidate) => {
        const roleRelevanceScore = this.relevance(candidate, role);
        return {
          ...candidate,
          roleRelevanceScore,
          combinedScore: combinedScore(candidate.distance, roleRelevanceScore),
        };
      })
      .sort(compareRanked)
      .slice(0, Math.max(limit, 0));
  }
}
