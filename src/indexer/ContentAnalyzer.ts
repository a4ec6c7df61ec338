/**
 * Chunk-level metadata derivation
 *
 * Classification, complexity, keywords and summaries are driven by the
 * lexicon so rule changes never touch this code.
 */

import type { Lexicon } from '../config/lexicon.js';

const URL_PATTERN = /https?:\/\/[^\s]+/;
const CAPITALIZED_WORD = /\b[A-Z][a-zA-Z]+\b/g;

const MAX_KEYWORDS = 10;
const MAX_CAPITALIZED = 5;
const SUMMARY_LENGTH = 100;

export interface ContentAnalysis {
  tokenCount: number;
  charCount: number;
  contentType: string;
  complexityScore: number;
  keywords: string[];
  summary: string;
  hasCode: boolean;
  hasUrls: boolean;
}

/**
 * Rough token count: one token per four characters
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export class ContentAnalyzer {
  constructor(private readonly lexicon: Lexicon) {}

  analyze(content: string, docType: string): ContentAnalysis {
    return {
      tokenCount: estimateTokens(content),
      charCount: content.length,
      contentType: this.classify(content, docType),
      complexityScore: this.complexity(content),
      keywords: this.keywords(content),
      summary: this.summarize(content),
      hasCode: this.hasCode(content),
      hasUrls: URL_PATTERN.test(content),
    };
  }

  classify(content: string, docType: string): string {
    const lower = content.toLowerCase();
    for (const rule of this.lexicon.contentTypes) {
      const haystack = rule.caseSensitive ? content : lower;
      if (rule.signals.some((signal) => haystack.includes(signal))) {
        return rule.type;
      }
    }
    return docType || 'general';
  }

  hasCode(content: string): boolean {
    return this.lexicon.codeIndicators.some((indicator) => content.includes(indicator));
  }

  /**
   * Score in [0, 1]: terms (max 0.3), code 0.3, length 0.2, sentences 0.2
   */
  complexity(content: string): number {
    const lower = content.toLowerCase();
    let score = 0;

    const termHits = this.lexicon.complexityTerms.filter((term) => lower.includes(term)).length;
    score += Math.min(termHits * 0.1, 0.3);

    if (this.hasCode(content)) {
      score += 0.3;
    }
    if (content.length > 800) {
      score += 0.2;
    }

    const sentences = content.split('.').filter((sentence) => sentence.trim().length > 0);
    if (sentences.length > 5) {
      score += 0.2;
    }

    return Math.min(score, 1);
  }

  keywords(content: string): string[] {
    const lower = content.toLowerCase();
    const found = this.lexicon.technicalKeywords.filter((keyword) => lower.includes(keyword));
    const capitalized = (content.match(CAPITALIZED_WORD) ?? []).slice(0, MAX_CAPITALIZED);
    return [...new Set([...found, ...capitalized])].slice(0, MAX_KEYWORDS);
  }

  summarize(content: string): string {
    const firstSentence = content.split('.')[0].trim();
    if (firstSentence.length > 20) {
      return `${firstSentence}.`;
    }
    return content.length > SUMMARY_LENGTH ? `${content.slice(0, SUMMARY_LENGTH)}...` : content;
  }
}
