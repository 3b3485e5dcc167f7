/**
 * BM25 ranking pipeline
 * Scores papers against weighted keyword interests with field-aware boosting
 */

import type { CorpusStats, KeywordInput, MatchDetail, Paper, RankedPaper } from "../model";
import {
  buildKeywordMatchers,
  countMatches,
  type KeywordMatcherSet,
  normalizeKeywords,
  tokenize,
} from "./keywords";

export const DEFAULT_THRESHOLD = 0.5;

interface FieldScore {
  score: number;
  matched: string[];
}

/**
 * Weighted-keyword BM25 matcher
 * Corpus statistics are rebuilt on every score() call; only the compiled
 * keyword matchers live on the instance.
 */
export class BM25Matcher {
  private readonly K1 = 1.5; // saturation parameter
  private readonly B = 0.75; // length normalization
  private readonly TITLE_BOOST = 3.0;
  private readonly OVERLAP_BONUS = 0.1;

  constructor(private readonly matchers: KeywordMatcherSet) {}

  /**
   * Normalize keywords and compile their matchers
   */
  static configure(keywords: KeywordInput): BM25Matcher {
    return new BM25Matcher(buildKeywordMatchers(normalizeKeywords(keywords)));
  }

  get keywords(): string[] {
    return this.matchers.map((m) => m.keyword);
  }

  /**
   * Count, average length and per-keyword document frequency over title + summary
   */
  buildCorpusStats(papers: readonly Paper[]): CorpusStats {
    const documentFrequency = new Map<string, number>();
    for (const m of this.matchers) {
      documentFrequency.set(m.keyword, 0);
    }

    let totalLength = 0;

    for (const paper of papers) {
      const text = `${paper.title} ${paper.summary}`.toLowerCase();
      totalLength += tokenize(text).length;

      for (const m of this.matchers) {
        if (countMatches(m.pattern, text) > 0) {
          documentFrequency.set(m.keyword, (documentFrequency.get(m.keyword) ?? 0) + 1);
        }
      }
    }

    return {
      documentCount: papers.length,
      averageLength: totalLength / Math.max(papers.length, 1),
      documentFrequency,
    };
  }

  /**
   * Score every paper, keep those at or above threshold, sort descending and
   * truncate to topK. Equal scores keep collection order (stable sort).
   */
  score(
    papers: readonly Paper[],
    threshold: number = DEFAULT_THRESHOLD,
    topK?: number | null
  ): RankedPaper[] {
    const stats = this.buildCorpusStats(papers);
    const ranked: RankedPaper[] = [];

    for (const paper of papers) {
      const { total, details } = this.scorePaper(paper, stats);
      if (total >= threshold) {
        paper.relevanceScore = total;
        ranked.push({ paper, details });
      }
    }

    ranked.sort((a, b) => b.paper.relevanceScore - a.paper.relevanceScore);

    return topK != null && topK > 0 ? ranked.slice(0, topK) : ranked;
  }

  /**
   * Score a single paper against precomputed corpus statistics
   */
  scorePaper(paper: Paper, stats: CorpusStats): { total: number; details: MatchDetail } {
    const title = this.scoreField(
      paper.title.toLowerCase(),
      tokenize(paper.title).length,
      stats
    );
    const abstract = this.scoreField(
      paper.summary.toLowerCase(),
      tokenize(paper.summary).length,
      stats
    );

    const titleScore = title.score * this.TITLE_BOOST;
    let total = titleScore + abstract.score;

    const abstractSet = new Set(abstract.matched);
    const overlapWeight = this.matchers
      .filter((m) => title.matched.includes(m.keyword) && abstractSet.has(m.keyword))
      .reduce((sum, m) => sum + m.weight, 0);

    if (overlapWeight > 0) {
      total *= 1 + this.OVERLAP_BONUS * overlapWeight;
    }

    const allMatched = this.matchers
      .filter((m) => title.matched.includes(m.keyword) || abstractSet.has(m.keyword))
      .map((m) => m.keyword);

    const keywordWeights: Record<string, number> = {};
    for (const m of this.matchers) {
      if (allMatched.includes(m.keyword)) {
        keywordWeights[m.keyword] = m.weight;
      }
    }

    return {
      total,
      details: {
        titleKeywords: title.matched,
        abstractKeywords: abstract.matched,
        allMatched,
        titleScore,
        abstractScore: abstract.score,
        keywordWeights,
      },
    };
  }

  /**
   * BM25 sum over matched keywords for one lowercased field
   */
  private scoreField(text: string, fieldLength: number, stats: CorpusStats): FieldScore {
    let score = 0;
    const matched: string[] = [];
    // One corpus-wide average (title + summary) normalizes both fields
    const avgLength = Math.max(stats.averageLength, 1);

    for (const m of this.matchers) {
      const termFreq = countMatches(m.pattern, text);
      if (termFreq === 0) continue;

      matched.push(m.keyword);

      const numerator = termFreq * (this.K1 + 1);
      const denominator =
        termFreq + this.K1 * (1 - this.B + this.B * (fieldLength / avgLength));

      score += this.idf(m.keyword, stats) * (numerator / denominator) * m.weight;
    }

    return { score, matched };
  }

  /**
   * Inverse document frequency, floored at zero
   */
  private idf(keyword: string, stats: CorpusStats): number {
    const n = stats.documentFrequency.get(keyword) ?? 0;
    const idf = Math.log((stats.documentCount - n + 0.5) / (n + 0.5) + 1);
    return Math.max(idf, 0);
  }
}
