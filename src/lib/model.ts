/**
 * Core data models for the Paper Digest
 */

export interface Paper {
  id: string;
  title: string;
  summary: string;
  authors: string[];
  categories: string[];
  absUrl: string;
  pdfUrl: string;
  comment: string;
  relevanceScore: number; // set by BM25Matcher.score() for papers above threshold
}

/**
 * Keywords as supplied by the user: a plain list (weight 1.0 each)
 * or an explicit term -> weight mapping
 */
export type KeywordInput = string[] | Record<string, number>;

/**
 * Normalized keyword weights, lowercase keys in configuration order
 */
export type KeywordWeights = ReadonlyMap<string, number>;

export interface MatchDetail {
  titleKeywords: string[];
  abstractKeywords: string[];
  allMatched: string[];
  titleScore: number; // after title boost
  abstractScore: number;
  keywordWeights: Record<string, number>;
}

export interface RankedPaper {
  paper: Paper;
  details: MatchDetail;
}

export interface CorpusStats {
  documentCount: number;
  averageLength: number;
  documentFrequency: Map<string, number>;
}
