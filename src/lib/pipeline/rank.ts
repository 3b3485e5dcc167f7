/**
 * Ranking pipeline
 * Loads crawled papers and ranks them with the BM25 matcher
 */

import type { KeywordInput, RankedPaper } from "../model";
import { loadPapersFromDirectory } from "../storage/papers";
import { BM25Matcher, DEFAULT_THRESHOLD } from "./bm25";
import { logger } from "../logger";

export interface FindRelevantOptions {
  dataDir: string;
  keywords: KeywordInput;
  threshold?: number;
  topK?: number | null;
}

/**
 * Find papers relevant to the configured keywords
 */
export function findRelevantPapers(options: FindRelevantOptions): RankedPaper[] {
  const { dataDir, keywords, threshold = DEFAULT_THRESHOLD, topK = null } = options;

  // Configure first so bad weights fail before any file is read
  const matcher = BM25Matcher.configure(keywords);

  const papers = loadPapersFromDirectory(dataDir);

  if (papers.length === 0) {
    logger.warn("No paper data found, run the crawler first", { dataDir });
    return [];
  }

  logger.info(`Loaded ${papers.length} papers`);

  const ranked = matcher.score(papers, threshold, topK);

  logger.info(`Found ${ranked.length} relevant papers`, {
    threshold,
    topK: topK ?? "unlimited",
    keywords: matcher.keywords,
  });

  return ranked;
}
