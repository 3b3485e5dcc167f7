/**
 * Daily digest pipeline
 * Ranks crawled papers, summarizes the picks, and delivers the digest
 */

import type { RankedPaper } from "../model";
import type { Settings } from "../../config/settings";
import { logger } from "../logger";
import { findRelevantPapers } from "./rank";
import { PaperSummarizer } from "./summarize";
import { buildSimpleReport, formatKeywords } from "./report";
import { EmailSender, digestSubject, isEmailConfigured } from "../delivery/email";
import { saveDigestLocally } from "../delivery/local";

export interface DigestRunResult {
  date: string;
  rankedCount: number;
  delivered: boolean;
  savedTo: string | null;
  digest: string;
}

export function todayString(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * LLM digest when an API key is configured, otherwise (or on failure) the plain report
 */
export async function buildDigest(
  settings: Settings,
  ranked: RankedPaper[],
  date: string
): Promise<string> {
  if (!settings.llm.apiKey) {
    logger.warn("LLM API key not set, using simple report");
    return buildSimpleReport(ranked, settings.keywords, date);
  }

  try {
    logger.info(`Summarizing with ${settings.llm.model}`, { batchSize: settings.llm.batchSize });
    const summarizer = PaperSummarizer.fromSettings(settings.llm);
    return await summarizer.generateDigest(ranked, settings.keywords, date, settings.llm.batchSize);
  } catch (error) {
    logger.error("LLM summarization failed, falling back to simple report", error);
    return buildSimpleReport(ranked, settings.keywords, date);
  }
}

/**
 * Email the digest; keep a local copy whenever it is not sent
 */
export async function deliverDigest(
  settings: Settings,
  digest: string,
  date: string
): Promise<{ delivered: boolean; savedTo: string | null }> {
  if (!isEmailConfigured(settings.email)) {
    logger.warn("Email configuration incomplete, saving digest locally");
    return { delivered: false, savedTo: saveDigestLocally(settings.dataDir, date, digest) };
  }

  const sent = await new EmailSender(settings.email).send(digestSubject(date), digest);
  if (sent) {
    logger.info("Digest emailed", { recipients: settings.email.recipients });
    return { delivered: true, savedTo: null };
  }

  return { delivered: false, savedTo: saveDigestLocally(settings.dataDir, date, digest) };
}

/**
 * Run rank -> summarize -> deliver for one day
 */
export async function runDailyDigest(
  settings: Settings,
  options: { date?: string } = {}
): Promise<DigestRunResult> {
  const date = options.date ?? todayString();
  const keywordCount = Object.keys(settings.keywords).length;

  logger.info(`Starting paper digest for ${date}`, {
    categories: settings.categories,
    keywords: keywordCount > 0 ? formatKeywords(settings.keywords) : "none",
    threshold: settings.threshold,
    topK: settings.topK ?? "unlimited",
  });

  if (keywordCount === 0) {
    logger.warn("No keywords configured; every paper scores 0");
  }

  const ranked = findRelevantPapers({
    dataDir: settings.dataDir,
    keywords: settings.keywords,
    threshold: settings.threshold,
    topK: settings.topK,
  });

  ranked.forEach(({ paper, details }, idx) => {
    logger.info(`${idx + 1}. [${paper.relevanceScore.toFixed(2)}] ${paper.title}`, {
      matched: details.allMatched,
    });
  });

  if (ranked.length === 0) {
    logger.warn("No relevant papers found, nothing to deliver");
    return { date, rankedCount: 0, delivered: false, savedTo: null, digest: "" };
  }

  const digest = await buildDigest(settings, ranked, date);
  const { delivered, savedTo } = await deliverDigest(settings, digest, date);

  return { date, rankedCount: ranked.length, delivered, savedTo, digest };
}
