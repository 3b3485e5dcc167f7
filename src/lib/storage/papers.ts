/**
 * Paper loader for crawler output
 * Reads <dataDir>/jsonl/<category>/papers.jsonl files into Paper records
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Paper } from "../model";
import { logger } from "../logger";

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const optionalList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

/**
 * One crawler record. Unknown fields (pdf_urls, download status, ...) are ignored.
 */
const PaperRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  summary: z.string(),
  authors: optionalList,
  categories: optionalList,
  abs: optionalText,
  pdf: optionalText,
  comment: optionalText,
});

export type PaperRecord = z.input<typeof PaperRecordSchema>;

function recordToPaper(record: z.output<typeof PaperRecordSchema>): Paper {
  return {
    id: record.id,
    title: record.title,
    summary: record.summary,
    authors: record.authors,
    categories: record.categories,
    absUrl: record.abs,
    pdfUrl: record.pdf,
    comment: record.comment,
    relevanceScore: 0,
  };
}

/**
 * Parse a single JSONL line. Returns null (and logs) when the line is malformed.
 */
export function parsePaperLine(line: string, source: string, lineNumber: number): Paper | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (error) {
    logger.warn("Skipping unparseable paper record", {
      source,
      line: lineNumber,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const parsed = PaperRecordSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn("Skipping invalid paper record", {
      source,
      line: lineNumber,
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    });
    return null;
  }

  return recordToPaper(parsed.data);
}

/**
 * Load all papers from one JSONL file. Blank lines are skipped.
 */
export function loadPapersFromJsonl(filePath: string): Paper[] {
  const content = fs.readFileSync(filePath, "utf-8");
  const papers: Paper[] = [];

  content.split(/\r?\n/).forEach((raw, idx) => {
    const line = raw.trim();
    if (!line) return;

    const paper = parsePaperLine(line, filePath, idx + 1);
    if (paper) papers.push(paper);
  });

  return papers;
}

/**
 * Keep the first occurrence of each id
 */
export function dedupePapers(papers: readonly Paper[]): Paper[] {
  const seen = new Set<string>();
  const unique: Paper[] = [];

  for (const paper of papers) {
    if (seen.has(paper.id)) continue;
    seen.add(paper.id);
    unique.push(paper);
  }

  return unique;
}

/**
 * Load every category's papers.jsonl under <dataDir>/jsonl, deduplicated by id.
 * Returns [] when nothing has been crawled yet.
 */
export function loadPapersFromDirectory(dataDir: string): Paper[] {
  const jsonlDir = path.join(dataDir, "jsonl");

  if (!fs.existsSync(jsonlDir)) {
    logger.debug("No jsonl directory found", { path: jsonlDir });
    return [];
  }

  const categoryDirs = fs
    .readdirSync(jsonlDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  const papers: Paper[] = [];

  for (const category of categoryDirs) {
    const file = path.join(jsonlDir, category, "papers.jsonl");
    if (!fs.existsSync(file)) continue;

    const loaded = loadPapersFromJsonl(file);
    logger.debug("Loaded category papers", { category, count: loaded.length });
    papers.push(...loaded);
  }

  const unique = dedupePapers(papers);
  if (unique.length < papers.length) {
    logger.info("Removed duplicate papers across categories", {
      duplicates: papers.length - unique.length,
    });
  }

  return unique;
}
