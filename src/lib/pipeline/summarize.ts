/**
 * Paper summarization pipeline
 * Batches ranked papers through an OpenAI-compatible chat model and assembles the digest
 */

import OpenAI from "openai";
import type { Paper, RankedPaper } from "../model";
import type { LlmSettings } from "../../config/settings";
import { logger } from "../logger";
import { buildDigestMarkdown, type DigestEntry } from "./report";

const MAX_OVERVIEW_PAPERS = 10;
const TOKENS_PER_PAPER = 1200;
const MAX_BATCH_TOKENS = 4000;

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

/**
 * The slice of the OpenAI client the summarizer calls
 */
export interface CompletionClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: ChatMessage[];
        temperature?: number;
        max_tokens?: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

const SUMMARY_SYSTEM_PROMPT = `You are a senior AI/ML researcher who explains academic papers clearly and concisely.
Your notes are precise, professional, and insightful.`;

const OVERVIEW_SYSTEM_PROMPT = `You are a research analyst who distills themes and directions from a set of papers.
Your overview should:
- Capture the overall direction
- Point out shared topics and hot spots
- Be useful to a reader working in the field`;

/**
 * Split a batch response on ===PAPER N=== markers. When the marker count does
 * not match, fall back to dividing the lines evenly.
 */
export function parseBatchResponse(response: string, count: number): string[] {
  const parts = response
    .split(/===\s*PAPER\s*\d+\s*===/i)
    .slice(1)
    .map((part) => part.trim());

  if (parts.length === count) {
    return parts;
  }

  logger.warn("Batch summary markers did not match paper count, splitting evenly", {
    expected: count,
    found: parts.length,
  });

  const lines = response.split("\n");
  const chunkSize = Math.max(Math.floor(lines.length / count), 1);
  const summaries: string[] = [];

  for (let i = 0; i < count; i++) {
    const start = i * chunkSize;
    const end = i < count - 1 ? start + chunkSize : lines.length;
    summaries.push(lines.slice(start, end).join("\n"));
  }

  return summaries;
}

/**
 * Template overview used when the LLM call for the overview fails
 */
function generateTemplateOverview(ranked: RankedPaper[], keywords: string[]): string {
  const matched = new Set(ranked.flatMap(({ details }) => details.allMatched));
  const themes = keywords.filter((k) => matched.has(k)).slice(0, 3);
  return `Today's digest covers ${ranked.length} papers matching your interests${
    themes.length > 0 ? `, led by ${themes.join(", ")}` : ""
  }. See the notes below for details on each paper.`;
}

export class PaperSummarizer {
  constructor(
    private readonly client: CompletionClient,
    private readonly model: string
  ) {}

  static fromSettings(llm: LlmSettings): PaperSummarizer {
    if (!llm.apiKey) {
      throw new Error("LLM API key missing: set LLM_API_KEY or llm.api_key");
    }
    const client = new OpenAI({ apiKey: llm.apiKey, baseURL: llm.baseUrl });
    return new PaperSummarizer(client, llm.model);
  }

  private async callLlm(systemPrompt: string, userPrompt: string, maxTokens: number): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      temperature: 0.3,
      max_tokens: maxTokens,
    });

    return (response.choices[0]?.message.content ?? "").trim();
  }

  /**
   * One LLM call for several papers; returns one summary per paper, in order
   */
  async summarizeBatch(papers: Paper[], keywords: string[]): Promise<string[]> {
    if (papers.length === 0) return [];

    const papersText = papers
      .map(
        (paper, idx) => `
---
## Paper ${idx + 1}
**Title**: ${paper.title}
**Abstract**: ${paper.summary}
---`
      )
      .join("\n");

    const userPrompt = `Write a short note on each of the following ${papers.length} arXiv papers.

**Reader's interests**: ${keywords.join(", ")}

${papersText}

Cover two points for each paper:

1. **Background and challenge** (120-150 words): what is the state of the field, and what problem does the paper address?

2. **Method and findings** (120-150 words): what does the paper propose, and what results does it report?

**Output format**:
- Separate papers with "===PAPER N===" (N is the paper number 1, 2, 3...)
- Two paragraphs per paper, separated by a blank line
- No headings or bold text

Example:
===PAPER 1===
The field currently faces...

The paper proposes...
===PAPER 2===
...`;

    const maxTokens = Math.min(TOKENS_PER_PAPER * papers.length, MAX_BATCH_TOKENS);
    const response = await this.callLlm(SUMMARY_SYSTEM_PROMPT, userPrompt, maxTokens);
    return parseBatchResponse(response, papers.length);
  }

  /**
   * Overview of the day's picks; falls back to a template when the call fails
   */
  async generateOverview(ranked: RankedPaper[], keywords: string[]): Promise<string> {
    const briefs = ranked
      .slice(0, MAX_OVERVIEW_PAPERS)
      .map(
        ({ paper, details }, idx) =>
          `${idx + 1}. "${paper.title}"\n   Matched keywords: ${details.allMatched.join(", ")}`
      )
      .join("\n");

    const userPrompt = `${ranked.length} papers related to the reader's research were selected today.

**Reader's interests**: ${keywords.join(", ")}

**Today's papers**:
${briefs}

In 150-200 words, summarize today's papers:
1. Which research directions do they focus on?
2. Which trends or hot spots stand out?
3. What should a reader working in these areas take away?

Write the overview directly, in a professional but approachable tone.`;

    try {
      return await this.callLlm(OVERVIEW_SYSTEM_PROMPT, userPrompt, 800);
    } catch (error) {
      logger.warn("Failed to generate overview with LLM, falling back to template", {
        error: error instanceof Error ? error.message : String(error),
      });
      return generateTemplateOverview(ranked, keywords);
    }
  }

  /**
   * Summarize ranked papers batchSize at a time, preserving rank order
   */
  async summarizePapers(
    ranked: RankedPaper[],
    keywords: string[],
    batchSize: number
  ): Promise<DigestEntry[]> {
    const size = Math.max(1, Math.floor(batchSize));
    const entries: DigestEntry[] = [];

    for (let start = 0; start < ranked.length; start += size) {
      const batch = ranked.slice(start, start + size);
      logger.info(`Summarizing papers ${start + 1}-${start + batch.length} of ${ranked.length}`, {
        titles: batch.map(({ paper }) => paper.title),
      });

      const summaries = await this.summarizeBatch(
        batch.map(({ paper }) => paper),
        keywords
      );

      batch.forEach((item, idx) => {
        entries.push({ ...item, summary: summaries[idx] ?? "" });
      });
    }

    return entries;
  }

  /**
   * Full markdown digest for the given day
   */
  async generateDigest(
    ranked: RankedPaper[],
    keywords: Record<string, number>,
    date: string,
    batchSize: number
  ): Promise<string> {
    if (ranked.length === 0) {
      return buildDigestMarkdown({ date, keywords, overview: "", entries: [] });
    }

    const terms = Object.keys(keywords);
    const entries = await this.summarizePapers(ranked, terms, batchSize);

    logger.info("Generating daily overview");
    const overview = await this.generateOverview(ranked, terms);

    return buildDigestMarkdown({ date, keywords, overview, entries });
  }
}
