/**
 * Tests for batched paper summarization
 */

import { describe, it, expect, vi } from "vitest";
import {
  PaperSummarizer,
  parseBatchResponse,
  type CompletionClient,
} from "../../../src/lib/pipeline/summarize";
import type { RankedPaper } from "../../../src/lib/model";

function createRanked(id: string, title: string, allMatched: string[] = ["graph"]): RankedPaper {
  return {
    paper: {
      id,
      title,
      summary: `Abstract of ${title}.`,
      authors: ["Ada Lovelace"],
      categories: ["cs.LG"],
      absUrl: `https://arxiv.org/abs/${id}`,
      pdfUrl: `https://arxiv.org/pdf/${id}`,
      comment: "",
      relevanceScore: 1,
    },
    details: {
      titleKeywords: allMatched,
      abstractKeywords: [],
      allMatched,
      titleScore: 1,
      abstractScore: 0,
      keywordWeights: { graph: 1 },
    },
  };
}

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

function createClient() {
  const create = vi.fn<CompletionClient["chat"]["completions"]["create"]>();
  const client: CompletionClient = { chat: { completions: { create } } };
  return { client, create };
}

describe("parseBatchResponse", () => {
  it("should split on paper markers", () => {
    const response = "===PAPER 1===\nFirst note.\n\nMore.\n=== paper 2 ===\nSecond note.";
    expect(parseBatchResponse(response, 2)).toEqual(["First note.\n\nMore.", "Second note."]);
  });

  it("should split lines evenly when markers are missing", () => {
    expect(parseBatchResponse("l1\nl2\nl3\nl4", 2)).toEqual(["l1\nl2", "l3\nl4"]);
    expect(parseBatchResponse("l1\nl2\nl3\nl4", 3)).toEqual(["l1", "l2", "l3\nl4"]);
  });
});

describe("PaperSummarizer", () => {
  it("should refuse to build without an API key", () => {
    expect(() =>
      PaperSummarizer.fromSettings({ model: "test-model", apiKey: "", baseUrl: "http://localhost", batchSize: 3 })
    ).toThrow("LLM API key missing");
  });

  it("should summarize in batches and keep rank order", async () => {
    const { client, create } = createClient();
    create
      .mockResolvedValueOnce(completion("===PAPER 1===\nNote one.\n===PAPER 2===\nNote two."))
      .mockResolvedValueOnce(completion("===PAPER 1===\nNote three."));

    const summarizer = new PaperSummarizer(client, "test-model");
    const entries = await summarizer.summarizePapers(
      [createRanked("1", "One"), createRanked("2", "Two"), createRanked("3", "Three")],
      ["graph"],
      2
    );

    expect(entries.map((e) => [e.paper.id, e.summary])).toEqual([
      ["1", "Note one."],
      ["2", "Note two."],
      ["3", "Note three."],
    ]);
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls.map(([params]) => params.max_tokens)).toEqual([2400, 1200]);
    expect(create.mock.calls[0][0]).toMatchObject({ model: "test-model", temperature: 0.3 });
  });

  it("should cap batch tokens", async () => {
    const { client, create } = createClient();
    create.mockResolvedValueOnce(completion(""));

    const summarizer = new PaperSummarizer(client, "test-model");
    const papers = ["1", "2", "3", "4"].map((id) => createRanked(id, `Paper ${id}`).paper);
    const summaries = await summarizer.summarizeBatch(papers, ["graph"]);

    expect(summaries).toHaveLength(4);
    expect(create.mock.calls[0][0].max_tokens).toBe(4000);
  });

  it("should propagate summary failures", async () => {
    const { client, create } = createClient();
    create.mockRejectedValueOnce(new Error("rate limited"));

    const summarizer = new PaperSummarizer(client, "test-model");

    await expect(summarizer.summarizeBatch([createRanked("1", "One").paper], ["graph"])).rejects.toThrow(
      "rate limited"
    );
  });

  it("should fall back to a template overview when the call fails", async () => {
    const { client, create } = createClient();
    create.mockRejectedValueOnce(new Error("timeout"));

    const summarizer = new PaperSummarizer(client, "test-model");
    const overview = await summarizer.generateOverview([createRanked("1", "One")], ["rag", "graph"]);

    expect(overview).toBe(
      "Today's digest covers 1 papers matching your interests, led by graph. See the notes below for details on each paper."
    );
  });

  it("should assemble the digest from summaries and overview", async () => {
    const { client, create } = createClient();
    create
      .mockResolvedValueOnce(completion("===PAPER 1===\nNote one."))
      .mockResolvedValueOnce(completion("  Graphs everywhere.  "));

    const summarizer = new PaperSummarizer(client, "test-model");
    const digest = await summarizer.generateDigest([createRanked("1", "One")], { graph: 1 }, "2025-01-15", 3);

    expect(digest).toContain("## Overview\n\nGraphs everywhere.\n");
    expect(digest).toContain("### 1. One [[Abstract]](https://arxiv.org/abs/1)\n\n**Authors**: Ada Lovelace\n\nNote one.\n");
    expect(create.mock.calls[1][0].max_tokens).toBe(800);
  });

  it("should not call the model for an empty list", async () => {
    const { client, create } = createClient();
    const summarizer = new PaperSummarizer(client, "test-model");

    const digest = await summarizer.generateDigest([], { graph: 1 }, "2025-01-15", 3);

    expect(digest).toBe("# Paper Digest - 2025-01-15\n\nNo papers matched your interests today.\n");
    expect(create).not.toHaveBeenCalled();
  });
});
