/**
 * Tests for the crawler output loader
 */

import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  dedupePapers,
  loadPapersFromDirectory,
  loadPapersFromJsonl,
  parsePaperLine,
} from "../../../src/lib/storage/papers";

function record(id: string, title: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ id, title, summary: `Summary of ${title}`, ...extra });
}

function writeCategory(dataDir: string, category: string, lines: string[]): void {
  const dir = path.join(dataDir, "jsonl", category);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, "papers.jsonl"), lines.join("\n") + "\n", "utf-8");
}

describe("papers loader", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "paper-digest-"));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  describe("parsePaperLine", () => {
    it("should map crawler fields and default optional ones", () => {
      const paper = parsePaperLine(
        JSON.stringify({
          id: "2501.00001",
          title: "Sparse Retrieval",
          summary: "We revisit sparse retrieval.",
          authors: ["A. Author", "B. Author"],
          categories: ["cs.IR"],
          abs: "https://arxiv.org/abs/2501.00001",
          pdf: "https://arxiv.org/pdf/2501.00001",
          comment: null,
          pdf_urls: ["https://arxiv.org/pdf/2501.00001"],
        }),
        "test.jsonl",
        1
      );

      expect(paper).toEqual({
        id: "2501.00001",
        title: "Sparse Retrieval",
        summary: "We revisit sparse retrieval.",
        authors: ["A. Author", "B. Author"],
        categories: ["cs.IR"],
        absUrl: "https://arxiv.org/abs/2501.00001",
        pdfUrl: "https://arxiv.org/pdf/2501.00001",
        comment: "",
        relevanceScore: 0,
      });
    });

    it("should reject malformed JSON and records missing required fields", () => {
      expect(parsePaperLine("{not json", "test.jsonl", 1)).toBeNull();
      expect(parsePaperLine(JSON.stringify({ id: "x", title: "No summary" }), "test.jsonl", 2)).toBeNull();
      expect(parsePaperLine(JSON.stringify({ id: "", title: "t", summary: "s" }), "test.jsonl", 3)).toBeNull();
      expect(parsePaperLine("[1, 2]", "test.jsonl", 4)).toBeNull();
    });
  });

  describe("loadPapersFromJsonl", () => {
    it("should skip blank and malformed lines without aborting", () => {
      writeCategory(dataDir, "CL", [record("1", "First"), "", "{broken", record("2", "Second")]);

      const papers = loadPapersFromJsonl(path.join(dataDir, "jsonl", "CL", "papers.jsonl"));

      expect(papers.map((p) => p.id)).toEqual(["1", "2"]);
    });
  });

  describe("loadPapersFromDirectory", () => {
    it("should return an empty list when nothing was crawled", () => {
      expect(loadPapersFromDirectory(dataDir)).toEqual([]);
      expect(loadPapersFromDirectory(path.join(dataDir, "missing"))).toEqual([]);
    });

    it("should read every category and keep the first occurrence of an id", () => {
      writeCategory(dataDir, "CV", [record("shared", "From CV"), record("3", "Third")]);
      writeCategory(dataDir, "CL", [record("1", "First"), record("shared", "From CL")]);
      fs.mkdirSync(path.join(dataDir, "jsonl", "AI"), { recursive: true }); // no papers.jsonl
      fs.writeFileSync(path.join(dataDir, "jsonl", "stray.jsonl"), record("9", "Stray"));

      const papers = loadPapersFromDirectory(dataDir);

      // Categories are read in name order: CL before CV
      expect(papers.map((p) => p.id)).toEqual(["1", "shared", "3"]);
      expect(papers.find((p) => p.id === "shared")?.title).toBe("From CL");
    });
  });

  describe("dedupePapers", () => {
    it("should keep first occurrences in order", () => {
      const base = parsePaperLine(record("a", "A"), "t", 1);
      const other = parsePaperLine(record("b", "B"), "t", 2);
      const dup = parsePaperLine(record("a", "A again"), "t", 3);
      expect(base && other && dup).toBeTruthy();

      if (base && other && dup) {
        expect(dedupePapers([base, other, dup]).map((p) => p.title)).toEqual(["A", "B"]);
      }
    });
  });
});
