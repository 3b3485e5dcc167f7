/**
 * Digest report rendering
 * Markdown reports (with or without LLM summaries) and their HTML email form
 */

import type { RankedPaper } from "../model";

const MAX_LISTED_AUTHORS = 5;
const ABSTRACT_PREVIEW_CHARS = 500;

export interface DigestEntry extends RankedPaper {
  summary: string;
}

export interface DigestMarkdownInput {
  date: string;
  keywords: Record<string, number>;
  overview: string;
  entries: DigestEntry[];
}

/**
 * "term(weight), term(weight)"
 */
export function formatKeywords(keywords: Record<string, number>): string {
  return Object.entries(keywords)
    .map(([term, weight]) => `${term}(${weight})`)
    .join(", ");
}

function formatAuthors(authors: string[], limit?: number): string {
  if (limit === undefined || authors.length <= limit) {
    return authors.join(", ");
  }
  return `${authors.slice(0, limit).join(", ")}...`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

/**
 * Plain report used when no LLM is configured or summarization fails
 */
export function buildSimpleReport(
  ranked: RankedPaper[],
  keywords: Record<string, number>,
  date: string
): string {
  let report = `# 📚 Paper Digest - ${date}

Keywords: **${Object.keys(keywords).join(", ")}**

Found **${ranked.length}** relevant papers today:

---

`;

  ranked.forEach(({ paper, details }, idx) => {
    const abstract =
      paper.summary.length > ABSTRACT_PREVIEW_CHARS
        ? `${paper.summary.slice(0, ABSTRACT_PREVIEW_CHARS)}...`
        : paper.summary;

    report += `## ${idx + 1}. ${paper.title}

**Authors**: ${formatAuthors(paper.authors, MAX_LISTED_AUTHORS)}

**Categories**: ${paper.categories.join(", ")}

**Matched keywords**: ${details.allMatched.join(", ")}

**Abstract**: ${abstract}

📄 [Abstract](${paper.absUrl}) | 📥 [PDF](${paper.pdfUrl})

---

`;
  });

  return report;
}

/**
 * Overview table of ranked papers
 */
export function buildPaperTable(ranked: RankedPaper[]): string {
  if (ranked.length === 0) return "";

  let table = "| # | Title | Authors | Matched Keywords | Score |\n";
  table += "|:---:|:---|:---|:---|:---:|\n";

  ranked.forEach(({ paper, details }, idx) => {
    const matched = details.allMatched.length > 0 ? details.allMatched.join(", ") : "-";
    table += `| ${idx + 1} | ${escapeCell(paper.title)} | ${escapeCell(formatAuthors(paper.authors))} | ${escapeCell(matched)} | ${paper.relevanceScore.toFixed(2)} |\n`;
  });

  return table;
}

/**
 * Full digest: overview, table, then per-paper summaries in rank order
 */
export function buildDigestMarkdown(input: DigestMarkdownInput): string {
  const { date, keywords, overview, entries } = input;

  if (entries.length === 0) {
    return `# Paper Digest - ${date}

No papers matched your interests today.
`;
  }

  let report = `# Paper Digest

**Date**: ${date}

**Interests**: ${formatKeywords(keywords)}

**Today's picks**: ${entries.length} relevant papers

---

## Overview

${overview}

### Papers at a glance

${buildPaperTable(entries)}
---

## Paper Notes

`;

  entries.forEach(({ paper, summary }, idx) => {
    report += `### ${idx + 1}. ${paper.title} [[Abstract]](${paper.absUrl})

**Authors**: ${formatAuthors(paper.authors)}

${summary}

`;
  });

  return report;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Inline markdown: links, bold, italic
 */
function renderInline(text: string): string {
  let html = text;
  // Links first so their text is not treated as emphasis markers
  html = html.replace(/\[([^\]]*)\]\(([^)\s]*)\)/g, '<a href="$2">$1</a>');
  html = html.replace(/\*\*(.+?)\*\*/g, "<strong>$1</strong>");
  html = html.replace(/\*(.+?)\*/g, "<em>$1</em>");
  return html;
}

const TABLE_SEPARATOR = /^\|[\s:|-]+\|$/;

function splitRow(line: string): string[] {
  return line
    .trim()
    .replace(/^\|/, "")
    .replace(/\|$/, "")
    .split(/(?<!\\)\|/)
    .map((cell) => renderInline(cell.trim().replace(/\\\|/g, "|")));
}

function renderTable(rows: string[]): string[] {
  const [header, ...rest] = rows;
  const body = rest.filter((row) => !TABLE_SEPARATOR.test(row.trim()));

  const out = ["<table>"];
  out.push(`<thead><tr>${splitRow(header).map((c) => `<th>${c}</th>`).join("")}</tr></thead>`);
  out.push("<tbody>");
  for (const row of body) {
    out.push(`<tr>${splitRow(row).map((c) => `<td>${c}</td>`).join("")}</tr>`);
  }
  out.push("</tbody>");
  out.push("</table>");
  return out;
}

const EMAIL_STYLE = `body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; line-height: 1.6; color: #333; max-width: 800px; margin: 0 auto; padding: 20px; }
h1 { color: #2c3e50; border-bottom: 2px solid #3498db; padding-bottom: 10px; }
h2 { color: #34495e; margin-top: 30px; border-left: 4px solid #3498db; padding-left: 10px; }
h3 { color: #7f8c8d; }
a { color: #3498db; text-decoration: none; }
hr { border: none; border-top: 1px solid #ddd; margin: 20px 0; }
table { border-collapse: collapse; width: 100%; }
th, td { border: 1px solid #ddd; padding: 6px 8px; text-align: left; }`;

/**
 * Convert the digest markdown into a standalone HTML email body.
 * Covers the subset the reports use: headers, rules, lists, tables, links, emphasis.
 */
export function markdownToHtml(markdown: string): string {
  const lines = escapeHtml(markdown).split("\n");
  const result: string[] = [];
  let inList = false;
  let tableRows: string[] = [];

  const flushTable = () => {
    if (tableRows.length > 0) {
      result.push(...renderTable(tableRows));
      tableRows = [];
    }
  };

  for (const line of lines) {
    const trimmed = line.trim();

    if (trimmed.startsWith("|")) {
      tableRows.push(trimmed);
      continue;
    }
    flushTable();

    if (/^[-*] /.test(trimmed)) {
      if (!inList) {
        result.push("<ul>");
        inList = true;
      }
      result.push(`<li>${renderInline(trimmed.slice(2).trim())}</li>`);
      continue;
    }

    if (inList) {
      result.push("</ul>");
      inList = false;
    }

    const heading = trimmed.match(/^(#{1,6}) (.*)$/);
    if (heading) {
      const level = heading[1].length;
      result.push(`<h${level}>${renderInline(heading[2])}</h${level}>`);
    } else if (/^-{3,}$/.test(trimmed)) {
      result.push("<hr>");
    } else if (trimmed !== "") {
      result.push(`<p>${renderInline(trimmed)}</p>`);
    }
  }

  flushTable();
  if (inList) {
    result.push("</ul>");
  }

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<style>
${EMAIL_STYLE}
</style>
</head>
<body>
${result.join("\n")}
</body>
</html>
`;
}
