import { parse } from "node-html-parser";
import { decodeText } from "./decode.js";
import { htmlToText } from "./html.js";
import type { Document, Extractor, ExtractorInput } from "./types.js";

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Inline markup to plain (escaped) text: images keep their alt text,
 * links their label; emphasis, strike-through, inline code and raw
 * HTML tags are unwrapped.
 */
export function stripInlineMarkdown(line: string): string {
  const text = line
    .replace(/<\/?[A-Za-z][^>]*>/g, " ")
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/\[([^\]]+)\]\([^)]*\)/g, "$1")
    .replace(/\[([^\]]+)\]\[[^\]]*\]/g, "$1")
    .replace(/`([^`]+)`/g, "$1")
    .replace(/(\*\*|__)(?=\S)(.+?)(?<=\S)\1/g, "$2")
    .replace(/(^|[^\w*])\*(?=\S)(.+?)(?<=\S)\*(?!\w)/g, "$1$2")
    .replace(/(^|[^\w])_(?=\S)(.+?)(?<=\S)_(?!\w)/g, "$1$2")
    .replace(/~~(.+?)~~/g, "$1");
  return escapeHtml(text);
}

const FENCE = /^\s*(```|~~~)/;
const ATX_HEADER = /^\s{0,3}(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const SETEXT_UNDERLINE = /^\s{0,3}(=+|-+)\s*$/;
const THEMATIC_BREAK = /^\s{0,3}([-*_])(\s*\1){2,}\s*$/;
const LIST_MARKER = /^\s*(?:[-*+]|\d+[.)])\s+/;
const BLOCKQUOTE = /^\s*>\s?/;
const REFERENCE_DEFINITION = /^\s{0,3}\[[^\]]+\]:\s*\S+/;
const TABLE_DIVIDER = /^\s*\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?\s*$/;

/**
 * Markdown to HTML, enough to recover the text: headers (ATX and
 * setext), paragraphs, lists, block quotes, tables and fenced code.
 * YAML front matter, reference definitions and rules are dropped.
 */
export function markdownToHtml(md: string): string {
  const lines = md.split(/\r?\n/);
  const htmlParts: string[] = [];
  let inCodeBlock = false;
  let codeBuffer: string[] = [];
  let previousParagraph: string | null = null;

  let start = 0;
  if (lines[0]?.trim() === "---") {
    const end = lines.findIndex((line, i) => i > 0 && /^(---|\.\.\.)\s*$/.test(line));
    if (end > 0) start = end + 1;
  }

  for (const rawLine of lines.slice(start)) {
    // Fenced code blocks
    if (FENCE.test(rawLine)) {
      if (inCodeBlock) {
        htmlParts.push(`<pre>${escapeHtml(codeBuffer.join("\n"))}</pre>`);
        codeBuffer = [];
        inCodeBlock = false;
      } else {
        inCodeBlock = true;
      }
      previousParagraph = null;
      continue;
    }

    if (inCodeBlock) {
      codeBuffer.push(rawLine);
      continue;
    }

    const line = rawLine.replace(BLOCKQUOTE, "").replace(BLOCKQUOTE, "");

    // Setext header: the underline turns the paragraph above into a header
    const underline = SETEXT_UNDERLINE.exec(line);
    if (underline && previousParagraph !== null) {
      const level = underline[1].startsWith("=") ? 1 : 2;
      htmlParts[htmlParts.length - 1] = `<h${level}>${previousParagraph}</h${level}>`;
      previousParagraph = null;
      continue;
    }

    const isTableDivider = line.includes("|") && TABLE_DIVIDER.test(line);
    if (line.trim() === "" || THEMATIC_BREAK.test(line) || REFERENCE_DEFINITION.test(line) || isTableDivider) {
      previousParagraph = null;
      continue;
    }

    const header = ATX_HEADER.exec(line);
    if (header) {
      const level = header[1].length;
      htmlParts.push(`<h${level}>${stripInlineMarkdown(header[2])}</h${level}>`);
      previousParagraph = null;
      continue;
    }

    if (LIST_MARKER.test(line)) {
      htmlParts.push(`<li>${stripInlineMarkdown(line.replace(LIST_MARKER, ""))}</li>`);
      previousParagraph = null;
      continue;
    }

    if (line.trim().startsWith("|")) {
      const cells = line.trim().replace(/^\||\|$/g, "").split("|");
      htmlParts.push(`<tr>${cells.map((c) => `<td>${stripInlineMarkdown(c.trim())}</td>`).join("")}</tr>`);
      previousParagraph = null;
      continue;
    }

    // Regular paragraph line
    const paragraph = stripInlineMarkdown(line.trim());
    htmlParts.push(`<p>${paragraph}</p>`);
    previousParagraph = paragraph;
  }

  // Close unclosed code block
  if (inCodeBlock && codeBuffer.length > 0) {
    htmlParts.push(`<pre>${escapeHtml(codeBuffer.join("\n"))}</pre>`);
  }

  return htmlParts.join("\n");
}

export interface MarkdownText {
  title?: string;
  text: string;
}

export function extractMarkdownText(md: string): MarkdownText {
  const root = parse(markdownToHtml(md));
  const heading = root.querySelector("h1, h2, h3, h4, h5, h6");
  return {
    title: heading?.text.trim() || undefined,
    text: htmlToText(root),
  };
}

export const markdownExtractor: Extractor = {
  format: "markdown",

  async extract(input: ExtractorInput): Promise<Document[]> {
    const { title, text } = extractMarkdownText(decodeText(input.data, input.origin, input.charset));
    return [
      {
        sourceId: input.sourceId,
        origin: input.origin,
        format: "markdown",
        rawText: text,
        title: title ?? input.name,
        metadata: input.url ? { url: input.url } : {},
      },
    ];
  },
};
