import { parse, HTMLElement, Node, NodeType } from "node-html-parser";
import { decodeText } from "./decode.js";
import type { Document, ExtractContext, Extractor, ExtractorInput } from "./types.js";

// Never visible
const HIDDEN_TAGS = ["head", "title", "script", "style", "noscript", "template", "svg"];

// Page chrome that carries no document content
const BOILERPLATE_SELECTORS = ["nav", "header", "footer", "aside", ".sidebar", ".toc"];

const BLOCK_TAGS = new Set([
  "address", "article", "blockquote", "body", "dd", "details", "div", "dl", "dt",
  "fieldset", "figcaption", "figure", "form", "h1", "h2", "h3", "h4", "h5", "h6",
  "hr", "li", "main", "ol", "p", "pre", "section", "summary", "table", "tr", "ul",
]);

/**
 * Visible text of a node in document order. Block elements are
 * separated by line breaks so neighbouring blocks never glue together;
 * headings stay as plain text.
 */
export function htmlToText(node: Node): string {
  if (node.nodeType === NodeType.TEXT_NODE) {
    return node.text;
  }

  if (!(node instanceof HTMLElement)) {
    return "";
  }

  const tag = node.tagName?.toLowerCase() ?? "";
  if (tag === "br") return "\n";

  const content = node.childNodes.map((c) => htmlToText(c)).join("");

  if (tag === "td" || tag === "th") return `${content} `;
  if (BLOCK_TAGS.has(tag)) return `\n${content}\n`;
  return content;
}

export interface HtmlText {
  title?: string;
  text: string;
}

/**
 * Parse an HTML page into its title and visible text. Content comes from
 * `<main>`, else `<article>`, else `<body>`.
 */
export function extractHtmlText(html: string, options: { stripBoilerplate: boolean }): HtmlText {
  const root = parse(html, { comment: false });

  const title =
    root.querySelector("title")?.text.trim() || root.querySelector("h1")?.text.trim() || undefined;

  for (const selector of HIDDEN_TAGS) {
    for (const element of root.querySelectorAll(selector)) element.remove();
  }
  if (options.stripBoilerplate) {
    for (const selector of BOILERPLATE_SELECTORS) {
      for (const element of root.querySelectorAll(selector)) element.remove();
    }
  }

  const main =
    root.querySelector("main") ?? root.querySelector("article") ?? root.querySelector("body") ?? root;

  return { title, text: htmlToText(main) };
}

export const htmlExtractor: Extractor = {
  format: "html",

  async extract(input: ExtractorInput, context: ExtractContext): Promise<Document[]> {
    const html = decodeText(input.data, input.origin, input.charset);
    const { title, text } = extractHtmlText(html, { stripBoilerplate: context.stripBoilerplate });

    return [
      {
        sourceId: input.sourceId,
        origin: input.origin,
        format: "html",
        rawText: text,
        title: title ?? input.name,
        metadata: input.url ? { url: input.url } : {},
      },
    ];
  },
};
