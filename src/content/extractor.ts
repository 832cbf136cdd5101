// pattern: functional-core
import { Readability } from "@mozilla/readability";
import * as cheerio from "cheerio";
import { JSDOM, VirtualConsole } from "jsdom";
import { TitleNotFoundError } from "../errors";

export type ExtractedContent = {
  readonly title: string;
  readonly text: string;
};

/**
 * Pulls the human-readable title and main text out of an article page in
 * one pass over the document.
 */
export type MainContentExtractor = {
  readonly extract: (html: string) => ExtractedContent;
};

function readArticle(html: string): ExtractedContent | null {
  // own console: keeps jsdom stylesheet warnings off stdout
  const dom = new JSDOM(html, { virtualConsole: new VirtualConsole() });
  try {
    const parsed = new Readability(dom.window.document).parse();
    if (!parsed) return null;
    return {
      title: parsed.title?.trim() ?? "",
      text: parsed.textContent?.trim() ?? "",
    };
  } finally {
    dom.window.close();
  }
}

/**
 * Title fallbacks used when readability finds none, in order: `<title>`,
 * first `<h1>`, `og:title`, `<meta name="title">`.
 */
export function fallbackTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const candidates = [
    $("title").first().text(),
    $("h1").first().text(),
    $("meta[property='og:title']").first().attr("content"),
    $("meta[name='title']").first().attr("content"),
  ];

  for (const candidate of candidates) {
    const title = candidate?.trim() ?? "";
    if (title !== "") return title;
  }
  return null;
}

function titleOf(article: ExtractedContent | null, html: string): string {
  const title = article?.title || fallbackTitle(html);
  if (!title) {
    throw new TitleNotFoundError();
  }
  return title;
}

/**
 * Title and trimmed main text from a single readability pass. Raises
 * {@link TitleNotFoundError} when no title source has text. The text is
 * empty when readability finds no content; callers decide whether that is
 * acceptable.
 */
export function extractContent(html: string): ExtractedContent {
  const article = readArticle(html);
  return { title: titleOf(article, html), text: article?.text ?? "" };
}

export const readabilityExtractor: MainContentExtractor = {
  extract: extractContent,
};
