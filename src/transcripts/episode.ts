// pattern: functional-core
import * as cheerio from "cheerio";

export type TranscriptFormat = "text" | "pdf";

const EXTENSION_FORMATS: Readonly<Record<string, TranscriptFormat>> = {
  ".txt": "text",
  ".pdf": "pdf",
};

function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter((word) => word !== "").join(" ");
}

function pathExtension(href: string): string {
  let path: string;
  try {
    path = new URL(href, "http://relative.invalid").pathname;
  } catch {
    path = href;
  }
  const name = path.slice(path.lastIndexOf("/") + 1);
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : name.slice(dot).toLowerCase();
}

/**
 * First `<h1>`, else `<title>`, trimmed. Empty when the page has neither.
 */
export function episodeTitle(html: string): string {
  const $ = cheerio.load(html);
  const heading = $("h1").first().text().trim();
  if (heading !== "") return heading;
  return $("title").first().text().trim();
}

/**
 * Text of the first `.post__content` block, falling back to the whole body,
 * with whitespace runs collapsed to single spaces.
 */
export function episodePageText(html: string): string {
  const $ = cheerio.load(html);
  const post = normalizeWhitespace($(".post__content").first().text());
  if (post !== "") return post;
  return normalizeWhitespace($("body").first().text());
}

/**
 * Picks the transcript link on an episode page. Links to a .pdf or .txt
 * whose text mentions "transcript" win, then any .pdf or .txt link, then
 * any link whose text mentions "transcript". The href is returned as written.
 */
export function findTranscriptHref(html: string): string | undefined {
  const $ = cheerio.load(html);
  const ranked: Array<Array<string>> = [[], [], []];

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") ?? "").trim();
    if (href === "") return;

    const document = pathExtension(href) in EXTENSION_FORMATS;
    const mentionsTranscript = $(el).text().toLowerCase().includes("transcript");

    if (document && mentionsTranscript) ranked[0]?.push(href);
    else if (document) ranked[1]?.push(href);
    else if (mentionsTranscript) ranked[2]?.push(href);
  });

  return ranked.flat()[0];
}

/**
 * How to read a downloaded transcript: by the URL's extension, else by the
 * response content type. Undefined when neither says text or PDF.
 */
export function transcriptFormat(url: string, contentType: string): TranscriptFormat | undefined {
  const byExtension = EXTENSION_FORMATS[pathExtension(url)];
  if (byExtension) return byExtension;

  const type = contentType.toLowerCase();
  if (type.includes("text/plain")) return "text";
  if (type.includes("application/pdf")) return "pdf";
  return undefined;
}
