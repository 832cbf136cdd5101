// pattern: functional-core
import * as cheerio from "cheerio";
import { readabilityExtractor, type MainContentExtractor } from "./extractor";

export const DEFAULT_UTTERANCE_SELECTOR = ".utterance";

export type TranscriptExtractorOptions = {
  readonly utteranceSelector?: string;
  readonly fallback?: MainContentExtractor;
};

/**
 * Text of every transcript utterance block, whitespace-collapsed and joined
 * by single spaces. Empty when the page has no utterance blocks.
 */
export function extractTranscript(html: string, utteranceSelector = DEFAULT_UTTERANCE_SELECTOR): string {
  const $ = cheerio.load(html);
  return $(utteranceSelector)
    .map((_, el) => $(el).text().replace(/\s+/g, " ").trim())
    .get()
    .filter((text) => text !== "")
    .join(" ");
}

/**
 * Extractor for podcast episode pages that carry a transcript. Pages
 * without one are handled by `fallback`, which also supplies titles.
 */
export function transcriptExtractor(options: TranscriptExtractorOptions = {}): MainContentExtractor {
  const selector = options.utteranceSelector ?? DEFAULT_UTTERANCE_SELECTOR;
  const fallback = options.fallback ?? readabilityExtractor;

  return {
    extract: (html) => {
      const transcript = extractTranscript(html, selector);
      if (transcript === "") return fallback.extract(html);
      return { title: fallback.extract(html).title, text: transcript };
    },
  };
}
