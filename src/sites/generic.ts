// pattern: functional-core
import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { URLRef } from "../domain/types";
import { LinkCollector } from "./links";

const TITLE_LINK_SELECTORS = [
  "a.entry-title",
  "a.post-title",
  "a.article-link",
  "a.article-title",
  "h2 a",
  "h3 a",
  ".entry-title a",
  ".post-title a",
  ".article-title a",
];

const LANDMARKS = "nav, header, footer, .nav, .header, .footer, .menu, .sidebar";

const NON_CONTENT_PATHS = [
  "/tag/",
  "/category/",
  "/author/",
  "/archive/",
  "/page/",
  "/search",
  "/feed",
  "/rss",
  "/atom",
  "/login",
  "/register",
  "/about",
  "/contact",
  "/privacy",
  "/terms",
  "/cookie",
];

function parseUrl(value: string | undefined, base?: string): URL | null {
  if (!value) return null;
  try {
    return new URL(value, base);
  } catch {
    return null;
  }
}

function originOf(value: string | undefined): string | null {
  const parsed = parseUrl(value);
  return parsed ? `${parsed.origin}/` : null;
}

/**
 * Base for relative links: `<base href>` as written, else the origin of the
 * canonical link, else the origin of `og:url`, else the page URL.
 */
export function resolveBaseUrl($: CheerioAPI, pageUrl: string): string | null {
  const base = parseUrl($("base[href]").first().attr("href")?.trim(), pageUrl);
  if (base) return base.toString();

  return (
    originOf($("link[rel='canonical']").first().attr("href")?.trim()) ??
    originOf($("meta[property='og:url']").first().attr("content")?.trim()) ??
    parseUrl(pageUrl)?.toString() ??
    null
  );
}

export function isContentLink(location: string): boolean {
  const parsed = parseUrl(location);
  if (!parsed) return false;
  const path = parsed.pathname.toLowerCase();
  return !NON_CONTENT_PATHS.some((pattern) => path.includes(pattern));
}

/**
 * Heuristic listing extractor for sites without a dedicated one.
 *
 * 1. anchors inside `<article>`; if none, anchors inside `<main>`
 * 2. anchors matching title-like selectors, always
 * 3. if still nothing, every body anchor outside navigation landmarks whose
 *    path does not look like a taxonomy, feed or account page
 */
export function extractGenericUrls(html: string, pageUrl: string): ReadonlyArray<URLRef> {
  const $ = cheerio.load(html);
  const links = new LinkCollector($, resolveBaseUrl($, pageUrl));

  links.add("article a");
  if (links.size === 0) {
    links.add("main a");
  }

  for (const selector of TITLE_LINK_SELECTORS) {
    links.add(selector);
  }

  if (links.size === 0) {
    links.add("body a", { excludeWithin: LANDMARKS, accept: isContentLink });
  }

  return links.toArray();
}
