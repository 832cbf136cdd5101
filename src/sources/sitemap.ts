// pattern: Imperative Shell
import * as cheerio from "cheerio";
import type { Logger } from "pino";
import type { URLRef } from "../domain/types";
import { EmptyFeedError, errorMessage } from "../errors";
import type { HttpClient } from "../http/client";
import type { Fetcher } from "../pipeline/types";

/** Only this much of a document is inspected to tell an index from a urlset. */
export const SITEMAP_PEEK_LENGTH = 512;

export type SitemapSourceOptions = {
  readonly http: HttpClient;
  readonly logger: Logger;
};

export function isSitemapIndex(xml: string): boolean {
  return xml.slice(0, SITEMAP_PEEK_LENGTH).includes("sitemapindex");
}

/**
 * Every non-empty `<loc>` under `selector`, resolved against the document
 * URL. Unresolvable entries are dropped.
 */
function readLocations(xml: string, selector: string, documentUrl: string): Array<string> {
  const $ = cheerio.load(xml, { xml: true });
  const locations: Array<string> = [];

  $(selector).each((_, el) => {
    const loc = $(el).text().trim();
    if (loc === "") return;
    try {
      locations.push(new URL(loc, documentUrl).toString());
    } catch {
      return;
    }
  });

  return locations;
}

/**
 * Reads a sitemap, following sitemap indexes recursively. A child sitemap
 * that fails is logged and skipped; the call fails only if the whole tree
 * yields no URLs.
 */
export function sitemapSource(options: SitemapSourceOptions): Fetcher {
  const { http, logger } = options;

  const load = async (signal: AbortSignal, url: string, visited: Set<string>): Promise<Array<URLRef>> => {
    visited.add(url);
    const xml = await http.getText(url, signal);

    if (!isSitemapIndex(xml)) {
      return readLocations(xml, "urlset > url > loc", url).map((location) => ({ location }));
    }

    const children = readLocations(xml, "sitemapindex > sitemap > loc", url);
    if (children.length === 0) {
      throw new EmptyFeedError(`sitemap index ${url} contained no sitemap urls`);
    }
    logger.info({ sitemap: url, children: children.length }, "reading sitemap index");

    const refs: Array<URLRef> = [];
    for (const child of children) {
      if (visited.has(child)) continue;
      try {
        refs.push(...(await load(signal, child, visited)));
      } catch (err) {
        if (signal.aborted) throw err;
        logger.warn({ sitemap: child, error: errorMessage(err) }, "child sitemap failed, skipping");
      }
    }
    return refs;
  };

  return {
    fetch: async (signal, url) => {
      const refs = await load(signal, url, new Set());
      if (refs.length === 0) {
        throw new EmptyFeedError(`no urls found in sitemap ${url}`);
      }
      logger.info({ sitemap: url, count: refs.length }, "sitemap read");
      return refs;
    },
  };
}
