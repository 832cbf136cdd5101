import type { Logger } from "pino";
import type { URLRef } from "../domain/types";
import {
  CancelledError,
  ConfigurationError,
  FetchError,
  FilterError,
  errorMessage,
} from "../errors";
import type { UrlFilter } from "../filters/filters";
import type { HttpClient } from "../http/client";
import type { UrlExtractor } from "../sites/types";
import type { Fetcher, Generator } from "./types";

export const DEFAULT_EMPTY_CONTENT_MARKERS: ReadonlyArray<string> = ["0 episodes found"];
export const DEFAULT_CONTENT_CHECK_INTERVAL = 10;

/**
 * Drops refs with an empty location, then keeps the refs every filter keeps.
 * Filters run in order and stop at the first rejection; a filter that throws
 * fails the whole call with a {@link FilterError}.
 */
export async function applyFilters(
  signal: AbortSignal,
  refs: ReadonlyArray<URLRef>,
  filters: ReadonlyArray<UrlFilter>,
): Promise<Array<URLRef>> {
  const kept: Array<URLRef> = [];

  for (const ref of refs) {
    if (ref.location === "") continue;
    if (await keepsUrl(signal, ref.location, filters)) {
      kept.push(ref);
    }
  }

  return kept;
}

async function keepsUrl(
  signal: AbortSignal,
  url: string,
  filters: ReadonlyArray<UrlFilter>,
): Promise<boolean> {
  for (const filter of filters) {
    let keep: boolean;
    try {
      keep = await filter.shouldKeep(signal, url);
    } catch (err) {
      throw new FilterError(`filter ${filter.name} failed for ${url}: ${errorMessage(err)}`, {
        cause: err,
        details: { filter: filter.name, url },
      });
    }
    if (!keep) return false;
  }
  return true;
}

export function filteredFetcher(inner: Fetcher, filters: ReadonlyArray<UrlFilter>): Fetcher {
  return {
    fetch: async (signal, url) => applyFilters(signal, await inner.fetch(signal, url), filters),
  };
}

export function filteredGenerator(inner: Generator, filters: ReadonlyArray<UrlFilter>): Generator {
  return {
    generate: async (signal) => applyFilters(signal, await inner.generate(signal), filters),
  };
}

export type HtmlPageFetcherOptions = {
  readonly http: HttpClient;
  readonly extractor: UrlExtractor;
  readonly logger: Logger;
};

/**
 * GETs a listing page and runs a site extractor over it. A page with no
 * links is a failure for that page.
 */
export function htmlPageFetcher(options: HtmlPageFetcherOptions): Fetcher {
  const { http, extractor, logger } = options;

  return {
    fetch: async (signal, url) => {
      let html: string;
      try {
        html = await http.getText(url, signal);
      } catch (err) {
        throw new FetchError(`failed to fetch listing page ${url}: ${errorMessage(err)}`, { cause: err });
      }

      const refs = extractor(html, url);
      if (refs.length === 0) {
        throw new FetchError(`no urls found on ${url}`);
      }

      logger.debug({ url, count: refs.length }, "extracted urls from listing page");
      return refs;
    },
  };
}

export type PageRangeGeneratorOptions = {
  readonly baseUrl: string;
  readonly pagePattern: string;
  readonly http: HttpClient;
  readonly logger: Logger;
  readonly emptyContentMarkers?: ReadonlyArray<string>;
  readonly contentCheckInterval?: number;
};

const PAGE_PLACEHOLDER = "%d";

export function buildPageUrl(baseUrl: string, pagePattern: string, page: number): string {
  return baseUrl + pagePattern.replace(PAGE_PLACEHOLDER, String(page));
}

/**
 * Walks `baseUrl + pagePattern` for pages 1, 2, … while HEAD answers 200.
 *
 * Every `contentCheckInterval`-th page is also fetched and scanned
 * (case-insensitively) for an empty-content marker; a page carrying one ends
 * the walk and is not emitted. A HEAD that fails outright ends the walk; a
 * failed content check does not. Cancellation throws {@link CancelledError}
 * carrying the pages found so far.
 */
export function pageRangeGenerator(options: PageRangeGeneratorOptions): Generator {
  const { baseUrl, pagePattern, http, logger } = options;
  const markers = (options.emptyContentMarkers ?? DEFAULT_EMPTY_CONTENT_MARKERS).map((m) => m.toLowerCase());
  const interval = options.contentCheckInterval ?? DEFAULT_CONTENT_CHECK_INTERVAL;

  if (pagePattern.split(PAGE_PLACEHOLDER).length !== 2) {
    throw new ConfigurationError(`page pattern must contain exactly one ${PAGE_PLACEHOLDER}: ${pagePattern}`);
  }
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new ConfigurationError(`content check interval must be a positive integer, got ${interval}`);
  }

  const hasEmptyMarker = async (signal: AbortSignal, pageUrl: string, page: number): Promise<boolean> => {
    let body: string;
    try {
      body = (await http.getText(pageUrl, signal)).toLowerCase();
    } catch (err) {
      if (signal.aborted) throw err;
      logger.warn({ page, pageUrl, error: errorMessage(err) }, "content check failed, continuing");
      return false;
    }
    const marker = markers.find((m) => body.includes(m));
    if (marker !== undefined) {
      logger.info({ page, pageUrl, marker }, "empty content marker found");
      return true;
    }
    return false;
  };

  return {
    generate: async (signal) => {
      const pages: Array<URLRef> = [];

      for (let page = 1; ; page++) {
        if (signal.aborted) {
          throw new CancelledError("page generation cancelled", pages);
        }

        const pageUrl = buildPageUrl(baseUrl, pagePattern, page);

        let status: number;
        try {
          status = await http.head(pageUrl, signal);
        } catch (err) {
          if (signal.aborted) throw new CancelledError("page generation cancelled", pages);
          logger.warn({ page, pageUrl, error: errorMessage(err) }, "page check failed, stopping pagination");
          break;
        }

        if (status !== 200) {
          logger.info({ page, pageUrl, status }, "page does not exist, stopping pagination");
          break;
        }

        if (page % interval === 0) {
          let empty: boolean;
          try {
            empty = await hasEmptyMarker(signal, pageUrl, page);
          } catch {
            throw new CancelledError("page generation cancelled", pages);
          }
          if (empty) break;
        }

        pages.push({ location: pageUrl });
      }

      logger.info({ baseUrl, pages: pages.length }, "generated page urls");
      return pages;
    },
  };
}
