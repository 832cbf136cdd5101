// pattern: Imperative Shell
import Parser from "rss-parser";
import type { Logger } from "pino";
import type { URLRef } from "../domain/types";
import { EmptyFeedError, SourceError, errorMessage } from "../errors";
import type { HttpClient } from "../http/client";
import type { Fetcher } from "../pipeline/types";

type FeedItem = {
  link?: string;
  title?: string;
};

export type RssSourceOptions = {
  readonly http: HttpClient;
  readonly logger: Logger;
};

function resolveLink(link: string | undefined, feedUrl: string): string | null {
  const trimmed = link?.trim() ?? "";
  if (trimmed === "") return null;
  try {
    return new URL(trimmed, feedUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Reads an RSS or Atom feed and returns each item's link and title.
 */
export function rssSource(options: RssSourceOptions): Fetcher {
  const { http, logger } = options;
  const parser = new Parser<Record<string, unknown>, FeedItem>();

  return {
    fetch: async (signal, url) => {
      const xml = await http.getText(url, signal);

      let feed: Awaited<ReturnType<typeof parser.parseString>>;
      try {
        feed = await parser.parseString(xml);
      } catch (err) {
        throw new SourceError(`failed to parse feed ${url}: ${errorMessage(err)}`, { cause: err });
      }

      if (feed.items.length === 0) {
        throw new EmptyFeedError(`feed ${url} contains no items`);
      }

      const refs: Array<URLRef> = [];
      for (const item of feed.items) {
        const location = resolveLink(item.link, url);
        if (location === null) continue;
        const title = item.title?.trim();
        refs.push(title ? { location, title } : { location });
      }

      if (refs.length === 0) {
        throw new EmptyFeedError(`no valid urls found in items of feed ${url}`);
      }

      logger.info({ feed: url, items: feed.items.length, count: refs.length }, "feed read");
      return refs;
    },
  };
}
