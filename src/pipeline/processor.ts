// pattern: Imperative Shell
import { readabilityExtractor, type ExtractedContent, type MainContentExtractor } from "../content/extractor";
import type { ArticleStore } from "../db/articles";
import { ExtractError, FetchError, HarvestError, StoreError, errorMessage } from "../errors";
import type { HttpClient } from "../http/client";
import type { ContentProcessor, ContentSaver } from "./types";

const ERROR_PAGE_MARKER = "Not Acceptable";

export type HttpContentProcessorOptions = {
  readonly http: HttpClient;
  readonly extractor?: MainContentExtractor;
  readonly now?: () => Date;
  /** Accept pages whose main text comes out empty. */
  readonly allowEmptyText?: boolean;
};

/**
 * GETs an article page and extracts its title and main text.
 * Transport failures raise {@link FetchError}, extraction failures
 * {@link ExtractError}.
 */
export function httpContentProcessor(options: HttpContentProcessorOptions): ContentProcessor {
  const { http } = options;
  const extractor = options.extractor ?? readabilityExtractor;
  const now = options.now ?? (() => new Date());
  const allowEmptyText = options.allowEmptyText ?? false;

  return {
    process: async (signal, url) => {
      let html: string;
      try {
        html = await http.getText(url, signal);
      } catch (err) {
        throw new FetchError(`failed to fetch ${url}: ${errorMessage(err)}`, {
          cause: err,
          details: { url, reason: err instanceof HarvestError ? err.kind : "network" },
        });
      }

      if (html.includes(ERROR_PAGE_MARKER)) {
        throw new FetchError(`server returned an error page for ${url}`, { details: { url } });
      }

      let content: ExtractedContent;
      try {
        content = extractor.extract(html);
      } catch (err) {
        throw new ExtractError(`failed to extract content from ${url}: ${errorMessage(err)}`, { cause: err });
      }

      if (content.text === "" && !allowEmptyText) {
        throw new ExtractError(`no text extracted from ${url}`);
      }

      return { url, title: content.title, text: content.text, crawledAt: now() };
    },
  };
}

export function storeContentSaver(store: ArticleStore): ContentSaver {
  return {
    save: async (_signal, article) => {
      try {
        store.saveArticle(article);
      } catch (err) {
        throw new StoreError(`failed to save ${article.url}: ${errorMessage(err)}`, { cause: err });
      }
    },
  };
}
