import type { Logger } from "pino";
import type { MainContentExtractor } from "../content/extractor";
import { transcriptExtractor } from "../content/transcript";
import type { ArticleStore } from "../db/articles";
import type { UrlFilter } from "../filters/filters";
import { HttpClient } from "../http/client";
import type { UrlExtractor } from "../sites/types";
import { fileSource } from "../sources/file";
import { rssSource } from "../sources/rss";
import { sitemapSource } from "../sources/sitemap";
import { filteredFetcher, htmlPageFetcher, pageRangeGenerator } from "./fetchers";
import { httpContentProcessor, storeContentSaver } from "./processor";
import {
  fetchStage,
  generateStage,
  type Fetcher,
  type PipelineSpec,
  type SinkSpec,
  type StageSpec,
} from "./types";

export const PODCAST_TIMEOUT_MS = 30_000;

export type BuilderContext = {
  readonly store: ArticleStore;
  readonly http: HttpClient;
  readonly logger: Logger;
  readonly filters?: ReadonlyArray<UrlFilter>;
  readonly contentExtractor?: MainContentExtractor;
};

export type SourceWorkers = {
  readonly urlFetcher: number;
  readonly content: number;
};

export type PaginationOptions = {
  readonly baseUrl: string;
  readonly pagePattern: string;
  readonly extractor: UrlExtractor;
  readonly pageGenerator: number;
  readonly htmlFetcher: number;
  readonly content: number;
  readonly emptyContentMarkers?: ReadonlyArray<string>;
  readonly contentCheckInterval?: number;
};

function withFilters(fetcher: Fetcher, filters: ReadonlyArray<UrlFilter> | undefined): Fetcher {
  return filters && filters.length > 0 ? filteredFetcher(fetcher, filters) : fetcher;
}

function articleSink(context: BuilderContext, workerCount: number, http = context.http): SinkSpec {
  return {
    workerCount,
    processor: httpContentProcessor({ http, extractor: context.contentExtractor }),
    saver: storeContentSaver(context.store),
  };
}

function singleSourcePipeline(
  context: BuilderContext,
  name: string,
  source: Fetcher,
  workers: SourceWorkers,
): PipelineSpec {
  return {
    stages: [fetchStage(name, workers.urlFetcher, withFilters(source, context.filters))],
    sink: articleSink(context, workers.content),
  };
}

export function buildSitemapPipeline(context: BuilderContext, workers: SourceWorkers): PipelineSpec {
  const source = sitemapSource({ http: context.http, logger: context.logger });
  return singleSourcePipeline(context, "sitemap fetcher", source, workers);
}

export function buildRssPipeline(context: BuilderContext, workers: SourceWorkers): PipelineSpec {
  const source = rssSource({ http: context.http, logger: context.logger });
  return singleSourcePipeline(context, "rss fetcher", source, workers);
}

export function buildFilePipeline(context: BuilderContext, workers: SourceWorkers): PipelineSpec {
  return singleSourcePipeline(context, "file reader", fileSource({ logger: context.logger }), workers);
}

/**
 * Page range generator → listing page fetcher → article sink. Filters apply
 * to the article links found on listing pages.
 */
export function buildPaginationPipeline(context: BuilderContext, options: PaginationOptions): PipelineSpec {
  const { http, logger } = context;

  const generator = pageRangeGenerator({
    baseUrl: options.baseUrl,
    pagePattern: options.pagePattern,
    http,
    logger,
    emptyContentMarkers: options.emptyContentMarkers,
    contentCheckInterval: options.contentCheckInterval,
  });
  const pages = withFilters(htmlPageFetcher({ http, extractor: options.extractor, logger }), context.filters);

  return {
    stages: [
      generateStage("page range generator", options.pageGenerator, generator),
      fetchStage("html page fetcher", options.htmlFetcher, pages),
    ],
    sink: articleSink(context, options.content),
  };
}

/**
 * Pagination pipeline for podcast sites whose episode pages carry a
 * transcript. Episode pages are fetched with a longer timeout.
 */
export function buildPodcastTranscriptPipeline(context: BuilderContext, options: PaginationOptions): PipelineSpec {
  const spec = buildPaginationPipeline(context, options);
  const episodeHttp = new HttpClient({
    profile: context.http.profile,
    timeoutMs: PODCAST_TIMEOUT_MS,
    logger: context.logger,
  });

  return {
    stages: spec.stages,
    sink: articleSink({ ...context, contentExtractor: transcriptExtractor() }, options.content, episodeHttp),
  };
}

/**
 * Arbitrary chain: the first stage may generate or fetch, every later stage
 * fetches.
 */
export function buildMultiLevelPipeline(stages: ReadonlyArray<StageSpec>, sink: SinkSpec): PipelineSpec {
  return { stages, sink };
}
