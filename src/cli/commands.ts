// pattern: Imperative Shell
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { Logger } from "pino";
import { applyEnv, defaultConfig, loadConfig } from "../config";
import type { AppConfig } from "../config";
import { createArticleStore } from "../db/articles";
import type { ArticleStore } from "../db/articles";
import { createDatabase, IN_MEMORY } from "../db/index";
import type { AppDatabase } from "../db/index";
import { createPostgresReplica } from "../db/postgres";
import type { ArticleReplica } from "../db/postgres";
import { createTranscriptStore } from "../db/transcripts";
import type { URLRef } from "../domain/types";
import { ConfigurationError, SourceError, StoreError, errorMessage } from "../errors";
import { alreadyPersistedFilter, baseUrlFilter, containsPathFilter } from "../filters/filters";
import type { UrlFilter } from "../filters/filters";
import { HttpClient } from "../http/client";
import type { HttpProfile } from "../http/client";
import { registerShutdownHandlers } from "../lifecycle";
import {
  buildFilePipeline,
  buildPaginationPipeline,
  buildPodcastTranscriptPipeline,
  buildRssPipeline,
  buildSitemapPipeline,
} from "../pipeline/builders";
import type { BuilderContext, SourceWorkers } from "../pipeline/builders";
import { Pipeline } from "../pipeline/pipeline";
import { createProgressTally } from "../pipeline/progress";
import type { ProgressSnapshot } from "../pipeline/progress";
import type { PipelineSpec } from "../pipeline/types";
import { replicateArticles } from "../replication/replicator";
import type { ReplicationResult } from "../replication/replicator";
import { resolveExtractor } from "../sites";
import { sitemapSource } from "../sources/sitemap";
import { downloadTranscripts } from "../transcripts/downloader";
import type { TranscriptDownloadResult } from "../transcripts/downloader";
import { parseWorkerCount } from "./args";

export type CommandEnv = Readonly<Record<string, string | undefined>>;

export type CommandDeps = {
  readonly logger: Logger;
  readonly env: CommandEnv;
  /** Writes one line of command output (not logs) to stdout. */
  readonly write: (line: string) => void;
  readonly openReplica?: (connectionString: string) => ArticleReplica;
};

export type ConfigOptions = {
  readonly config?: string;
};

export type RunOptions = ConfigOptions & {
  readonly profile?: HttpProfile;
  readonly urlFilter?: string;
  readonly refetch?: boolean;
};

export type SourceKind = "sitemap" | "rss" | "file";

export type SourceArgs = {
  readonly urlFetcherWorkers?: string;
  readonly contentWorkers?: string;
};

export type PaginateArgs = {
  readonly extractor?: string;
  readonly pageGenWorkers?: string;
  readonly htmlFetcherWorkers?: string;
  readonly contentWorkers?: string;
};

export type TranscriptOptions = ConfigOptions & {
  readonly profile?: HttpProfile;
  readonly max?: number;
};

export type ExtractOptions = {
  readonly pageUrl?: string;
};

export type CommandHandlers = {
  readonly source: (kind: SourceKind, target: string, args: SourceArgs, options: RunOptions) => Promise<void>;
  readonly paginate: (
    baseUrl: string,
    pagePattern: string,
    args: PaginateArgs,
    options: RunOptions,
  ) => Promise<void>;
  readonly extract: (htmlFile: string, extractor: string, options: ExtractOptions) => Promise<void>;
  readonly replicate: (options: ConfigOptions) => Promise<void>;
  readonly transcripts: (sitemapUrl: string, workers: string | undefined, options: TranscriptOptions) => Promise<void>;
};

const SOURCE_BUILDERS = {
  sitemap: buildSitemapPipeline,
  rss: buildRssPipeline,
  file: buildFilePipeline,
} as const satisfies Record<SourceKind, (context: BuilderContext, workers: SourceWorkers) => PipelineSpec>;

/**
 * Loads the YAML file named by `--config` or `CONFIG_PATH`, or the defaults
 * when neither is set, then applies environment overrides.
 */
export function resolveConfig(configPath: string | undefined, env: CommandEnv): AppConfig {
  const path = configPath ?? env["CONFIG_PATH"];
  const config = path ? loadConfig(resolve(path)) : defaultConfig();
  return applyEnv(config, { DATABASE_URL: env["DATABASE_URL"] });
}

async function withStore<T>(
  config: AppConfig,
  logger: Logger,
  work: (store: ArticleStore, db: AppDatabase) => Promise<T>,
): Promise<T> {
  const path = config.database.path === IN_MEMORY ? IN_MEMORY : resolve(config.database.path);

  let database: ReturnType<typeof createDatabase>;
  try {
    database = createDatabase(path);
  } catch (err) {
    throw new StoreError(`failed to open document store at ${path}: ${errorMessage(err)}`, { cause: err });
  }
  logger.info({ path }, "document store opened");

  try {
    return await work(createArticleStore(database.db), database.db);
  } finally {
    database.close();
  }
}

function buildContext(
  store: ArticleStore,
  config: AppConfig,
  options: RunOptions,
  logger: Logger,
  baseFilters: ReadonlyArray<UrlFilter>,
): BuilderContext {
  const filters = [...baseFilters];

  if (options.urlFilter) {
    filters.push(containsPathFilter(options.urlFilter));
    logger.info({ segment: options.urlFilter }, "url filter enabled");
  }

  if (!options.refetch) {
    const known = store.listUrls();
    filters.push(alreadyPersistedFilter(known));
    logger.info({ known: known.size }, "skipping already persisted urls");
  }

  const http = new HttpClient({
    profile: options.profile ?? config.http.profile,
    timeoutMs: config.http.timeoutMs,
    logger,
  });

  return { store, http, logger, filters };
}

async function runPipeline(
  spec: PipelineSpec,
  baseUrl: string,
  store: ArticleStore,
  logger: Logger,
): Promise<ProgressSnapshot> {
  const controller = new AbortController();
  const unregister = registerShutdownHandlers({ controller, logger });
  const tally = createProgressTally();

  try {
    await new Pipeline(spec, { logger, observer: tally.observer }).run(controller.signal, baseUrl);
  } finally {
    unregister();
  }

  const progress = tally.snapshot();
  logger.info(
    {
      articles: store.countArticles(),
      saved: progress.saved,
      failed: progress.failed,
      failuresByKind: progress.failuresByKind,
      cancelled: controller.signal.aborted,
    },
    "run complete",
  );
  return progress;
}

export async function runSourceCommand(
  kind: SourceKind,
  target: string,
  args: SourceArgs,
  options: RunOptions,
  deps: CommandDeps,
): Promise<ProgressSnapshot> {
  const config = resolveConfig(options.config, deps.env);
  const workers: SourceWorkers = {
    urlFetcher: parseWorkerCount(args.urlFetcherWorkers, config.workers.sourceFetcher),
    content: parseWorkerCount(args.contentWorkers, config.workers.content),
  };
  const logger = deps.logger.child({ command: kind });

  return withStore(config, logger, async (store) => {
    const context = buildContext(store, config, options, logger, []);
    const spec = SOURCE_BUILDERS[kind](context, workers);
    logger.info({ target, ...workers, filters: context.filters?.length ?? 0 }, "starting pipeline");
    return runPipeline(spec, target, store, logger);
  });
}

export async function runPaginateCommand(
  baseUrl: string,
  pagePattern: string,
  args: PaginateArgs,
  options: RunOptions,
  deps: CommandDeps,
): Promise<ProgressSnapshot> {
  const config = resolveConfig(options.config, deps.env);
  const extractor = resolveExtractor(args.extractor, baseUrl);
  const logger = deps.logger.child({ command: "paginate" });

  const pageGenerator = parseWorkerCount(args.pageGenWorkers, config.workers.pageGenerator);
  const htmlFetcher = parseWorkerCount(args.htmlFetcherWorkers, config.workers.htmlFetcher);
  const content = parseWorkerCount(args.contentWorkers, config.workers.paginationContent);

  return withStore(config, logger, async (store) => {
    const context = buildContext(store, config, options, logger, [baseUrlFilter()]);
    const build =
      extractor.name === "data-engineering-podcast" ? buildPodcastTranscriptPipeline : buildPaginationPipeline;
    const spec = build(context, {
      baseUrl,
      pagePattern,
      extractor: extractor.extract,
      pageGenerator,
      htmlFetcher,
      content,
      emptyContentMarkers: config.pagination.emptyContentMarkers,
      contentCheckInterval: config.pagination.contentCheckInterval,
    });

    logger.info(
      { baseUrl, pagePattern, extractor: extractor.name, pageGenerator, htmlFetcher, content },
      "starting pipeline",
    );
    return runPipeline(spec, baseUrl, store, logger);
  });
}

/**
 * Runs a site extractor over a saved listing page and writes one
 * `location<TAB>title` line per URL found.
 */
export async function runExtractCommand(
  htmlFile: string,
  extractorName: string,
  options: ExtractOptions,
  deps: CommandDeps,
): Promise<ReadonlyArray<URLRef>> {
  const path = resolve(htmlFile);
  const pageUrl = options.pageUrl ?? pathToFileURL(path).href;
  const extractor = resolveExtractor(extractorName, pageUrl);

  let html: string;
  try {
    html = await readFile(path, "utf-8");
  } catch (err) {
    throw new SourceError(`failed to read HTML file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  const refs = extractor.extract(html, pageUrl);
  for (const ref of refs) {
    deps.write(ref.title ? `${ref.location}\t${ref.title}` : ref.location);
  }
  deps.logger.info({ file: path, extractor: extractor.name, count: refs.length }, "urls extracted");
  return refs;
}

export async function runReplicateCommand(
  options: ConfigOptions,
  deps: CommandDeps,
): Promise<ReplicationResult> {
  const dsn = deps.env["POSTGRES_DSN"]?.trim();
  if (!dsn) {
    throw new ConfigurationError("POSTGRES_DSN is not set");
  }

  const config = resolveConfig(options.config, deps.env);
  const logger = deps.logger.child({ command: "replicate" });
  const openReplica = deps.openReplica ?? createPostgresReplica;

  return withStore(config, logger, async (store) => {
    const replica = openReplica(dsn);
    try {
      try {
        await replica.ensureSchema();
      } catch (err) {
        throw new StoreError(`failed to prepare replica schema: ${errorMessage(err)}`, { cause: err });
      }

      return await replicateArticles(store, replica, {
        batchSize: config.replication.batchSize,
        concurrency: config.replication.concurrency,
        logger,
      });
    } finally {
      await replica.close();
    }
  });
}

/**
 * Downloads the transcripts linked from the episode pages a sitemap lists
 * into the document store's transcript table.
 */
export async function runTranscriptsCommand(
  sitemapUrl: string,
  workersArg: string | undefined,
  options: TranscriptOptions,
  deps: CommandDeps,
): Promise<TranscriptDownloadResult> {
  const config = resolveConfig(options.config, deps.env);
  const workers = parseWorkerCount(workersArg, config.transcripts.workers);
  const max = options.max ?? config.transcripts.max;
  const logger = deps.logger.child({ command: "transcripts" });

  return withStore(config, logger, async (_articles, db) => {
    const http = new HttpClient({
      profile: options.profile ?? config.http.profile,
      timeoutMs: config.http.timeoutMs,
      logger,
    });
    const controller = new AbortController();
    const unregister = registerShutdownHandlers({ controller, logger });

    logger.info({ sitemapUrl, workers, max }, "starting transcript download");
    try {
      return await downloadTranscripts(controller.signal, sitemapUrl, {
        episodes: sitemapSource({ http, logger }),
        http,
        store: createTranscriptStore(db),
        logger,
        workers,
        max,
      });
    } finally {
      unregister();
    }
  });
}

export function createCommandHandlers(deps: CommandDeps): CommandHandlers {
  return {
    source: async (kind, target, args, options) => {
      await runSourceCommand(kind, target, args, options, deps);
    },
    paginate: async (baseUrl, pagePattern, args, options) => {
      await runPaginateCommand(baseUrl, pagePattern, args, options, deps);
    },
    extract: async (htmlFile, extractor, options) => {
      await runExtractCommand(htmlFile, extractor, options, deps);
    },
    replicate: async (options) => {
      await runReplicateCommand(options, deps);
    },
    transcripts: async (sitemapUrl, workers, options) => {
      await runTranscriptsCommand(sitemapUrl, workers, options, deps);
    },
  };
}
