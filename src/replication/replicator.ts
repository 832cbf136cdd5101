// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { ArticleStore } from "../db/articles";
import type { ArticleReplica } from "../db/postgres";
import type { Article } from "../domain/types";
import { StoreError, errorMessage } from "../errors";

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_CONCURRENCY = 5;
export const PROGRESS_LOG_INTERVAL = 1000;

export type ReplicationOptions = {
  readonly batchSize?: number;
  readonly concurrency?: number;
  readonly logger: Logger;
};

export type ReplicationResult = {
  readonly processed: number;
  readonly inserted: number;
};

function chunk<T>(items: ReadonlyArray<T>, size: number): Array<ReadonlyArray<T>> {
  const batches: Array<ReadonlyArray<T>> = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Copies every stored article into the replica, inserting only URLs the
 * replica does not have yet. Batches run `concurrency` at a time; the first
 * failing batch stops the run and no further batches start.
 */
export async function replicateArticles(
  source: Pick<ArticleStore, "getAllArticles">,
  replica: Pick<ArticleReplica, "findExistingUrls" | "insertArticles">,
  options: ReplicationOptions,
): Promise<ReplicationResult> {
  const { logger } = options;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);

  const articles = source.getAllArticles().filter((article) => article.url !== "");
  const batches = chunk(articles, batchSize);
  logger.info({ articles: articles.length, batches: batches.length, batchSize }, "replication starting");

  let processed = 0;
  let inserted = 0;

  const replicateBatch = async (batch: ReadonlyArray<Article>, index: number): Promise<void> => {
    try {
      const existing = await replica.findExistingUrls(batch.map((article) => article.url));
      const fresh = batch.filter((article) => !existing.has(article.url));
      const written = fresh.length > 0 ? await replica.insertArticles(fresh) : 0;
      inserted += written;
    } catch (err) {
      limit.clearQueue();
      throw new StoreError(`replication batch ${index} failed: ${errorMessage(err)}`, {
        cause: err,
        details: { batch: index },
      });
    }

    const before = processed;
    processed += batch.length;
    if (Math.floor(processed / PROGRESS_LOG_INTERVAL) > Math.floor(before / PROGRESS_LOG_INTERVAL)) {
      logger.info({ processed, inserted, total: articles.length }, "replication progress");
    }
  };

  await Promise.all(batches.map((batch, index) => limit(() => replicateBatch(batch, index))));

  logger.info({ processed, inserted }, "replication complete");
  return { processed, inserted };
}
