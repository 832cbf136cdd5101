import { sql } from "drizzle-orm";
import type { Article } from "../domain/types";
import type { AppDatabase } from "./index";
import { articles } from "./schema";

/**
 * Document store keyed by article URL.
 */
export type ArticleStore = {
  /** Inserts or replaces the article stored under `article.url`. */
  readonly saveArticle: (article: Article) => void;
  readonly listUrls: () => ReadonlySet<string>;
  readonly getAllArticles: () => ReadonlyArray<Article>;
  readonly countArticles: () => number;
};

export function createArticleStore(db: AppDatabase): ArticleStore {
  return {
    saveArticle: (article) => {
      db.insert(articles)
        .values({
          url: article.url,
          title: article.title,
          text: article.text,
          crawledAt: article.crawledAt,
        })
        .onConflictDoUpdate({
          target: articles.url,
          set: {
            title: article.title,
            text: article.text,
            crawledAt: article.crawledAt,
          },
        })
        .run();
    },

    listUrls: () =>
      new Set(
        db
          .select({ url: articles.url })
          .from(articles)
          .all()
          .map((row) => row.url),
      ),

    getAllArticles: () =>
      db
        .select()
        .from(articles)
        .orderBy(articles.url)
        .all()
        .map((row) => ({
          url: row.url,
          title: row.title,
          text: row.text,
          crawledAt: row.crawledAt,
        })),

    countArticles: () =>
      db
        .select({ count: sql<number>`count(*)` })
        .from(articles)
        .get()?.count ?? 0,
  };
}
