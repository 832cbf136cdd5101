// pattern: Imperative Shell
import { inArray, sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import { pgTable, text, timestamp } from "drizzle-orm/pg-core";
import { Pool } from "pg";
import type { Article } from "../domain/types";

export const replicaArticles = pgTable("article", {
  url: text("url").primaryKey(),
  title: text("title").notNull().default(""),
  text: text("text").notNull().default(""),
  crawledAt: timestamp("crawled_at", { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Relational copy of the document store.
 */
export type ArticleReplica = {
  readonly ensureSchema: () => Promise<void>;
  readonly findExistingUrls: (urls: ReadonlyArray<string>) => Promise<ReadonlySet<string>>;
  /** Inserts in one transaction, skipping URLs already present. Returns rows written. */
  readonly insertArticles: (batch: ReadonlyArray<Article>) => Promise<number>;
  readonly close: () => Promise<void>;
};

export function createPostgresReplica(connectionString: string): ArticleReplica {
  const pool = new Pool({ connectionString });
  const db = drizzle(pool);

  return {
    ensureSchema: async () => {
      await db.execute(sql`
        CREATE TABLE IF NOT EXISTS article (
          url TEXT PRIMARY KEY,
          title TEXT NOT NULL DEFAULT '',
          text TEXT NOT NULL DEFAULT '',
          crawled_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )
      `);
    },

    findExistingUrls: async (urls) => {
      if (urls.length === 0) return new Set();
      const rows = await db
        .select({ url: replicaArticles.url })
        .from(replicaArticles)
        .where(inArray(replicaArticles.url, [...urls]));
      return new Set(rows.map((row) => row.url));
    },

    insertArticles: async (batch) => {
      if (batch.length === 0) return 0;
      return db.transaction(async (tx) => {
        const written = await tx
          .insert(replicaArticles)
          .values(
            batch.map((article) => ({
              url: article.url,
              title: article.title,
              text: article.text,
              crawledAt: article.crawledAt,
            })),
          )
          .onConflictDoNothing({ target: replicaArticles.url })
          .returning({ url: replicaArticles.url });
        return written.length;
      });
    },

    close: () => pool.end(),
  };
}
