import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { createArticleStore } from "../db/articles";
import type { Article } from "../domain/types";

/**
 * Creates an in-memory SQLite database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

/**
 * Stores articles with placeholder titles and text, crawled at the epoch.
 */
export function seedTestArticles(db: AppDatabase, urls: ReadonlyArray<string>): void {
  const store = createArticleStore(db);
  for (const url of urls) {
    store.saveArticle({ url, title: `Title of ${url}`, text: "seeded text", crawledAt: new Date(0) });
  }
}

export function makeArticle(url: string, overrides: Partial<Article> = {}): Article {
  return {
    url,
    title: `Title of ${url}`,
    text: "article text",
    crawledAt: new Date(0),
    ...overrides,
  };
}
