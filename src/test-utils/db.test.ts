import { describe, it, expect } from "vitest";
import { createArticleStore } from "../db/articles";
import { createTestDatabase, makeArticle, seedTestArticles } from "./db";

describe("Test Database Utilities", () => {
  it("should create an in-memory database with the articles table", () => {
    const db = createTestDatabase();
    expect(createArticleStore(db).countArticles()).toBe(0);
  });

  it("should seed articles", () => {
    const db = createTestDatabase();
    seedTestArticles(db, ["https://ex.com/a", "https://ex.com/b"]);
    expect(createArticleStore(db).countArticles()).toBe(2);
  });

  it("should build articles with overrides", () => {
    expect(makeArticle("https://ex.com/a", { title: "Custom" })).toEqual({
      url: "https://ex.com/a",
      title: "Custom",
      text: "article text",
      crawledAt: new Date(0),
    });
  });
});
