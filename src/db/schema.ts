import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const articles = sqliteTable("articles", {
  url: text("url").primaryKey(),
  title: text("title").notNull().default(""),
  text: text("text").notNull().default(""),
  crawledAt: integer("crawled_at", { mode: "timestamp_ms" }).notNull(),
});

export const podcastTranscripts = sqliteTable("podcast_transcripts", {
  url: text("url").primaryKey(),
  title: text("title").notNull().default(""),
  pageContent: text("page_content").notNull().default(""),
  transcript: text("transcript").notNull().default(""),
  transcriptUrl: text("transcript_url").notNull().default(""),
  crawledAt: integer("crawled_at", { mode: "timestamp_ms" }).notNull(),
});
