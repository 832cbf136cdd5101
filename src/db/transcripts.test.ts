import { describe, it, expect, beforeEach } from "vitest";
import type { PodcastTranscript } from "../domain/types";
import { createTestDatabase } from "../test-utils/db";
import { createArticleStore } from "./articles";
import { createTranscriptStore, type TranscriptStore } from "./transcripts";
import type { AppDatabase } from "./index";

function transcript(url: string, overrides: Partial<PodcastTranscript> = {}): PodcastTranscript {
  return {
    url,
    title: "Episode",
    pageContent: "show notes",
    transcript: "hello",
    transcriptUrl: `${url}/transcript.txt`,
    crawledAt: new Date(1000),
    ...overrides,
  };
}

describe("createTranscriptStore", () => {
  let db: AppDatabase;
  let store: TranscriptStore;

  beforeEach(() => {
    db = createTestDatabase();
    store = createTranscriptStore(db);
  });

  it("should insert a transcript with every field", () => {
    store.saveTranscript(transcript("https://pod.example/ep-1"));

    expect(store.getAllTranscripts()).toEqual([
      {
        url: "https://pod.example/ep-1",
        title: "Episode",
        pageContent: "show notes",
        transcript: "hello",
        transcriptUrl: "https://pod.example/ep-1/transcript.txt",
        crawledAt: new Date(1000),
      },
    ]);
  });

  it("should replace the transcript saved under the same episode url", () => {
    store.saveTranscript(transcript("https://pod.example/ep-1"));
    store.saveTranscript(
      transcript("https://pod.example/ep-1", { transcript: "", transcriptUrl: "", crawledAt: new Date(2000) }),
    );

    expect(store.getAllTranscripts()).toEqual([
      transcript("https://pod.example/ep-1", { transcript: "", transcriptUrl: "", crawledAt: new Date(2000) }),
    ]);
  });

  it("should list episode urls without touching the article table", () => {
    store.saveTranscript(transcript("https://pod.example/ep-2"));
    store.saveTranscript(transcript("https://pod.example/ep-1"));

    expect([...store.listUrls()].sort()).toEqual(["https://pod.example/ep-1", "https://pod.example/ep-2"]);
    expect(createArticleStore(db).countArticles()).toBe(0);
  });
});
