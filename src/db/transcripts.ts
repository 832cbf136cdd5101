import type { PodcastTranscript } from "../domain/types";
import type { AppDatabase } from "./index";
import { podcastTranscripts } from "./schema";

/**
 * Podcast transcripts, kept apart from articles and keyed by episode URL.
 */
export type TranscriptStore = {
  /** Inserts or replaces the transcript stored under `transcript.url`. */
  readonly saveTranscript: (transcript: PodcastTranscript) => void;
  readonly listUrls: () => ReadonlySet<string>;
  readonly getAllTranscripts: () => ReadonlyArray<PodcastTranscript>;
};

export function createTranscriptStore(db: AppDatabase): TranscriptStore {
  return {
    saveTranscript: (transcript) => {
      db.insert(podcastTranscripts)
        .values(transcript)
        .onConflictDoUpdate({
          target: podcastTranscripts.url,
          set: {
            title: transcript.title,
            pageContent: transcript.pageContent,
            transcript: transcript.transcript,
            transcriptUrl: transcript.transcriptUrl,
            crawledAt: transcript.crawledAt,
          },
        })
        .run();
    },

    listUrls: () =>
      new Set(
        db
          .select({ url: podcastTranscripts.url })
          .from(podcastTranscripts)
          .all()
          .map((row) => row.url),
      ),

    getAllTranscripts: () =>
      db
        .select()
        .from(podcastTranscripts)
        .orderBy(podcastTranscripts.url)
        .all()
        .map((row) => ({
          url: row.url,
          title: row.title,
          pageContent: row.pageContent,
          transcript: row.transcript,
          transcriptUrl: row.transcriptUrl,
          crawledAt: row.crawledAt,
        })),
  };
}
