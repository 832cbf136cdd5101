/**
 * A discovered URL travelling between pipeline stages.
 */
export type URLRef = {
  readonly location: string;
  readonly title?: string;
};

/**
 * The persisted record, unique by `url`.
 */
export type Article = {
  readonly url: string;
  readonly title: string;
  readonly text: string;
  readonly crawledAt: Date;
};

/**
 * A podcast episode page with the transcript linked from it, unique by `url`.
 * `transcript` and `transcriptUrl` are empty when the page links no
 * readable transcript.
 */
export type PodcastTranscript = {
  readonly url: string;
  readonly title: string;
  readonly pageContent: string;
  readonly transcript: string;
  readonly transcriptUrl: string;
  readonly crawledAt: Date;
};
