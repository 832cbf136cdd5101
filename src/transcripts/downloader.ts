// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import { extractText, getDocumentProxy } from "unpdf";
import type { TranscriptStore } from "../db/transcripts";
import type { PodcastTranscript } from "../domain/types";
import { ExtractError, SourceError, errorMessage } from "../errors";
import type { HttpClient } from "../http/client";
import type { Fetcher } from "../pipeline/types";
import { episodePageText, episodeTitle, findTranscriptHref, transcriptFormat } from "./episode";

export const DEFAULT_TRANSCRIPT_WORKERS = 100;

/** Reads the text layer of a PDF document. */
export type PdfTextReader = (bytes: Uint8Array) => Promise<string>;

export type TranscriptDownloadOptions = {
  readonly episodes: Fetcher;
  readonly http: HttpClient;
  readonly store: Pick<TranscriptStore, "listUrls" | "saveTranscript">;
  readonly logger: Logger;
  readonly workers?: number;
  /** Caps how many sitemap entries are considered; zero or less means all. */
  readonly max?: number;
  readonly readPdf?: PdfTextReader;
  readonly now?: () => Date;
};

export type TranscriptDownloadResult = {
  readonly discovered: number;
  readonly skipped: number;
  readonly saved: number;
  readonly withTranscript: number;
  readonly failed: number;
  readonly cancelled: boolean;
};

export const readPdfText: PdfTextReader = async (bytes) => {
  const pdf = await getDocumentProxy(bytes);
  const { text } = await extractText(pdf, { mergePages: true });
  return Array.isArray(text) ? text.join("\n") : text;
};

/**
 * Lists episode pages from a sitemap and stores each page's title, text and
 * linked transcript. Episodes already in the store are skipped. An episode
 * whose page cannot be read is logged and counted as failed; a transcript
 * that cannot be read leaves the episode stored without one.
 */
export async function downloadTranscripts(
  signal: AbortSignal,
  sitemapUrl: string,
  options: TranscriptDownloadOptions,
): Promise<TranscriptDownloadResult> {
  const { http, store, logger } = options;
  const readPdf = options.readPdf ?? readPdfText;
  const now = options.now ?? (() => new Date());
  const limit = pLimit(options.workers ?? DEFAULT_TRANSCRIPT_WORKERS);

  if (sitemapUrl.trim() === "") {
    throw new SourceError("sitemap url is empty");
  }

  const listed = (await options.episodes.fetch(signal, sitemapUrl)).map((ref) => ref.location);
  const max = options.max ?? 0;
  const capped = max > 0 ? listed.slice(0, max) : listed;
  const known = store.listUrls();
  const pending = capped.filter((url) => !known.has(url));
  logger.info(
    { discovered: capped.length, skipped: capped.length - pending.length, pending: pending.length },
    "episodes listed",
  );

  const readTranscript = async (url: string): Promise<string> => {
    const { bytes, contentType } = await http.getBytes(url, signal);
    switch (transcriptFormat(url, contentType)) {
      case "text":
        return new TextDecoder().decode(bytes);
      case "pdf":
        return readPdf(bytes);
      default:
        throw new ExtractError(`unsupported transcript type for ${url}`, { details: { url, contentType } });
    }
  };

  const processEpisode = async (url: string): Promise<PodcastTranscript> => {
    const html = await http.getText(url, signal);
    const pageContent = episodePageText(html);
    if (pageContent === "") {
      throw new ExtractError(`page content is empty for ${url}`, { details: { url } });
    }

    let transcriptUrl = "";
    let transcript = "";
    const href = findTranscriptHref(html);
    if (href !== undefined) {
      try {
        transcriptUrl = new URL(href, url).toString();
      } catch {
        logger.debug({ url, href }, "transcript link does not resolve");
      }
    }
    if (transcriptUrl !== "") {
      try {
        transcript = (await readTranscript(transcriptUrl)).trim();
      } catch (err) {
        if (signal.aborted) throw err;
        logger.warn({ url, transcriptUrl, error: errorMessage(err) }, "transcript unreadable, saving page only");
      }
    }

    const record: PodcastTranscript = {
      url,
      title: episodeTitle(html),
      pageContent,
      transcript,
      transcriptUrl,
      crawledAt: now(),
    };
    store.saveTranscript(record);
    return record;
  };

  let saved = 0;
  let withTranscript = 0;
  let failed = 0;

  await Promise.all(
    pending.map((url) =>
      limit(async () => {
        if (signal.aborted) return;
        try {
          const record = await processEpisode(url);
          saved++;
          if (record.transcript !== "") withTranscript++;
          logger.debug({ url, transcriptUrl: record.transcriptUrl }, "episode saved");
        } catch (err) {
          if (signal.aborted) return;
          failed++;
          logger.warn({ url, error: errorMessage(err) }, "episode failed");
        }
      }),
    ),
  );

  const result: TranscriptDownloadResult = {
    discovered: capped.length,
    skipped: capped.length - pending.length,
    saved,
    withTranscript,
    failed,
    cancelled: signal.aborted,
  };
  logger.info(result, "transcript download complete");
  return result;
}
