import { describe, it, expect, afterEach, beforeEach, vi, type Mock } from "vitest";
import pino from "pino";
import { createTranscriptStore, type TranscriptStore } from "../db/transcripts";
import type { PodcastTranscript } from "../domain/types";
import { HttpClient } from "../http/client";
import type { Fetcher } from "../pipeline/types";
import { sitemapSource } from "../sources/sitemap";
import { createTestDatabase } from "../test-utils/db";
import { createFetchStub, requestedUrls } from "../test-utils/http";
import { downloadTranscripts, type PdfTextReader } from "./downloader";

const logger = pino({ level: "silent" });
const http = new HttpClient({ profile: "minimal" });
const crawledAt = new Date(5000);

function urlset(...urls: Array<string>): string {
  return `<?xml version="1.0"?><urlset>${urls.map((url) => `<url><loc>${url}</loc></url>`).join("")}</urlset>`;
}

function listed(...urls: Array<string>): Fetcher {
  return { fetch: async () => urls.map((location) => ({ location })) };
}

describe("downloadTranscripts", () => {
  let store: TranscriptStore;
  let readPdf: Mock<PdfTextReader>;

  beforeEach(() => {
    store = createTranscriptStore(createTestDatabase());
    readPdf = vi.fn<PdfTextReader>().mockResolvedValue("pdf words");
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should store new episodes with their text and pdf transcripts", async () => {
    const known: PodcastTranscript = {
      url: "https://pod.example/ep-3",
      title: "Old",
      pageContent: "old notes",
      transcript: "",
      transcriptUrl: "",
      crawledAt: new Date(0),
    };
    store.saveTranscript(known);

    const stub = createFetchStub({
      "https://pod.example/sitemap.xml": {
        body: urlset("https://pod.example/ep-1", "https://pod.example/ep-2", "https://pod.example/ep-3"),
      },
      "https://pod.example/ep-1": {
        body: `<html><head><title>Pod | One</title></head><body>
          <h1>Episode One</h1>
          <div class="post__content"><p>Notes   one</p></div>
          <a href="/files/ep-1.txt">Transcript</a>
        </body></html>`,
      },
      "https://pod.example/files/ep-1.txt": { body: "  hello transcript \n" },
      "https://pod.example/ep-2": {
        body: `<html><head><title>Ep Two</title></head><body>
          <p>Body   two</p>
          <a href="https://cdn.pod.example/ep-2">Download transcript</a>
        </body></html>`,
      },
      "https://cdn.pod.example/ep-2": { body: "%PDF-fake", headers: { "Content-Type": "application/pdf" } },
    });
    vi.stubGlobal("fetch", stub);

    const result = await downloadTranscripts(new AbortController().signal, "https://pod.example/sitemap.xml", {
      episodes: sitemapSource({ http, logger }),
      http,
      store,
      logger,
      workers: 2,
      readPdf,
      now: () => crawledAt,
    });

    expect(result).toEqual({
      discovered: 3,
      skipped: 1,
      saved: 2,
      withTranscript: 2,
      failed: 0,
      cancelled: false,
    });
    expect(store.getAllTranscripts()).toEqual([
      {
        url: "https://pod.example/ep-1",
        title: "Episode One",
        pageContent: "Notes one",
        transcript: "hello transcript",
        transcriptUrl: "https://pod.example/files/ep-1.txt",
        crawledAt,
      },
      {
        url: "https://pod.example/ep-2",
        title: "Ep Two",
        pageContent: "Body two Download transcript",
        transcript: "pdf words",
        transcriptUrl: "https://cdn.pod.example/ep-2",
        crawledAt,
      },
      known,
    ]);
    expect(readPdf).toHaveBeenCalledTimes(1);
    expect(new TextDecoder().decode(readPdf.mock.calls[0]?.[0])).toBe("%PDF-fake");
    expect(requestedUrls(stub)).not.toContain("GET https://pod.example/ep-3");
  });

  it("should cap the episodes considered and count pages that fail", async () => {
    const stub = createFetchStub({
      "https://pod.example/ep-1": { status: 500 },
      "https://pod.example/ep-2": {
        body: `<body><p>Notes</p><a href="missing.pdf">PDF</a></body>`,
      },
    });
    vi.stubGlobal("fetch", stub);

    const result = await downloadTranscripts(new AbortController().signal, "https://pod.example/sitemap.xml", {
      episodes: listed("https://pod.example/ep-1", "https://pod.example/ep-2", "https://pod.example/ep-3"),
      http,
      store,
      logger,
      max: 2,
      readPdf,
      now: () => crawledAt,
    });

    expect(result).toEqual({
      discovered: 2,
      skipped: 0,
      saved: 1,
      withTranscript: 0,
      failed: 1,
      cancelled: false,
    });
    expect(store.getAllTranscripts()).toEqual([
      {
        url: "https://pod.example/ep-2",
        title: "",
        pageContent: "NotesPDF",
        transcript: "",
        transcriptUrl: "https://pod.example/missing.pdf",
        crawledAt,
      },
    ]);
    expect(requestedUrls(stub).sort()).toEqual([
      "GET https://pod.example/ep-1",
      "GET https://pod.example/ep-2",
      "GET https://pod.example/missing.pdf",
    ]);
    expect(readPdf).not.toHaveBeenCalled();
  });

  it("should skip a page without text and keep a page whose transcript is not text or pdf", async () => {
    vi.stubGlobal(
      "fetch",
      createFetchStub({
        "https://pod.example/blank": { body: "<html><body>   </body></html>" },
        "https://pod.example/ep-9": {
          body: `<body><h1>Nine</h1><a href="/ep-9/transcript">Transcript</a></body>`,
        },
        "https://pod.example/ep-9/transcript": { body: "<p>html</p>", headers: { "Content-Type": "text/html" } },
      }),
    );

    const result = await downloadTranscripts(new AbortController().signal, "https://pod.example/sitemap.xml", {
      episodes: listed("https://pod.example/blank", "https://pod.example/ep-9"),
      http,
      store,
      logger,
      readPdf,
      now: () => crawledAt,
    });

    expect(result.failed).toBe(1);
    expect(store.getAllTranscripts()).toEqual([
      {
        url: "https://pod.example/ep-9",
        title: "Nine",
        pageContent: "NineTranscript",
        transcript: "",
        transcriptUrl: "https://pod.example/ep-9/transcript",
        crawledAt,
      },
    ]);
  });

  it("should start no further episodes once cancelled", async () => {
    const controller = new AbortController();
    const page = createFetchStub({ "https://pod.example/ep-1": { body: "<body><p>Notes</p></body>" } });
    const stub = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const response = await page(input, init);
      controller.abort();
      return response;
    });
    vi.stubGlobal("fetch", stub);

    const result = await downloadTranscripts(controller.signal, "https://pod.example/sitemap.xml", {
      episodes: listed("https://pod.example/ep-1", "https://pod.example/ep-2", "https://pod.example/ep-3"),
      http,
      store,
      logger,
      workers: 1,
      now: () => crawledAt,
    });

    expect(stub).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ saved: 1, failed: 0, cancelled: true });
    expect([...store.listUrls()]).toEqual(["https://pod.example/ep-1"]);
  });

  it("should reject an empty sitemap url", async () => {
    await expect(
      downloadTranscripts(new AbortController().signal, " ", {
        episodes: listed(),
        http,
        store,
        logger,
      }),
    ).rejects.toThrow("sitemap url is empty");
  });
});
