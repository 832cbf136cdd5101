import type { Article, URLRef } from "../domain/types";
import type { ErrorKind } from "../errors";

/**
 * Produces the first batch of URLs from its own configuration (for example a
 * page-range walk). Only valid as the first stage.
 */
export type Generator = {
  readonly generate: (signal: AbortSignal) => Promise<ReadonlyArray<URLRef>>;
};

/**
 * Turns one URL into zero or more URLs. As the first stage it is called once
 * with the pipeline's base URL; later stages call it for every upstream URL.
 */
export type Fetcher = {
  readonly fetch: (signal: AbortSignal, url: string) => Promise<ReadonlyArray<URLRef>>;
};

export type ContentProcessor = {
  readonly process: (signal: AbortSignal, url: string) => Promise<Article>;
};

export type ContentSaver = {
  readonly save: (signal: AbortSignal, article: Article) => Promise<void>;
};

export type StageRole =
  | { readonly kind: "generate"; readonly generator: Generator }
  | { readonly kind: "fetch"; readonly fetcher: Fetcher };

export type StageSpec = {
  readonly name: string;
  readonly workerCount: number;
  readonly role: StageRole;
};

export type SinkSpec = {
  readonly workerCount: number;
  readonly processor: ContentProcessor;
  readonly saver: ContentSaver;
};

export type PipelineSpec = {
  readonly stages: ReadonlyArray<StageSpec>;
  readonly sink: SinkSpec;
};

export type PipelineEvent =
  | { readonly type: "worker_started"; readonly stage: string; readonly workerId: number }
  | { readonly type: "worker_stopped"; readonly stage: string; readonly workerId: number }
  | { readonly type: "queue_closed"; readonly queue: string }
  | { readonly type: "urls_emitted"; readonly stage: string; readonly count: number }
  | {
      readonly type: "item_failed";
      readonly stage: string;
      readonly kind: ErrorKind;
      readonly url: string;
      readonly error: string;
    }
  | { readonly type: "article_saved"; readonly url: string };

export type PipelineObserver = (event: PipelineEvent) => void;

export const fetchStage = (name: string, workerCount: number, fetcher: Fetcher): StageSpec => ({
  name,
  workerCount,
  role: { kind: "fetch", fetcher },
});

export const generateStage = (
  name: string,
  workerCount: number,
  generator: Generator,
): StageSpec => ({
  name,
  workerCount,
  role: { kind: "generate", generator },
});
