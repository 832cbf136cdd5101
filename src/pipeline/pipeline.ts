import type { Logger } from "pino";
import type { Article, URLRef } from "../domain/types";
import { CancelledError, InvalidSpecError, errorKind, errorMessage } from "../errors";
import { BoundedQueue } from "./queue";
import type {
  PipelineEvent,
  PipelineObserver,
  PipelineSpec,
  SinkSpec,
  StageSpec,
} from "./types";

export const FIRST_QUEUE_MIN_CAPACITY = 100;
export const SINK_STAGE_NAME = "sink";

export type PipelineOptions = {
  readonly logger: Logger;
  readonly observer?: PipelineObserver;
};

type UrlQueue = BoundedQueue<URLRef>;

type StageLink = {
  readonly stage: StageSpec;
  readonly output: UrlQueue;
};

/**
 * Runs a linear chain of URL-producing stages into a content sink.
 *
 * Stage 0 is driven once (its generator, or its fetcher with the base URL).
 * Every later stage and the sink run `workerCount` workers reading from the
 * previous queue. Each queue is closed by a closer that waits for every
 * producer of that queue to finish; workers themselves never close queues.
 * Per-URL failures are logged and reported to the observer, never thrown.
 */
export class Pipeline {
  private readonly spec: PipelineSpec;
  private readonly logger: Logger;
  private readonly observer: PipelineObserver | undefined;

  constructor(spec: PipelineSpec, options: PipelineOptions) {
    this.spec = spec;
    this.logger = options.logger;
    this.observer = options.observer;
  }

  /**
   * Drives the pipeline until every worker has stopped.
   * Rejects only with {@link InvalidSpecError}; cancellation resolves normally.
   */
  async run(signal: AbortSignal, baseUrl: string): Promise<void> {
    validateSpec(this.spec);

    const { stages, sink } = this.spec;
    const links = stages.map((stage, i) => ({ stage, output: this.createOutputQueue(i) }));
    const [head, ...tail] = links;
    if (!head) throw new InvalidSpecError("pipeline has no stages");

    const chained: Array<{ readonly link: StageLink; readonly input: UrlQueue }> = [];
    let last: StageLink = head;
    for (const link of tail) {
      chained.push({ link, input: last.output });
      last = link;
    }

    this.logger.info(
      {
        baseUrl,
        stages: stages.map((s) => ({ name: s.name, workers: s.workerCount })),
        sinkWorkers: sink.workerCount,
      },
      "pipeline starting",
    );

    const tasks: Array<Promise<void>> = [];

    tasks.push(...this.startSink(signal, sink, last.output));

    for (const { link, input } of chained.reverse()) {
      const workers = this.startExtractorStage(signal, link.stage, input, link.output);
      tasks.push(...workers, this.closeWhenDone(link.output, workers));
    }

    const driver = this.driveFirstStage(signal, head.stage, baseUrl, head.output);
    tasks.push(driver, this.closeWhenDone(head.output, [driver]));

    await Promise.all(tasks);

    this.logger.info({ baseUrl, cancelled: signal.aborted }, "pipeline finished");
  }

  /**
   * Queue carrying stage `index`'s output. The last stage's queue feeds the
   * sink and is sized by the sink; the first inter-stage queue is never
   * smaller than {@link FIRST_QUEUE_MIN_CAPACITY}.
   */
  private createOutputQueue(index: number): UrlQueue {
    const { stages, sink } = this.spec;
    const stage = stages[index];
    const next = stages[index + 1];
    const name = stage?.name ?? `stage-${index}`;

    if (!next) {
      return new BoundedQueue<URLRef>(`${name} -> ${SINK_STAGE_NAME}`, 2 * sink.workerCount);
    }
    const capacity =
      index === 0
        ? Math.max(2 * next.workerCount, FIRST_QUEUE_MIN_CAPACITY)
        : 2 * (stage?.workerCount ?? 1);
    return new BoundedQueue<URLRef>(`${name} -> ${next.name}`, capacity);
  }

  private async closeWhenDone(queue: UrlQueue, producers: ReadonlyArray<Promise<void>>): Promise<void> {
    await Promise.allSettled(producers);
    queue.close();
    this.logger.debug({ queue: queue.name }, "queue closed");
    this.emit({ type: "queue_closed", queue: queue.name });
  }

  private async driveFirstStage(
    signal: AbortSignal,
    stage: StageSpec,
    baseUrl: string,
    output: UrlQueue,
  ): Promise<void> {
    const log = this.logger.child({ stage: stage.name, workerId: 0 });
    this.emit({ type: "worker_started", stage: stage.name, workerId: 0 });

    try {
      if (signal.aborted) return;

      let refs: ReadonlyArray<URLRef>;
      try {
        refs =
          stage.role.kind === "generate"
            ? await stage.role.generator.generate(signal)
            : await stage.role.fetcher.fetch(signal, baseUrl);
      } catch (err) {
        if (err instanceof CancelledError || signal.aborted) {
          log.info({ baseUrl }, "first stage cancelled");
          return;
        }
        const message = errorMessage(err);
        log.error({ baseUrl, kind: errorKind(err, "SourceError"), error: message }, "first stage failed");
        this.emit({ type: "item_failed", stage: stage.name, kind: "SourceError", url: baseUrl, error: message });
        return;
      }

      log.info({ baseUrl, count: refs.length }, "first stage produced urls");
      await this.emitAll(signal, stage.name, refs, output, log);
    } finally {
      this.emit({ type: "worker_stopped", stage: stage.name, workerId: 0 });
    }
  }

  private startExtractorStage(
    signal: AbortSignal,
    stage: StageSpec,
    input: UrlQueue,
    output: UrlQueue,
  ): Array<Promise<void>> {
    const workers: Array<Promise<void>> = [];
    for (let workerId = 0; workerId < stage.workerCount; workerId++) {
      workers.push(this.runExtractorWorker(signal, stage, workerId, input, output));
    }
    return workers;
  }

  private async runExtractorWorker(
    signal: AbortSignal,
    stage: StageSpec,
    workerId: number,
    input: UrlQueue,
    output: UrlQueue,
  ): Promise<void> {
    const log = this.logger.child({ stage: stage.name, workerId });
    this.emit({ type: "worker_started", stage: stage.name, workerId });

    try {
      if (stage.role.kind !== "fetch") return;
      const { fetcher } = stage.role;

      for (;;) {
        const next = await input.receive(signal);
        if (next.kind !== "item") return;

        const url = next.value.location;
        let refs: ReadonlyArray<URLRef>;
        try {
          refs = await fetcher.fetch(signal, url);
        } catch (err) {
          if (signal.aborted) return;
          const message = errorMessage(err);
          log.warn({ url, kind: errorKind(err, "FetchError"), error: message }, "url extraction failed");
          this.emit({ type: "item_failed", stage: stage.name, kind: "FetchError", url, error: message });
          continue;
        }

        if (signal.aborted) return;
        log.debug({ url, count: refs.length }, "urls extracted");
        if (!(await this.emitAll(signal, stage.name, refs, output, log))) return;
      }
    } finally {
      log.debug("worker stopped");
      this.emit({ type: "worker_stopped", stage: stage.name, workerId });
    }
  }

  private startSink(signal: AbortSignal, sink: SinkSpec, input: UrlQueue): Array<Promise<void>> {
    const workers: Array<Promise<void>> = [];
    for (let workerId = 0; workerId < sink.workerCount; workerId++) {
      workers.push(this.runSinkWorker(signal, sink, workerId, input));
    }
    return workers;
  }

  private async runSinkWorker(
    signal: AbortSignal,
    sink: SinkSpec,
    workerId: number,
    input: UrlQueue,
  ): Promise<void> {
    const log = this.logger.child({ stage: SINK_STAGE_NAME, workerId });
    this.emit({ type: "worker_started", stage: SINK_STAGE_NAME, workerId });

    try {
      for (;;) {
        const next = await input.receive(signal);
        if (next.kind !== "item") return;
        await this.consume(signal, sink, next.value.location, log);
      }
    } finally {
      log.debug("worker stopped");
      this.emit({ type: "worker_stopped", stage: SINK_STAGE_NAME, workerId });
    }
  }

  private async consume(signal: AbortSignal, sink: SinkSpec, url: string, log: Logger): Promise<void> {
    let article: Article;
    try {
      article = await sink.processor.process(signal, url);
    } catch (err) {
      if (signal.aborted) return;
      const message = errorMessage(err);
      const kind = errorKind(err, "ExtractError");
      log.warn({ url, kind, error: message }, "content processing failed");
      this.emit({ type: "item_failed", stage: SINK_STAGE_NAME, kind, url, error: message });
      return;
    }

    if (signal.aborted) return;

    try {
      await sink.saver.save(signal, article);
    } catch (err) {
      if (signal.aborted) return;
      const message = errorMessage(err);
      log.error({ url, error: message }, "article save failed");
      this.emit({ type: "item_failed", stage: SINK_STAGE_NAME, kind: "StoreError", url, error: message });
      return;
    }

    log.info({ url, title: article.title }, "article saved");
    this.emit({ type: "article_saved", url: article.url });
  }

  /**
   * Sends `refs` downstream in order. Returns false if cancellation stopped
   * the sends part way.
   */
  private async emitAll(
    signal: AbortSignal,
    stage: string,
    refs: ReadonlyArray<URLRef>,
    output: UrlQueue,
    log: Logger,
  ): Promise<boolean> {
    let sent = 0;
    for (const ref of refs) {
      if (!(await output.send(ref, signal))) {
        log.info({ sent, total: refs.length }, "cancelled while sending urls");
        this.emit({ type: "urls_emitted", stage, count: sent });
        return false;
      }
      sent++;
    }
    this.emit({ type: "urls_emitted", stage, count: sent });
    return true;
  }

  private emit(event: PipelineEvent): void {
    this.observer?.(event);
  }
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isPresent(value: unknown): boolean {
  return typeof value === "object" && value !== null;
}

/**
 * Checks the wiring rules. Callers outside the type system (plain JS, config
 * driven builders) can still hand over malformed specs, so everything the
 * types promise is checked again here.
 */
export function validateSpec(spec: PipelineSpec): void {
  if (spec.stages.length === 0) {
    throw new InvalidSpecError("pipeline has no stages");
  }

  spec.stages.forEach((stage, index) => {
    if (!isPositiveInteger(stage.workerCount)) {
      throw new InvalidSpecError(`stage ${stage.name} needs a positive worker count`);
    }
    if (!isPresent(stage.role)) {
      throw new InvalidSpecError(`stage ${stage.name} has neither a generator nor a fetcher`);
    }
    if (index > 0 && stage.role.kind !== "fetch") {
      throw new InvalidSpecError(`stage ${stage.name} uses a generator but is not the first stage`);
    }
  });

  if (!isPositiveInteger(spec.sink.workerCount)) {
    throw new InvalidSpecError("sink needs a positive worker count");
  }
  if (!isPresent(spec.sink.processor)) {
    throw new InvalidSpecError("sink has no content processor");
  }
  if (!isPresent(spec.sink.saver)) {
    throw new InvalidSpecError("sink has no content saver");
  }
}
