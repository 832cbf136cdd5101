import type { ErrorKind } from "../errors";
import type { PipelineObserver } from "./types";

export type ProgressSnapshot = {
  readonly emitted: number;
  readonly saved: number;
  readonly failed: number;
  readonly failuresByKind: Readonly<Partial<Record<ErrorKind, number>>>;
};

export type ProgressTally = {
  readonly observer: PipelineObserver;
  readonly snapshot: () => ProgressSnapshot;
};

/**
 * Observer that counts what a run did. All updates happen on the event
 * loop, so plain counters suffice.
 */
export function createProgressTally(): ProgressTally {
  let emitted = 0;
  let saved = 0;
  let failed = 0;
  const failuresByKind: Partial<Record<ErrorKind, number>> = {};

  return {
    observer: (event) => {
      switch (event.type) {
        case "urls_emitted":
          emitted += event.count;
          break;
        case "article_saved":
          saved++;
          break;
        case "item_failed":
          failed++;
          failuresByKind[event.kind] = (failuresByKind[event.kind] ?? 0) + 1;
          break;
        default:
          break;
      }
    },
    snapshot: () => ({ emitted, saved, failed, failuresByKind: { ...failuresByKind } }),
  };
}
