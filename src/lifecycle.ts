// pattern: Imperative Shell
import type { Logger } from "pino";
import { CancelledError } from "./errors";

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  /** Aborted on the first signal; the pipeline drains and returns. */
  readonly controller: AbortController;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
};

export const FORCED_EXIT_CODE = 130;

/**
 * Registers SIGTERM and SIGINT handlers. The first signal aborts the shared
 * cancellation scope; a second one exits immediately.
 *
 * Returns a function that removes both handlers.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let received = 0;

  const shutdown = (signal: NodeJS.Signals) => {
    received++;

    if (received === 1) {
      deps.logger.info({ signal }, "shutdown signal received, draining");
      deps.controller.abort(new CancelledError(`received ${signal}`));
      return;
    }

    deps.logger.warn({ signal }, "second shutdown signal, exiting now");
    exit(FORCED_EXIT_CODE);
  };

  const onTerm = () => shutdown("SIGTERM");
  const onInt = () => shutdown("SIGINT");

  process.on("SIGTERM", onTerm);
  process.on("SIGINT", onInt);

  return () => {
    process.off("SIGTERM", onTerm);
    process.off("SIGINT", onInt);
  };
}
