export type ErrorKind =
  | "InvalidSpec"
  | "ConfigurationError"
  | "SourceError"
  | "FetchError"
  | "ExtractError"
  | "StoreError"
  | "FilterError"
  | "Cancelled"
  | "UnexpectedStatus"
  | "TooManyRedirects"
  | "SoftError"
  | "EmptyFeed"
  | "EmptyFile"
  | "TitleNotFound";

type ErrorOptions = {
  readonly details?: Readonly<Record<string, unknown>>;
  readonly cause?: unknown;
};

/**
 * Base class for every error the harvester raises on purpose. `kind` is the
 * stable, machine-readable category used by observers and tests.
 */
export class HarvestError extends Error {
  readonly kind: ErrorKind;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(kind: ErrorKind, message: string, options: ErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "HarvestError";
    this.kind = kind;
    this.details = options.details ?? {};
  }
}

export class InvalidSpecError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("InvalidSpec", message, options);
    this.name = "InvalidSpecError";
  }
}

export class ConfigurationError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("ConfigurationError", message, options);
    this.name = "ConfigurationError";
  }
}

export class SourceError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("SourceError", message, options);
    this.name = "SourceError";
  }
}

export class FetchError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("FetchError", message, options);
    this.name = "FetchError";
  }
}

export class ExtractError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("ExtractError", message, options);
    this.name = "ExtractError";
  }
}

export class StoreError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("StoreError", message, options);
    this.name = "StoreError";
  }
}

export class FilterError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("FilterError", message, options);
    this.name = "FilterError";
  }
}

/**
 * Raised when the cancellation scope aborts a long-running producer.
 * `partial` carries whatever the producer had collected so far.
 */
export class CancelledError<T = unknown> extends HarvestError {
  readonly partial: ReadonlyArray<T>;

  constructor(message: string, partial: ReadonlyArray<T> = []) {
    super("Cancelled", message);
    this.name = "CancelledError";
    this.partial = partial;
  }
}

export class UnexpectedStatusError extends HarvestError {
  readonly status: number;

  constructor(url: string, status: number) {
    super("UnexpectedStatus", `unexpected status code ${status} for ${url}`, {
      details: { url, status },
    });
    this.name = "UnexpectedStatusError";
    this.status = status;
  }
}

export class TooManyRedirectsError extends HarvestError {
  constructor(url: string, limit: number) {
    super("TooManyRedirects", `stopped after ${limit} redirects for ${url}`, {
      details: { url, limit },
    });
    this.name = "TooManyRedirectsError";
  }
}

export class SoftError extends HarvestError {
  constructor(url: string, reason: string) {
    super("SoftError", `server returned an error page or empty response for ${url}: ${reason}`, {
      details: { url, reason },
    });
    this.name = "SoftError";
  }
}

export class EmptyFeedError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("EmptyFeed", message, options);
    this.name = "EmptyFeedError";
  }
}

export class EmptyFileError extends HarvestError {
  constructor(message: string, options?: ErrorOptions) {
    super("EmptyFile", message, options);
    this.name = "EmptyFileError";
  }
}

export class TitleNotFoundError extends HarvestError {
  constructor() {
    super("TitleNotFound", "title not found in HTML");
    this.name = "TitleNotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classifies an unknown throwable. Harvest errors keep their own kind;
 * anything else is reported under `fallback`.
 */
export function errorKind(err: unknown, fallback: ErrorKind): ErrorKind {
  return err instanceof HarvestError ? err.kind : fallback;
}
