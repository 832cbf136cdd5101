/**
 * A predicate on a URL string. Filters run inside producers (source
 * adapters and HTML extractors), never inside the stage plumbing.
 */
export type UrlFilter = {
  readonly name: string;
  readonly shouldKeep: (signal: AbortSignal, url: string) => boolean | Promise<boolean>;
};

/**
 * Drops root URLs: anything whose path is empty or `/`.
 * Unparseable URLs are kept so they fail later, where the failure is logged.
 */
export function baseUrlFilter(): UrlFilter {
  return {
    name: "base-url",
    shouldKeep: (_signal, url) => {
      let pathname: string;
      try {
        pathname = new URL(url).pathname;
      } catch {
        return true;
      }
      return pathname.replace(/^\/+|\/+$/g, "") !== "";
    },
  };
}

/**
 * Drops URLs present in `known`. The set is a snapshot taken once at
 * pipeline start and is never mutated afterwards.
 */
export function alreadyPersistedFilter(known: ReadonlySet<string>): UrlFilter {
  return {
    name: "already-persisted",
    shouldKeep: (_signal, url) => !known.has(url),
  };
}

/**
 * Keeps only URLs containing `segment` anywhere in the string.
 */
export function containsPathFilter(segment: string): UrlFilter {
  return {
    name: `contains-path(${segment})`,
    shouldKeep: (_signal, url) => url.includes(segment),
  };
}
