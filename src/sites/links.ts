// pattern: functional-core
import type { CheerioAPI } from "cheerio";
import type { URLRef } from "../domain/types";

const SKIPPED_HREF_PREFIXES = ["#", "javascript:", "mailto:"];

/**
 * Resolves `href` against `base` and strips the fragment. Returns null for
 * in-page, script and mail links, and for anything that does not parse.
 */
export function normalizeHref(href: string, base: string | null): string | null {
  const trimmed = href.trim();
  if (trimmed === "") return null;

  const lower = trimmed.toLowerCase();
  if (SKIPPED_HREF_PREFIXES.some((prefix) => lower.startsWith(prefix))) return null;

  try {
    const resolved = base === null ? new URL(trimmed) : new URL(trimmed, base);
    resolved.hash = "";
    return resolved.toString();
  } catch {
    return null;
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * First candidate that is non-empty after trimming.
 */
export function firstNonEmpty(...candidates: ReadonlyArray<string | undefined>): string {
  for (const candidate of candidates) {
    const value = collapseWhitespace(candidate ?? "");
    if (value !== "") return value;
  }
  return "";
}

export type CollectOptions = {
  /** Anchors with an ancestor matching this selector are ignored. */
  readonly excludeWithin?: string;
  readonly accept?: (location: string) => boolean;
};

/**
 * Accumulates refs in first-seen order, dropping duplicate locations.
 * Titles are link text, else the `title` attribute, else the parent's
 * text, else the location itself.
 */
export class LinkCollector {
  private readonly seen = new Set<string>();
  private readonly refs: Array<URLRef> = [];

  constructor(
    private readonly $: CheerioAPI,
    private readonly base: string | null,
  ) {}

  get size(): number {
    return this.refs.length;
  }

  add(selector: string, options: CollectOptions = {}): void {
    const { excludeWithin, accept } = options;

    this.$(selector).each((_, el) => {
      const link = this.$(el);
      if (excludeWithin !== undefined && link.parents(excludeWithin).length > 0) return;

      const location = normalizeHref(link.attr("href") ?? "", this.base);
      if (location === null || this.seen.has(location)) return;
      if (accept && !accept(location)) return;

      this.seen.add(location);
      const title = firstNonEmpty(link.text(), link.attr("title"), link.parent().text(), location);
      this.refs.push({ location, title });
    });
  }

  toArray(): Array<URLRef> {
    return [...this.refs];
  }
}
