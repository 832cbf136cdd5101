import type { URLRef } from "../domain/types";

/**
 * Pulls article links out of a listing page. `pageUrl` is where the HTML
 * came from and anchors relative links that have no other base.
 */
export type UrlExtractor = (html: string, pageUrl: string) => ReadonlyArray<URLRef>;
