// pattern: functional-core
import * as cheerio from "cheerio";
import type { URLRef } from "../domain/types";
import { LinkCollector } from "./links";

export const SE_RADIO_HOST = "se-radio.net";

const EPISODE_LINKS =
  "div.col-12.megaphone-order-1.col-lg-8 article.megaphone-item.megaphone-post h2.entry-title a";

/**
 * Episode links from the main listing column of an se-radio.net page.
 */
export function extractSeRadioUrls(html: string, pageUrl: string): ReadonlyArray<URLRef> {
  const $ = cheerio.load(html);
  const links = new LinkCollector($, pageUrl);
  links.add(EPISODE_LINKS);
  return links.toArray();
}
