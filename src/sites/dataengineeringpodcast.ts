// pattern: functional-core
import * as cheerio from "cheerio";
import type { URLRef } from "../domain/types";
import { LinkCollector } from "./links";

export const DATA_ENGINEERING_PODCAST_HOST = "dataengineeringpodcast.com";
export const DATA_ENGINEERING_PODCAST_ORIGIN = "https://www.dataengineeringpodcast.com";

const EPISODE_PATH_PREFIX = "/episodepage/";

/**
 * Episode links (`a.episodeLink` pointing under `/episodepage/`) from a
 * Data Engineering Podcast listing page. Links resolve against the podcast's
 * public origin whatever host served the listing.
 */
export function extractDataEngineeringPodcastUrls(html: string, _pageUrl: string): ReadonlyArray<URLRef> {
  const $ = cheerio.load(html);
  const links = new LinkCollector($, DATA_ENGINEERING_PODCAST_ORIGIN);

  links.add("a.episodeLink", {
    accept: (location) => new URL(location).pathname.startsWith(EPISODE_PATH_PREFIX),
  });

  return links.toArray();
}
