import { ConfigurationError } from "../errors";
import {
  DATA_ENGINEERING_PODCAST_HOST,
  extractDataEngineeringPodcastUrls,
} from "./dataengineeringpodcast";
import { extractGenericUrls } from "./generic";
import { SE_RADIO_HOST, extractSeRadioUrls } from "./seradio";
import type { UrlExtractor } from "./types";

export type { UrlExtractor } from "./types";
export { extractGenericUrls } from "./generic";
export { extractSeRadioUrls } from "./seradio";
export { extractDataEngineeringPodcastUrls } from "./dataengineeringpodcast";

export const EXTRACTORS = {
  generic: extractGenericUrls,
  "se-radio": extractSeRadioUrls,
  "data-engineering-podcast": extractDataEngineeringPodcastUrls,
} as const satisfies Record<string, UrlExtractor>;

export type ExtractorName = keyof typeof EXTRACTORS;

export const EXTRACTOR_NAMES = Object.keys(EXTRACTORS);

function isExtractorName(name: string): name is ExtractorName {
  return Object.hasOwn(EXTRACTORS, name);
}

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Picks the extractor for a listing site from its base URL.
 */
export function detectExtractor(baseUrl: string): ExtractorName {
  let host: string;
  try {
    host = new URL(baseUrl).hostname.toLowerCase();
  } catch {
    return "generic";
  }

  if (hostMatches(host, DATA_ENGINEERING_PODCAST_HOST)) return "data-engineering-podcast";
  if (hostMatches(host, SE_RADIO_HOST)) return "se-radio";
  return "generic";
}

/**
 * Looks an extractor up by name, or detects one from `baseUrl` when no name
 * is given.
 */
export function resolveExtractor(
  name: string | undefined,
  baseUrl: string,
): { readonly name: ExtractorName; readonly extract: UrlExtractor } {
  const resolved = name === undefined || name === "" ? detectExtractor(baseUrl) : name;
  if (!isExtractorName(resolved)) {
    throw new ConfigurationError(
      `unknown extractor "${resolved}", expected one of: ${EXTRACTOR_NAMES.join(", ")}`,
    );
  }
  return { name: resolved, extract: EXTRACTORS[resolved] };
}
