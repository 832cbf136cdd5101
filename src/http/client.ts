import type { Logger } from "pino";
import {
  SoftError,
  TooManyRedirectsError,
  UnexpectedStatusError,
} from "../errors";

export type HttpProfile = "browser" | "minimal";

export const MAX_REDIRECTS = 10;

const PROFILE_HEADERS: Readonly<Record<HttpProfile, Readonly<Record<string, string>>>> = {
  // Browser-like headers get past gateways answering 406 Not Acceptable.
  browser: {
    "User-Agent":
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
    Connection: "keep-alive",
    "Upgrade-Insecure-Requests": "1",
  },
  // Edge challenges that block browser user agents still let curl through.
  minimal: {
    "User-Agent": "curl/8.7.1",
  },
};

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export type HttpClientOptions = {
  readonly profile: HttpProfile;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
};

export type DownloadedBody = {
  readonly bytes: Uint8Array;
  readonly contentType: string;
};

export function profileHeaders(profile: HttpProfile): Readonly<Record<string, string>> {
  return PROFILE_HEADERS[profile];
}

/**
 * Thin wrapper over the global `fetch` that applies one header profile to
 * every request, follows redirects itself so the hop count is bounded, and
 * classifies failures.
 */
export class HttpClient {
  readonly profile: HttpProfile;
  private readonly timeoutMs: number | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: HttpClientOptions) {
    this.profile = options.profile;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  /**
   * Issues the request and follows up to {@link MAX_REDIRECTS} redirects.
   * The final response is returned whatever its status.
   */
  async request(method: "GET" | "HEAD", url: string, signal: AbortSignal): Promise<Response> {
    const requestSignal =
      this.timeoutMs === undefined
        ? signal
        : AbortSignal.any([signal, AbortSignal.timeout(this.timeoutMs)]);

    let currentUrl = url;
    let currentMethod = method;

    for (let hop = 0; ; hop++) {
      const response = await fetch(currentUrl, {
        method: currentMethod,
        headers: { ...PROFILE_HEADERS[this.profile] },
        redirect: "manual",
        signal: requestSignal,
      });

      const location = response.headers.get("location");
      if (!REDIRECT_STATUSES.has(response.status) || location === null) {
        return response;
      }

      await response.body?.cancel();

      if (hop >= MAX_REDIRECTS) {
        throw new TooManyRedirectsError(url, MAX_REDIRECTS);
      }

      const nextUrl = new URL(location, currentUrl).toString();
      this.logger?.debug({ from: currentUrl, to: nextUrl, status: response.status }, "following redirect");
      if (response.status === 303 && currentMethod !== "HEAD") {
        currentMethod = "GET";
      }
      currentUrl = nextUrl;
    }
  }

  /**
   * GETs `url` and returns the body text. Non-200 responses raise
   * {@link UnexpectedStatusError}; empty bodies and bare "Not Acceptable"
   * bodies raise {@link SoftError}.
   */
  async getText(url: string, signal: AbortSignal): Promise<string> {
    const response = await this.request("GET", url, signal);

    if (response.status !== 200) {
      await response.body?.cancel();
      throw new UnexpectedStatusError(url, response.status);
    }

    const body = await response.text();
    const trimmed = body.trim();
    if (trimmed === "") {
      throw new SoftError(url, "empty body");
    }
    if (trimmed === "Not Acceptable") {
      throw new SoftError(url, "Not Acceptable");
    }

    return body;
  }

  /**
   * GETs `url` and returns the raw body with its content type, for
   * documents that are not HTML. Non-200 responses raise
   * {@link UnexpectedStatusError}; empty bodies raise {@link SoftError}.
   */
  async getBytes(url: string, signal: AbortSignal): Promise<DownloadedBody> {
    const response = await this.request("GET", url, signal);

    if (response.status !== 200) {
      await response.body?.cancel();
      throw new UnexpectedStatusError(url, response.status);
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new SoftError(url, "empty body");
    }

    return { bytes, contentType: response.headers.get("content-type") ?? "" };
  }

  /**
   * HEADs `url` and returns the final status code.
   */
  async head(url: string, signal: AbortSignal): Promise<number> {
    const response = await this.request("HEAD", url, signal);
    await response.body?.cancel();
    return response.status;
  }
}
