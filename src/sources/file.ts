import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import type { URLRef } from "../domain/types";
import { EmptyFileError, SourceError, errorMessage } from "../errors";
import type { Fetcher } from "../pipeline/types";

/**
 * One URL per line. Blank lines and `#` comments are skipped; surrounding
 * whitespace and trailing commas are stripped.
 */
export function parseUrlLines(text: string): Array<URLRef> {
  const refs: Array<URLRef> = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) continue;

    const location = line.replace(/[,\s]+$/, "");
    if (location !== "") refs.push({ location });
  }

  return refs;
}

export type FileSourceOptions = {
  readonly logger: Logger;
};

/**
 * Treats the URL it is given as a local file path and reads URLs from it.
 */
export function fileSource(options: FileSourceOptions): Fetcher {
  const { logger } = options;

  return {
    fetch: async (signal, path) => {
      let text: string;
      try {
        text = await readFile(path, { encoding: "utf8", signal });
      } catch (err) {
        throw new SourceError(`failed to read url file ${path}: ${errorMessage(err)}`, { cause: err });
      }

      const refs = parseUrlLines(text);
      if (refs.length === 0) {
        throw new EmptyFileError(`no urls found in file ${path}`);
      }

      logger.info({ path, count: refs.length }, "url file read");
      return refs;
    },
  };
}
