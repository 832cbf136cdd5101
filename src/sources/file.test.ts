import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { EmptyFileError, SourceError } from "../errors";
import { fileSource, parseUrlLines } from "./file";

const logger = pino({ level: "silent" });

describe("parseUrlLines", () => {
  it("should skip blanks and comments and strip trailing commas", () => {
    const text = [
      "# reading list",
      "https://ex.com/a,",
      "",
      "   https://ex.com/b  ",
      "https://ex.com/c , ",
      "  # indented comment",
      ",",
    ].join("\n");

    expect(parseUrlLines(text)).toEqual([
      { location: "https://ex.com/a" },
      { location: "https://ex.com/b" },
      { location: "https://ex.com/c" },
    ]);
  });

  it("should accept windows line endings", () => {
    expect(parseUrlLines("https://ex.com/a\r\nhttps://ex.com/b\r\n")).toEqual([
      { location: "https://ex.com/a" },
      { location: "https://ex.com/b" },
    ]);
  });
});

describe("fileSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "url-file-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should read urls from the file at the given path", async () => {
    const path = join(dir, "urls.txt");
    await writeFile(path, "https://ex.com/a\n# skip\nhttps://ex.com/b,\n");

    const refs = await fileSource({ logger }).fetch(new AbortController().signal, path);

    expect(refs).toEqual([{ location: "https://ex.com/a" }, { location: "https://ex.com/b" }]);
  });

  it("should fail with EmptyFile when only comments remain", async () => {
    const path = join(dir, "empty.txt");
    await writeFile(path, "# nothing here\n\n");

    await expect(fileSource({ logger }).fetch(new AbortController().signal, path)).rejects.toThrow(
      new EmptyFileError(`no urls found in file ${path}`),
    );
  });

  it("should report a missing file as a source error", async () => {
    await expect(
      fileSource({ logger }).fetch(new AbortController().signal, join(dir, "absent.txt")),
    ).rejects.toBeInstanceOf(SourceError);
  });
});
