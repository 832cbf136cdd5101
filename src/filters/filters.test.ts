import { describe, it, expect } from "vitest";
import { alreadyPersistedFilter, baseUrlFilter, containsPathFilter } from "./filters";

const signal = new AbortController().signal;

describe("baseUrlFilter", () => {
  const filter = baseUrlFilter();

  it.each([
    ["https://ex.com", false],
    ["https://ex.com/", false],
    ["https://ex.com//", false],
    ["https://ex.com/?page=2", false],
    ["https://ex.com/post", true],
    ["https://ex.com/blog/post/", true],
  ])("should decide %s -> %s", (url, expected) => {
    expect(filter.shouldKeep(signal, url)).toBe(expected);
  });

  it("should keep URLs it cannot parse", () => {
    expect(filter.shouldKeep(signal, "not a url")).toBe(true);
  });
});

describe("alreadyPersistedFilter", () => {
  it("should drop URLs in the known set", () => {
    const filter = alreadyPersistedFilter(new Set(["https://ex.com/a1"]));

    expect(filter.shouldKeep(signal, "https://ex.com/a1")).toBe(false);
    expect(filter.shouldKeep(signal, "https://ex.com/a2")).toBe(true);
  });

  it("should match on the exact string", () => {
    const filter = alreadyPersistedFilter(new Set(["https://ex.com/a1"]));

    expect(filter.shouldKeep(signal, "https://ex.com/a1/")).toBe(true);
  });
});

describe("containsPathFilter", () => {
  it("should keep only URLs containing the segment", () => {
    const filter = containsPathFilter("/blog");

    expect(filter.shouldKeep(signal, "https://ex.com/blog/post")).toBe(true);
    expect(filter.shouldKeep(signal, "https://ex.com/news/post")).toBe(false);
    expect(filter.name).toBe("contains-path(/blog)");
  });
});
