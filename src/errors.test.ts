import { describe, it, expect } from "vitest";
import {
  CancelledError,
  ExtractError,
  FetchError,
  HarvestError,
  SoftError,
  TitleNotFoundError,
  UnexpectedStatusError,
  errorKind,
  errorMessage,
} from "./errors";

describe("errors", () => {
  it("should carry kind, details and cause", () => {
    const cause = new Error("socket hang up");
    const err = new FetchError("failed to fetch https://example.com/a", {
      details: { url: "https://example.com/a" },
      cause,
    });

    expect(err).toBeInstanceOf(HarvestError);
    expect(err.kind).toBe("FetchError");
    expect(err.name).toBe("FetchError");
    expect(err.details).toEqual({ url: "https://example.com/a" });
    expect(err.cause).toBe(cause);
  });

  it("should default details to an empty object", () => {
    expect(new ExtractError("no text").details).toEqual({});
  });

  it("should format unexpected status messages", () => {
    const err = new UnexpectedStatusError("https://example.com/missing", 404);

    expect(err.message).toBe("unexpected status code 404 for https://example.com/missing");
    expect(err.status).toBe(404);
    expect(err.kind).toBe("UnexpectedStatus");
  });

  it("should describe soft errors with their reason", () => {
    const err = new SoftError("https://example.com/a", "empty body");

    expect(err.message).toBe(
      "server returned an error page or empty response for https://example.com/a: empty body",
    );
  });

  it("should keep the partial results of a cancelled producer", () => {
    const err = new CancelledError("pagination cancelled", ["https://example.com/page/1"]);

    expect(err.kind).toBe("Cancelled");
    expect(err.partial).toEqual(["https://example.com/page/1"]);
    expect(new CancelledError("stop").partial).toEqual([]);
  });

  it("should use a fixed message for missing titles", () => {
    expect(new TitleNotFoundError().message).toBe("title not found in HTML");
  });

  describe("errorMessage", () => {
    it("should return the message of an Error", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
    });

    it("should stringify anything else", () => {
      expect(errorMessage("plain string")).toBe("plain string");
      expect(errorMessage(42)).toBe("42");
    });
  });

  describe("errorKind", () => {
    it("should keep the kind of a harvest error", () => {
      expect(errorKind(new SoftError("https://example.com", "empty body"), "ExtractError")).toBe("SoftError");
    });

    it("should fall back for foreign errors", () => {
      expect(errorKind(new TypeError("bad"), "ExtractError")).toBe("ExtractError");
    });
  });
});
