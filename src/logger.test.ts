import { describe, it, expect, afterEach } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  const original = process.env["LOG_LEVEL"];

  afterEach(() => {
    if (original === undefined) {
      delete process.env["LOG_LEVEL"];
    } else {
      process.env["LOG_LEVEL"] = original;
    }
  });

  it("should default to info when LOG_LEVEL is unset", () => {
    delete process.env["LOG_LEVEL"];
    expect(createLogger().level).toBe("info");
  });

  it("should read the level from LOG_LEVEL", () => {
    process.env["LOG_LEVEL"] = "debug";
    expect(createLogger().level).toBe("debug");
  });

  it("should prefer an explicit level over LOG_LEVEL", () => {
    process.env["LOG_LEVEL"] = "debug";
    expect(createLogger("warn").level).toBe("warn");
  });
});
