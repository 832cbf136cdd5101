import { describe, it, expect, vi } from "vitest";
import type { Command } from "commander";
import { URL_FETCHER_WORKERS_HELP, createProgram } from "./program";
import type { CommandHandlers } from "./commands";

function setup() {
  const handlers = {
    source: vi.fn<CommandHandlers["source"]>().mockResolvedValue(undefined),
    paginate: vi.fn<CommandHandlers["paginate"]>().mockResolvedValue(undefined),
    extract: vi.fn<CommandHandlers["extract"]>().mockResolvedValue(undefined),
    replicate: vi.fn<CommandHandlers["replicate"]>().mockResolvedValue(undefined),
    transcripts: vi.fn<CommandHandlers["transcripts"]>().mockResolvedValue(undefined),
  };
  const program = createProgram(handlers);

  const quiet = (command: Command) => {
    command.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
  };
  quiet(program);
  program.commands.forEach(quiet);

  const parse = (...args: Array<string>) => program.parseAsync(args, { from: "user" });
  return { handlers, program, parse };
}

describe("createProgram", () => {
  it("should pass source arguments and run options to the handler", async () => {
    const { handlers, parse } = setup();

    await parse(
      "sitemap",
      "https://example.com/sitemap.xml",
      "4",
      "--url-filter",
      "/blog/",
      "--refetch",
      "--profile",
      "browser",
    );

    expect(handlers.source).toHaveBeenCalledWith(
      "sitemap",
      "https://example.com/sitemap.xml",
      { urlFetcherWorkers: "4", contentWorkers: undefined },
      { urlFilter: "/blog/", refetch: true, profile: "browser" },
    );
  });

  it("should route rss and file commands to the source handler", async () => {
    const { handlers, parse } = setup();

    await parse("rss", "https://example.com/feed.xml");
    await parse("file", "./urls.txt", "1", "2");

    expect(handlers.source).toHaveBeenNthCalledWith(
      1,
      "rss",
      "https://example.com/feed.xml",
      { urlFetcherWorkers: undefined, contentWorkers: undefined },
      {},
    );
    expect(handlers.source).toHaveBeenNthCalledWith(
      2,
      "file",
      "./urls.txt",
      { urlFetcherWorkers: "1", contentWorkers: "2" },
      {},
    );
  });

  it("should pass every paginate argument in order", async () => {
    const { handlers, parse } = setup();

    await parse("paginate", "https://example.com", "/page/%d/", "generic", "1", "2", "6", "--config", "harvest.yaml");

    expect(handlers.paginate).toHaveBeenCalledWith(
      "https://example.com",
      "/page/%d/",
      { extractor: "generic", pageGenWorkers: "1", htmlFetcherWorkers: "2", contentWorkers: "6" },
      { config: "harvest.yaml" },
    );
  });

  it("should leave the paginate extractor undefined when omitted", async () => {
    const { handlers, parse } = setup();

    await parse("paginate", "https://example.com", "/page/%d/");

    expect(handlers.paginate).toHaveBeenCalledWith(
      "https://example.com",
      "/page/%d/",
      { extractor: undefined, pageGenWorkers: undefined, htmlFetcherWorkers: undefined, contentWorkers: undefined },
      {},
    );
  });

  it("should pass the extract arguments and page url", async () => {
    const { handlers, parse } = setup();

    await parse("extract", "listing.html", "se-radio", "--page-url", "https://se-radio.net/page/2/");

    expect(handlers.extract).toHaveBeenCalledWith("listing.html", "se-radio", {
      pageUrl: "https://se-radio.net/page/2/",
    });
  });

  it("should run replicate with its config option", async () => {
    const { handlers, parse } = setup();

    await parse("replicate", "--config", "harvest.yaml");

    expect(handlers.replicate).toHaveBeenCalledWith({ config: "harvest.yaml" });
  });

  it("should pass the transcript sitemap, workers and episode cap", async () => {
    const { handlers, parse } = setup();

    await parse("transcripts", "https://pod.example/sitemap.xml", "8", "--max", "0", "--profile", "browser");

    expect(handlers.transcripts).toHaveBeenCalledWith("https://pod.example/sitemap.xml", "8", {
      max: 0,
      profile: "browser",
    });
  });

  it("should reject a non-integer episode cap", async () => {
    const { handlers, parse } = setup();

    await expect(parse("transcripts", "https://pod.example/sitemap.xml", "--max", "lots")).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
    expect(handlers.transcripts).not.toHaveBeenCalled();
  });

  it("should reject an unknown http profile", async () => {
    const { handlers, parse } = setup();

    await expect(parse("rss", "https://example.com/feed.xml", "--profile", "curl")).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
    expect(handlers.source).not.toHaveBeenCalled();
  });

  it("should reject a missing required argument", async () => {
    const { handlers, parse } = setup();

    await expect(parse("paginate", "https://example.com")).rejects.toMatchObject({
      code: "commander.missingArgument",
    });
    expect(handlers.paginate).not.toHaveBeenCalled();
  });

  it("should say in the help that source commands ignore the url fetcher worker count", () => {
    const { program } = setup();

    for (const name of ["sitemap", "rss", "file"]) {
      const command = program.commands.find((candidate) => candidate.name() === name);
      expect(command?.helpInformation()).toContain(URL_FETCHER_WORKERS_HELP);
    }
  });
});
