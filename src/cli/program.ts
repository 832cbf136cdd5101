import { Command, Option } from "commander";
import { EXTRACTOR_NAMES } from "../sites";
import { HTTP_PROFILES, parseLimit, parseProfile } from "./args";
import type {
  CommandHandlers,
  ConfigOptions,
  ExtractOptions,
  RunOptions,
  SourceKind,
  TranscriptOptions,
} from "./commands";

const SOURCE_COMMANDS: ReadonlyArray<{ readonly kind: SourceKind; readonly target: string; readonly summary: string }> = [
  { kind: "sitemap", target: "<url>", summary: "ingest every article listed in an XML sitemap or sitemap index" },
  { kind: "rss", target: "<url>", summary: "ingest every article linked from an RSS or Atom feed" },
  { kind: "file", target: "<path>", summary: "ingest the URLs listed one per line in a local file" },
];

export const URL_FETCHER_WORKERS_HELP = "ignored; sources run on one worker";

function withConfigOption(command: Command): Command {
  return command.option("--config <path>", "YAML configuration file (defaults to CONFIG_PATH)");
}

function withProfileOption(command: Command): Command {
  return command.addOption(
    new Option("--profile <profile>", `HTTP header profile (${HTTP_PROFILES.join(", ")})`).argParser(parseProfile),
  );
}

function withRunOptions(command: Command): Command {
  return withProfileOption(
    withConfigOption(command)
      .option("--url-filter <path>", "only keep URLs containing this path segment")
      .option("--refetch", "fetch URLs that are already in the document store"),
  );
}

export function createProgram(handlers: CommandHandlers): Command {
  const program = new Command()
    .name("article-harvester")
    .description("Staged, worker-pooled ingestion of web articles into a local document store");

  for (const { kind, target, summary } of SOURCE_COMMANDS) {
    withRunOptions(
      program
        .command(kind)
        .description(summary)
        .argument(target)
        .argument("[urlFetcherWorkers]", URL_FETCHER_WORKERS_HELP)
        .argument("[contentWorkers]", "workers for the article sink"),
    ).action(
      async (
        location: string,
        urlFetcherWorkers: string | undefined,
        contentWorkers: string | undefined,
        options: RunOptions,
      ) => {
        await handlers.source(kind, location, { urlFetcherWorkers, contentWorkers }, options);
      },
    );
  }

  withRunOptions(
    program
      .command("paginate")
      .description("walk numbered listing pages and ingest the articles they link to")
      .argument("<baseUrl>", "site root, e.g. https://example.com")
      .argument("<pattern>", "page path containing %d, e.g. /page/%d/")
      .argument("[extractor]", `listing extractor (${EXTRACTOR_NAMES.join(", ")}); detected from the host when omitted`)
      .argument("[pageGenWorkers]", "workers for the page range generator")
      .argument("[htmlFetcherWorkers]", "workers fetching listing pages")
      .argument("[contentWorkers]", "workers for the article sink"),
  ).action(
    async (
      baseUrl: string,
      pattern: string,
      extractor: string | undefined,
      pageGenWorkers: string | undefined,
      htmlFetcherWorkers: string | undefined,
      contentWorkers: string | undefined,
      options: RunOptions,
    ) => {
      await handlers.paginate(baseUrl, pattern, { extractor, pageGenWorkers, htmlFetcherWorkers, contentWorkers }, options);
    },
  );

  program
    .command("extract")
    .description("print the URLs a listing extractor finds in a saved HTML page")
    .argument("<htmlFile>")
    .argument("<extractor>", EXTRACTOR_NAMES.join(", "))
    .option("--page-url <url>", "URL the page was saved from, used to resolve relative links")
    .action(async (htmlFile: string, extractor: string, options: ExtractOptions) => {
      await handlers.extract(htmlFile, extractor, options);
    });

  withConfigOption(
    program.command("replicate").description("copy stored articles into the Postgres table named by POSTGRES_DSN"),
  ).action(async (options: ConfigOptions) => {
    await handlers.replicate(options);
  });

  withProfileOption(
    withConfigOption(
      program
        .command("transcripts")
        .description("store the episode pages a sitemap lists with the transcripts they link to")
        .argument("<sitemapUrl>")
        .argument("[workers]", "episodes processed at once")
        .option("--max <count>", "episodes to consider; 0 or less for all", parseLimit),
    ),
  ).action(async (sitemapUrl: string, workers: string | undefined, options: TranscriptOptions) => {
    await handlers.transcripts(sitemapUrl, workers, options);
  });

  return program;
}
