#!/usr/bin/env node
import { writeFile } from "fs/promises";
import { Command } from "commander";
import { runCrawl, runMonitoringCheck, CrawlValidationError } from "./audit";
import { errorMessage } from "./audit/errors";
import { loadBaseline } from "./baseline";
import { loadCliDefaults } from "./config";
import { createLogger } from "./logger";
import { MemoryCrawlStore } from "./store";

interface CrawlCommandOptions {
  maxPages: number;
  concurrency: number;
  timeoutMs: number;
  userAgent: string;
  delayMs: number;
  maxDepth?: number;
  retries: number;
  robots: boolean;
  followExternal: boolean;
  followNofollow: boolean;
  allowPrivateNetworks: boolean;
  pages: boolean;
  out?: string;
  maxDuration?: number;
}

interface MonitorCommandOptions {
  limit: number;
  concurrency: number;
  timeoutMs: number;
  userAgent: string;
}

function toInt(value: string): number {
  return parseInt(value, 10);
}

function printError(error: unknown): void {
  const problems = error instanceof CrawlValidationError ? error.problems : undefined;
  console.error(
    JSON.stringify(
      {
        error: true,
        message: errorMessage(error) || "Unknown error occurred",
        ...(problems ? { problems } : {}),
      },
      null,
      2
    )
  );
}

const defaults = loadCliDefaults();
const logger = createLogger({ level: defaults.logLevel, pretty: defaults.logPretty });

const program = new Command();

program.name("site-audit").description("Crawl a site and audit its on-page SEO signals").version("1.0.0");

program
  .command("crawl")
  .description("Crawl a site from a seed URL and print the audit summary")
  .argument("<url>", "Seed URL of the site to crawl")
  .option("--maxPages <number>", "Maximum number of pages to crawl", toInt, defaults.maxPages)
  .option("--concurrency <number>", "Number of concurrent fetches", toInt, defaults.maxConcurrentFetches)
  .option("--timeoutMs <number>", "Request timeout in milliseconds", toInt, defaults.timeoutMs)
  .option("--userAgent <string>", "User agent string", defaults.userAgent)
  .option("--delayMs <number>", "Minimum gap between requests to one host", toInt, defaults.requestDelayMs)
  .option("--maxDepth <number>", "Maximum link depth from the seed", toInt)
  .option("--retries <number>", "Extra attempts for transient fetch failures", toInt, 1)
  .option("--no-robots", "Ignore robots.txt")
  .option("--followExternal", "Fetch pages on other hosts (without following their links)", false)
  .option("--followNofollow", "Follow nofollow links and pages", false)
  .option("--allowPrivateNetworks", "Allow requests to private and loopback addresses", false)
  .option("--pages", "Include page records in the output", false)
  .option("--out <file>", "Write the run, pages and summary to a JSON file")
  .option("--maxDuration <ms>", "Cancel the crawl after this many milliseconds", toInt)
  .action(async (url: string, options: CrawlCommandOptions) => {
    const store = new MemoryCrawlStore();

    try {
      const handle = runCrawl(
        {
          url,
          maxPages: options.maxPages,
          maxConcurrentFetches: options.concurrency,
          timeoutMs: options.timeoutMs,
          userAgent: options.userAgent,
          requestDelayMs: options.delayMs,
          maxDepth: options.maxDepth,
          retries: options.retries,
          respectRobots: options.robots,
          followExternal: options.followExternal,
          followNofollow: options.followNofollow,
          blockPrivateNetworks: !options.allowPrivateNetworks,
        },
        { sink: store, notifier: store, logger }
      );

      const onSignal = () => handle.cancel("interrupted");
      process.once("SIGINT", onSignal);
      const timer =
        options.maxDuration !== undefined
          ? setTimeout(() => handle.cancel("max duration exceeded"), options.maxDuration)
          : undefined;

      const outcome = await handle.done;
      clearTimeout(timer);
      process.removeListener("SIGINT", onSignal);

      if (options.out) {
        await writeFile(options.out, JSON.stringify(outcome, null, 2));
        logger.info({ file: options.out }, "Wrote crawl results");
      }

      console.log(
        JSON.stringify(
          {
            run: outcome.run,
            summary: outcome.summary,
            ...(options.pages ? { pages: await store.getPages(outcome.run.id) } : {}),
          },
          null,
          2
        )
      );

      process.exitCode = outcome.run.status === "completed" ? 0 : 1;
    } catch (error) {
      printError(error);
      process.exitCode = 1;
    }
  });

program
  .command("monitor")
  .description("Re-fetch the best pages of a saved crawl and report what changed")
  .argument("<baselineFile>", "JSON file written by `crawl --out`")
  .option("--limit <number>", "Number of pages to check", toInt, 10)
  .option("--concurrency <number>", "Number of concurrent fetches", toInt, defaults.maxConcurrentFetches)
  .option("--timeoutMs <number>", "Request timeout in milliseconds", toInt, defaults.timeoutMs)
  .option("--userAgent <string>", "User agent string", defaults.userAgent)
  .action(async (baselineFile: string, options: MonitorCommandOptions) => {
    try {
      const baseline = await loadBaseline(baselineFile);
      const check = await runMonitoringCheck(baseline, {
        logger,
        limit: options.limit,
        concurrency: options.concurrency,
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent,
      });

      console.log(JSON.stringify(check, null, 2));
    } catch (error) {
      printError(error);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  printError(error);
  process.exitCode = 1;
});
