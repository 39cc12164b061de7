#!/usr/bin/env node
/**
 * Download a web novel and bind all of its chapters into one document
 *
 * Usage: npm run download -- <home-url> [options]
 * Example: npm run download -- https://www.example.com/my-novel/ --output my-novel.html
 */

import * as path from "node:path";
import { assembleMarkdown, assembleNovel, chapterHeading } from "./assemble.js";
import { type CrawlOptions, crawlListingPages, fetchChapters } from "./crawl.js";
import { formatError, ScraperError } from "./errors.js";
import { createFetcher, DEFAULT_TIMEOUT } from "./http.js";
import { discardPendingWrites, writeDocument } from "./output.js";
import type { OutputFormat } from "./types.js";
import {
  deriveNovelSlug,
  formatDuration,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasHelpFlag,
  isMainModule,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

const OUTPUT_DIR = "output";

const DEFAULT_FORMAT: OutputFormat = "html";
const DEFAULT_LANG = "en";
const DEFAULT_REQUEST_DELAY = 500; // Between requests (+ random 0-500ms)
const DEFAULT_CONCURRENCY = 1;

const OUTPUT_FORMATS: readonly OutputFormat[] = ["html", "md"];

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ["--output", "-o", "--title", "--format", "--lang", "--delay", "--timeout", "--concurrency"];

/** Configuration options for a download run */
export interface DownloadOptions {
  /** Novel home page, the first listing page */
  homeUrl: string;
  /** Explicit output file, or null for the default under output/ */
  outputPath: string | null;
  /** Explicit document title, or null to use the one on the home page */
  title: string | null;
  format: string;
  lang: string;
  /** Delay between requests (ms) */
  requestDelay: number;
  /** Per-request timeout (ms) */
  timeout: number;
  concurrency: number;
  showHelp: boolean;
}

/**
 * Print usage information.
 */
function showUsage(log: (message: string) => void = console.log): void {
  log("Usage: npm run download -- <home-url> [options]");
  log("");
  log("Download every chapter of a novel and bind them into one HTML file.");
  log("");
  log("Options:");
  log("  --output, -o <path>  Output file (default: output/<novel>.html)");
  log("  --title <text>       Document title (default: title from the home page)");
  log("  --format <html|md>   Output format (default: html)");
  log(`  --lang <code>        Document language (default: ${DEFAULT_LANG})`);
  log(`  --delay <ms>         Delay between requests (default: ${DEFAULT_REQUEST_DELAY})`);
  log(`  --timeout <ms>       Per-request timeout (default: ${DEFAULT_TIMEOUT})`);
  log(`  --concurrency <n>    Parallel chapter downloads (default: ${DEFAULT_CONCURRENCY})`);
  log("  --help, -h           Show this help message");
  log("");
  log("Example:");
  log("  npm run download -- https://www.example.com/my-novel/ --delay 1000");
}

/**
 * Parse command line arguments.
 *
 * @param args - Command line arguments (defaults to process.argv)
 */
export function parseArgs(args: string[] = process.argv.slice(2)): DownloadOptions {
  return {
    homeUrl: getPositionalArg(args, VALUE_FLAGS),
    outputPath: getNullableStringArg(args, ["--output", "-o"]),
    title: getNullableStringArg(args, "--title"),
    format: getStringArg(args, "--format", DEFAULT_FORMAT),
    lang: getStringArg(args, "--lang", DEFAULT_LANG),
    requestDelay: getNumberArg(args, "--delay", DEFAULT_REQUEST_DELAY),
    timeout: getNumberArg(args, "--timeout", DEFAULT_TIMEOUT),
    concurrency: getNumberArg(args, "--concurrency", DEFAULT_CONCURRENCY),
    showHelp: hasHelpFlag(args),
  };
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Default output file for a novel, named after its URL slug.
 *
 * @example
 * defaultOutputPath('https://www.example.com/my-novel/', 'html') // 'output/my-novel.html'
 */
export function defaultOutputPath(homeUrl: string, format: OutputFormat): string {
  return path.join(OUTPUT_DIR, `${deriveNovelSlug(homeUrl)}.${format}`);
}

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/**
 * Main entry point.
 * Walks the chapter index, downloads every chapter in order, and writes the
 * bound document. Nothing is written unless every chapter was downloaded.
 *
 * @throws Exits with code 1 on bad arguments, or the error's exit code on a failed download
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.homeUrl) {
    showUsage(console.error);
    process.exit(1);
  }

  const urlValidation = validateUrl(options.homeUrl);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    process.exit(1);
  }

  const format = options.format;
  if (!isOutputFormat(format)) {
    console.error(`Error: Unknown format "${format}" (expected ${OUTPUT_FORMATS.join(" or ")})`);
    process.exit(1);
  }

  if (options.concurrency < 1 || options.timeout < 1 || options.requestDelay < 0) {
    console.error("Error: --concurrency and --timeout must be positive, --delay must not be negative");
    process.exit(1);
  }

  const { homeUrl } = options;
  const started = Date.now();

  try {
    const crawlOptions: CrawlOptions = {
      fetchPage: createFetcher({ timeout: options.timeout }),
      requestDelay: options.requestDelay,
      concurrency: options.concurrency,
      onWarning: (message) => console.error(`Warning: ${message}`),
    };

    console.log(`Reading chapter index: ${homeUrl}`);
    const { novelTitle, pages } = await crawlListingPages(homeUrl, {
      ...crawlOptions,
      onListingPage: (page) => console.log(`  Page ${page.pageNumber}: ${page.chapterUrls.length} chapters`),
    });

    const chapterUrls = pages.flatMap((page) => page.chapterUrls);
    console.log(`Found ${chapterUrls.length} chapters on ${pages.length} page(s). Downloading...\n`);

    const chapters = await fetchChapters(chapterUrls, {
      ...crawlOptions,
      onChapter: (chapter, completed, total) => progressBar(completed, total, chapterHeading(chapter)),
    });

    const title = options.title ?? novelTitle ?? deriveNovelSlug(homeUrl);
    const document =
      format === "md"
        ? assembleMarkdown(chapters, { title })
        : assembleNovel(chapters, { title, lang: options.lang });

    const written = await writeDocument(options.outputPath ?? defaultOutputPath(homeUrl, format), document);
    const sizeKb = (written.bytes / 1024).toFixed(1);

    console.log(`\nSaved ${chapters.length} chapters to ${written.path} (${sizeKb} KB)`);
    console.log(`Completed in ${formatDuration(Date.now() - started)}`);
  } catch (error) {
    console.error(`\nError: ${formatError(error)}`);
    process.exit(error instanceof ScraperError ? error.exitCode : 1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule(import.meta.url)) {
  setupSignalHandlers("Download", discardPendingWrites);
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
