/**
 * Crawl a novel's paginated chapter index and download its chapters
 *
 * Listing pages form a linked list: each one names the next, and the walk
 * ends at the first page without a next link. Chapters are fetched one at a
 * time by default; with a higher concurrency every fetch carries its reading
 * position and lands in that slot, whatever order the responses arrive in.
 */

import PQueue from "p-queue";
import { NetworkError, ScraperError } from "./errors.js";
import { createSelectorExtractor, type PageExtractor } from "./extractor.js";
import { createFetcher, type PageFetcher } from "./http.js";
import type { Chapter, FetchedPage, ListingCrawl, ListingPage } from "./types.js";
import { delay, resolveUrl } from "./utils.js";

/** Extra random wait added to the request delay (ms) */
const DELAY_JITTER = 500;

export interface CrawlOptions {
  /** Site extractor (default: the built-in site profile) */
  extractor?: PageExtractor;
  /** Page fetcher (default: plain HTTP GET) */
  fetchPage?: PageFetcher;
  /** Wait between successive requests (ms); 0 disables the wait and its jitter */
  requestDelay?: number;
  /** Number of chapter fetches in flight at once */
  concurrency?: number;
  onListingPage?: (page: ListingPage) => void;
  onChapter?: (chapter: Chapter, completed: number, total: number) => void;
  onWarning?: (message: string) => void;
}

async function politeDelay(ms: number): Promise<void> {
  if (ms <= 0) return;
  await delay(ms + Math.random() * DELAY_JITTER);
}

async function loadPage(url: string, fetchPage: PageFetcher): Promise<FetchedPage> {
  try {
    return { url, html: await fetchPage(url) };
  } catch (error) {
    if (error instanceof ScraperError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`Request failed: ${message}`, url, { cause: error });
  }
}

/**
 * Walk every listing page starting at the novel's home page.
 * The novel title is read from the first page.
 *
 * @throws {NetworkError} If a listing page cannot be fetched
 * @throws {ParseError} If a listing page has no chapter links
 */
export async function crawlListingPages(homeUrl: string, options: CrawlOptions = {}): Promise<ListingCrawl> {
  const extractor = options.extractor ?? createSelectorExtractor();
  const fetchPage = options.fetchPage ?? createFetcher();

  const pages: ListingPage[] = [];
  const visited = new Set<string>();
  let novelTitle: string | null = null;
  // Same form as the extractor's next links, so the loop check compares like with like
  let currentUrl: string | null = resolveUrl(homeUrl, homeUrl) ?? homeUrl;

  while (currentUrl) {
    if (pages.length > 0) {
      await politeDelay(options.requestDelay ?? 0);
    }

    const page = await loadPage(currentUrl, fetchPage);
    visited.add(currentUrl);

    if (pages.length === 0) {
      novelTitle = extractor.extractNovelTitle(page);
    }

    const listing: ListingPage = {
      pageNumber: pages.length + 1,
      url: currentUrl,
      chapterUrls: extractor.extractChapterLinks(page),
      nextPageUrl: extractor.extractNextPageLink(page),
    };
    pages.push(listing);
    options.onListingPage?.(listing);

    const nextUrl = listing.nextPageUrl;
    if (nextUrl && visited.has(nextUrl)) {
      options.onWarning?.(`Listing page ${listing.pageNumber} links back to ${nextUrl}, stopping there`);
      currentUrl = null;
    } else {
      currentUrl = nextUrl;
    }
  }

  return { novelTitle, pages };
}

/**
 * Collect every chapter URL of a novel in reading order.
 */
export async function discoverChapterUrls(homeUrl: string, options: CrawlOptions = {}): Promise<string[]> {
  const { pages } = await crawlListingPages(homeUrl, options);
  return pages.flatMap((page) => page.chapterUrls);
}

/**
 * Fetch one chapter page and extract its title and reading body.
 *
 * @throws {NetworkError} If the page cannot be fetched
 * @throws {ParseError} If the page has no content region
 */
export async function fetchChapterContent(url: string, index: number, options: CrawlOptions = {}): Promise<Chapter> {
  const extractor = options.extractor ?? createSelectorExtractor();
  const fetchPage = options.fetchPage ?? createFetcher();

  const page = await loadPage(url, fetchPage);
  const { title, html } = extractor.extractChapter(page);
  return { index, url, title, html };
}

/**
 * Fetch all chapters, returning them in the order of `urls`.
 * The first failure rejects the whole download and drops queued fetches.
 */
export async function fetchChapters(urls: string[], options: CrawlOptions = {}): Promise<Chapter[]> {
  const chapterOptions: CrawlOptions = {
    ...options,
    extractor: options.extractor ?? createSelectorExtractor(),
    fetchPage: options.fetchPage ?? createFetcher(),
  };
  const queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? 1) });
  const slots: Array<Chapter | undefined> = urls.map(() => undefined);
  let completed = 0;
  // The queue can start the next task before Promise.all below sees the rejection
  let failed = false;

  const tasks = urls.map((url, index) =>
    queue.add(async () => {
      if (failed) return;
      if (index > 0) {
        await politeDelay(options.requestDelay ?? 0);
        if (failed) return;
      }

      let chapter: Chapter;
      try {
        chapter = await fetchChapterContent(url, index, chapterOptions);
      } catch (error) {
        failed = true;
        throw error;
      }

      slots[index] = chapter;
      completed++;
      options.onChapter?.(chapter, completed, urls.length);
    }),
  );

  try {
    await Promise.all(tasks);
  } catch (error) {
    queue.clear();
    throw error;
  }

  return slots.map((chapter, index) => {
    if (!chapter) {
      throw new Error(`Chapter ${index + 1} finished without a result`);
    }
    return chapter;
  });
}
