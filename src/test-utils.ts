/**
 * In-process stand-in for the novel site, shared by the tests
 */

import { vi } from "vitest";
import { NetworkError } from "./errors.js";
import type { PageFetcher } from "./http.js";

export const SITE = "https://novels.test";
export const HOME_URL = `${SITE}/my-novel/`;
export const PAGE_2_URL = `${SITE}/my-novel/?page=2`;

export interface ListingPageSpec {
  /** Chapter hrefs in list order */
  chapters: string[];
  /** href of the next-page anchor; omitted on the last page */
  next?: string;
  novelTitle?: string;
}

/**
 * Listing page markup: a "latest chapters" block above the paginated chapter list.
 */
export function listingPageHtml({ chapters, next, novelTitle = "My Novel" }: ListingPageSpec): string {
  const items = chapters
    .map((href, i) => `<li><a href="${href}" title="Chapter ${i + 1}"><span class="chapter-text">Chapter ${i + 1}</span></a></li>`)
    .join("");
  const pagination = next
    ? `<ul class="pagination"><li class="active"><a href="#">1</a></li><li class="next"><a href="${next}" data-page="2">&rsaquo;</a></li></ul>`
    : `<ul class="pagination"><li class="active"><a href="#">1</a></li></ul>`;

  return [
    "<html><head><title>Listing</title></head><body>",
    `<h3 class="title">${novelTitle}</h3>`,
    '<div class="l-chapter"><ul class="l-chapters"><li><a href="/my-novel-99.html"><span class="chapter-text">Latest</span></a></li></ul></div>',
    `<div id="list-chapter"><ul class="list-chapter">${items}</ul>${pagination}</div>`,
    "</body></html>",
  ].join("\n");
}

export interface ChapterPageSpec {
  title?: string;
  /** Inner HTML of the content region; omit to leave the region out */
  body?: string;
}

/**
 * Chapter page markup with navigation around the content region.
 */
export function chapterPageHtml({ title, body }: ChapterPageSpec): string {
  return [
    "<html><head><title>Chapter</title></head><body>",
    '<nav class="navbar"><a href="/">Home</a></nav>',
    title ? `<h2><a class="chapter-title" href="#">${title}</a></h2>` : "",
    '<div class="chapter-nav"><a href="/prev.html">Prev</a><a href="/next.html">Next</a></div>',
    body === undefined ? "" : `<div id="chapter-content">${body}</div>`,
    '<footer><a href="/contact">Contact</a></footer>',
    "</body></html>",
  ].join("\n");
}

/**
 * Page fetcher serving a fixed map of URL to HTML.
 * Unknown URLs fail like a 404 response.
 */
export function createFakeSite(pages: Record<string, string>): { fetchPage: PageFetcher; requested: string[] } {
  const requested: string[] = [];
  const fetchPage: PageFetcher = async (url) => {
    requested.push(url);
    const html = pages[url];
    if (html === undefined) {
      throw new NetworkError("HTTP 404 Not Found", url);
    }
    return html;
  };
  return { fetchPage, requested };
}

/**
 * Replace global fetch with one answering from a URL to HTML map.
 * A value that is an Error is thrown instead of answered.
 */
export function stubFetch(pages: Record<string, string | Error>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const page = pages[String(input)];
    if (page instanceof Error) throw page;
    if (page === undefined) return new Response("missing", { status: 404, statusText: "Not Found" });
    return new Response(page, { status: 200, headers: { "Content-Type": "text/html; charset=utf-8" } });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** A two-page novel: chapters 1 and 2 on the home page, chapter 3 on page 2 */
export function twoPageNovel(): Record<string, string> {
  return {
    [HOME_URL]: listingPageHtml({ chapters: ["/my-novel-1.html", "/my-novel-2.html"], next: "/my-novel/?page=2" }),
    [PAGE_2_URL]: listingPageHtml({ chapters: ["/my-novel-3.html"] }),
    [`${SITE}/my-novel-1.html`]: chapterPageHtml({ title: "CHAPTER 1: ARRIVAL", body: "<p>Alpha text.</p>" }),
    [`${SITE}/my-novel-2.html`]: chapterPageHtml({ title: "CHAPTER 2: DEPARTURE", body: "<p>Beta text.</p>" }),
    [`${SITE}/my-novel-3.html`]: chapterPageHtml({ title: "CHAPTER 3: RETURN", body: "<p>Gamma text.</p>" }),
  };
}
