/**
 * Site-specific page extraction
 *
 * Everything that depends on the target site's markup lives behind the
 * PageExtractor interface; the crawler only sees URLs and HTML fragments.
 */

import * as cheerio from "cheerio";
import { ParseError } from "./errors.js";
import type { ChapterContent, FetchedPage } from "./types.js";
import { resolveUrl, toTitleCase } from "./utils.js";

export interface PageExtractor {
  /** Chapter URLs listed on a listing page, in document order */
  extractChapterLinks(page: FetchedPage): string[];
  /** URL of the next listing page, or null on the last one */
  extractNextPageLink(page: FetchedPage): string | null;
  /** Title and reading body of a chapter page */
  extractChapter(page: FetchedPage): ChapterContent;
  /** Novel title shown on the home page */
  extractNovelTitle(page: FetchedPage): string | null;
}

/** CSS selectors describing one site's page layout */
export interface SiteProfile {
  name: string;
  /** Anchors of the chapter list on a listing page */
  chapterLinkSelector: string;
  /** Anchor pointing at the next listing page */
  nextPageSelector: string;
  /** Element holding the chapter's reading text */
  contentSelector: string;
  chapterTitleSelector: string;
  novelTitleSelector: string;
  /** Elements removed from inside the content region */
  furnitureSelectors: string[];
  /** Re-case chapter titles published in capitals */
  titleCaseChapterTitles: boolean;
}

export const DEFAULT_SITE_PROFILE: SiteProfile = {
  name: "novel-listing",
  // The home page also shows a "latest chapters" block; only the paginated list counts
  chapterLinkSelector: "#list-chapter ul.list-chapter li a[href]",
  nextPageSelector: "ul.pagination li.next:not(.disabled) a[href]",
  contentSelector: "#chapter-content",
  chapterTitleSelector: ".chapter-title",
  novelTitleSelector: "h3.title",
  furnitureSelectors: ["script", "style", "noscript", "iframe", "ins", ".ads", ".chapter-nav"],
  titleCaseChapterTitles: true,
};

/**
 * Build a PageExtractor from a site profile.
 */
export function createSelectorExtractor(profile: SiteProfile = DEFAULT_SITE_PROFILE): PageExtractor {
  return {
    extractChapterLinks(page) {
      const $ = cheerio.load(page.html);
      const links: string[] = [];

      $(profile.chapterLinkSelector).each((_, anchor) => {
        const url = resolveUrl($(anchor).attr("href") ?? "", page.url);
        if (url) links.push(url);
      });

      if (links.length === 0) {
        throw new ParseError(`No chapter links found (selector "${profile.chapterLinkSelector}")`, page.url);
      }
      return links;
    },

    extractNextPageLink(page) {
      const $ = cheerio.load(page.html);
      const href = $(profile.nextPageSelector).first().attr("href");
      if (!href) return null;

      const url = resolveUrl(href, page.url);
      return url === page.url ? null : url;
    },

    extractChapter(page) {
      const $ = cheerio.load(page.html);
      const region = $(profile.contentSelector).first();

      if (region.length === 0) {
        throw new ParseError(`Content region not found (selector "${profile.contentSelector}")`, page.url);
      }

      if (profile.furnitureSelectors.length > 0) {
        region.find(profile.furnitureSelectors.join(", ")).remove();
      }

      const rawTitle = $(profile.chapterTitleSelector).first().text().replace(/\s+/g, " ").trim();
      const title = rawTitle ? (profile.titleCaseChapterTitles ? toTitleCase(rawTitle) : rawTitle) : null;

      return { title, html: (region.html() ?? "").trim() };
    },

    extractNovelTitle(page) {
      const $ = cheerio.load(page.html);
      const heading = $(profile.novelTitleSelector).first().text().replace(/\s+/g, " ").trim();
      if (heading) return heading;

      const ogTitle = $('meta[property="og:title"]').attr("content")?.trim();
      return ogTitle || null;
    },
  };
}
