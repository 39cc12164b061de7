/**
 * Shared type definitions for the novel downloader
 */

/** A fetched HTML page together with the URL it was requested from */
export interface FetchedPage {
  url: string;
  html: string;
}

/** One page of the paginated chapter index */
export interface ListingPage {
  /** 1-based position in the listing walk */
  pageNumber: number;
  url: string;
  /** Absolute chapter URLs in document order */
  chapterUrls: string[];
  /** Absolute URL of the following listing page, or null on the last page */
  nextPageUrl: string | null;
}

/** Result of walking every listing page of a novel */
export interface ListingCrawl {
  /** Title read from the home page, if the page carries one */
  novelTitle: string | null;
  pages: ListingPage[];
}

/** What a page extractor pulls out of a chapter page */
export interface ChapterContent {
  title: string | null;
  /** Inner HTML of the content region, furniture removed */
  html: string;
}

/** A downloaded chapter, positioned in reading order */
export interface Chapter extends ChapterContent {
  /** Zero-based reading position */
  index: number;
  url: string;
}

/** Output formats the document can be written in */
export type OutputFormat = "html" | "md";
