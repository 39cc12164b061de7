/**
 * Bind downloaded chapters into a single document
 */

import TurndownService from "turndown";
import type { Chapter } from "./types.js";

export interface AssembleOptions {
  /** Novel title for <title> and the opening heading */
  title: string;
  /** Value of the <html lang> attribute */
  lang?: string;
}

/**
 * Stylesheet for small e-ink screens: plain black on white, serif body text,
 * no fixed widths, images scaled down to the screen.
 */
export const READER_STYLES = `body { margin: 0 auto; max-width: 40em; padding: 0.5em 1em; background: #fff; color: #000; font-family: Georgia, "Times New Roman", serif; font-size: 1.1em; line-height: 1.6; }
h1, h2 { font-weight: bold; line-height: 1.25; }
h1 { text-align: center; margin: 1em 0; }
h2 { margin: 2em 0 1em; }
p { margin: 0 0 1em; }
img { max-width: 100%; height: auto; }
hr { border: 0; border-top: 1px solid #000; margin: 2em 0; }`;

const markdownConverter = new TurndownService({
  headingStyle: "atx",
  hr: "---",
  codeBlockStyle: "fenced",
});

// Remove script/style elements from conversion
markdownConverter.remove(["script", "style", "noscript", "iframe"]);

/**
 * Escape text for use in HTML content and attribute values.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Heading shown above a chapter: its own title, or its position.
 */
export function chapterHeading(chapter: Chapter): string {
  return chapter.title ?? `Chapter ${chapter.index + 1}`;
}

/**
 * Render one chapter as a section with a heading and its unmodified body.
 *
 * @param total - Number of chapters in the novel, used to pad the section id
 *
 * @example
 * renderChapter({ index: 0, url, title: "Prologue", html: "<p>Hi</p>" }, 12)
 * // '<section class="chapter" id="chapter-01">\n<h2>Prologue</h2>\n<p>Hi</p>\n</section>'
 */
export function renderChapter(chapter: Chapter, total: number): string {
  const width = String(Math.max(total, 1)).length;
  const id = `chapter-${String(chapter.index + 1).padStart(width, "0")}`;
  return [
    `<section class="chapter" id="${id}">`,
    `<h2>${escapeHtml(chapterHeading(chapter))}</h2>`,
    chapter.html,
    "</section>",
  ].join("\n");
}

/**
 * Wrap fragments into one minimal HTML page, in input order and unmodified.
 */
export function assembleDocument(fragments: string[], options: AssembleOptions): string {
  const title = escapeHtml(options.title);
  const parts = [
    "<!DOCTYPE html>",
    `<html lang="${escapeHtml(options.lang ?? "en")}">`,
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${title}</title>`,
    "<style>",
    READER_STYLES,
    "</style>",
    "</head>",
    "<body>",
    `<h1>${title}</h1>`,
    ...fragments,
    "</body>",
    "</html>",
  ];
  return `${parts.join("\n")}\n`;
}

/**
 * Assemble chapters into the HTML document.
 */
export function assembleNovel(chapters: Chapter[], options: AssembleOptions): string {
  return assembleDocument(
    chapters.map((chapter) => renderChapter(chapter, chapters.length)),
    options,
  );
}

/**
 * Assemble chapters into a Markdown document, one `##` section per chapter.
 */
export function assembleMarkdown(chapters: Chapter[], options: AssembleOptions): string {
  const parts: string[] = [`# ${options.title}`];

  for (const chapter of chapters) {
    parts.push("---");
    parts.push(`## ${chapterHeading(chapter)}`);
    const body = markdownConverter.turndown(chapter.html);
    if (body) parts.push(body);
  }

  return `${parts.join("\n\n")}\n`;
}
