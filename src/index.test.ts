import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { defaultOutputPath, isOutputFormat, main, parseArgs, progressBar } from "./index.js";
import { chapterPageHtml, HOME_URL, PAGE_2_URL, SITE, stubFetch, twoPageNovel } from "./test-utils.js";

describe("parseArgs", () => {
  it("returns defaults when no args provided", () => {
    expect(parseArgs([])).toEqual({
      homeUrl: "",
      outputPath: null,
      title: null,
      format: "html",
      lang: "en",
      requestDelay: 500,
      timeout: 30000,
      concurrency: 1,
      showHelp: false,
    });
  });

  it("parses all flags together", () => {
    const result = parseArgs([
      "--delay", "0",
      "https://example.com/novel/",
      "-o", "books/novel.md",
      "--title", "My Novel",
      "--format", "md",
      "--lang", "es",
      "--timeout", "5000",
      "--concurrency", "4",
    ]);

    expect(result).toEqual({
      homeUrl: "https://example.com/novel/",
      outputPath: "books/novel.md",
      title: "My Novel",
      format: "md",
      lang: "es",
      requestDelay: 0,
      timeout: 5000,
      concurrency: 4,
      showHelp: false,
    });
  });

  it("parses --output long form", () => {
    expect(parseArgs(["https://example.com/novel/", "--output", "novel.html"]).outputPath).toBe("novel.html");
  });

  it("parses -h flag", () => {
    expect(parseArgs(["-h"]).showHelp).toBe(true);
  });
});

describe("isOutputFormat", () => {
  it("accepts html and md only", () => {
    expect(isOutputFormat("html")).toBe(true);
    expect(isOutputFormat("md")).toBe(true);
    expect(isOutputFormat("pdf")).toBe(false);
  });
});

describe("defaultOutputPath", () => {
  it("names the file after the novel slug", () => {
    expect(defaultOutputPath("https://www.example.com/my-novel/", "html")).toBe(path.join("output", "my-novel.html"));
    expect(defaultOutputPath("https://www.example.com/my-novel/", "md")).toBe(path.join("output", "my-novel.md"));
  });
});

describe("progressBar", () => {
  let mockStdoutWrite: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    mockStdoutWrite = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    mockStdoutWrite.mockRestore();
  });

  it("writes progress bar to stdout", () => {
    progressBar(5, 10, "Test Title");

    expect(mockStdoutWrite).toHaveBeenCalledTimes(1);
    expect(mockStdoutWrite.mock.calls[0][0]).toBe(`\r[${"=".repeat(15)}${" ".repeat(15)}]  50% (5/10) ${"Test Title".padEnd(40)}`);
  });

  it("shows 100% and newline when complete", () => {
    progressBar(10, 10, "Complete");

    expect(mockStdoutWrite).toHaveBeenCalledTimes(2);
    expect(String(mockStdoutWrite.mock.calls[0][0])).toContain("100% (10/10)");
    expect(mockStdoutWrite.mock.calls[1][0]).toBe("\n");
  });

  it("truncates long titles", () => {
    progressBar(1, 10, "This is a very long title that exceeds the maximum length allowed");

    expect(String(mockStdoutWrite.mock.calls[0][0])).toMatch(/ This is a very long title that exceed\.\.\.$/);
  });
});

describe("main", () => {
  let tempDir: string;
  let outputPath: string;
  let originalArgv: string[];
  let mockExit: MockInstance<typeof process.exit>;
  let mockConsoleLog: ReturnType<typeof vi.spyOn>;
  let mockConsoleError: ReturnType<typeof vi.spyOn>;
  let mockStdoutWrite: MockInstance<typeof process.stdout.write>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "novel-binder-main-"));
    outputPath = path.join(tempDir, "novel.html");
    originalArgv = process.argv;

    // Make process.exit throw to stop execution
    mockExit = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
    mockConsoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
    mockConsoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    mockStdoutWrite = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    process.argv = originalArgv;
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function runWith(...args: string[]): Promise<void> {
    process.argv = ["node", "index.ts", ...args];
    return main();
  }

  it("writes all chapters in discovery order", async () => {
    stubFetch(twoPageNovel());

    await runWith(HOME_URL, "--delay", "0", "--output", outputPath);

    const html = await fs.readFile(outputPath, "utf-8");
    const alpha = html.indexOf("<p>Alpha text.</p>");
    const beta = html.indexOf("<p>Beta text.</p>");
    const gamma = html.indexOf("<p>Gamma text.</p>");

    expect(alpha).toBeGreaterThan(-1);
    expect(alpha).toBeLessThan(beta);
    expect(beta).toBeLessThan(gamma);
    expect(html).toContain("<title>My Novel</title>");
    expect(html).toContain('<section class="chapter" id="chapter-2">\n<h2>Chapter 2: Departure</h2>\n<p>Beta text.</p>\n</section>');
    expect(html).not.toContain("Prev");
    expect(mockExit).not.toHaveBeenCalled();
    expect(mockConsoleLog).toHaveBeenCalledWith("Found 3 chapters on 2 page(s). Downloading...\n");
  });

  it("produces byte-identical output on a second run", async () => {
    stubFetch(twoPageNovel());
    const secondPath = path.join(tempDir, "again.html");

    await runWith(HOME_URL, "--delay", "0", "--output", outputPath);
    await runWith(HOME_URL, "--delay", "0", "--output", secondPath);

    expect(await fs.readFile(secondPath, "utf-8")).toBe(await fs.readFile(outputPath, "utf-8"));
  });

  it("uses --title and writes markdown with --format md", async () => {
    stubFetch(twoPageNovel());
    const markdownPath = path.join(tempDir, "novel.md");

    await runWith(HOME_URL, "--delay", "0", "--format", "md", "--title", "Custom", "-o", markdownPath);

    const markdown = await fs.readFile(markdownPath, "utf-8");
    expect(markdown.startsWith("# Custom\n\n---\n\n## Chapter 1: Arrival\n\nAlpha text.")).toBe(true);
  });

  it("aborts with ParseError and writes nothing when a chapter lacks content", async () => {
    const chapterUrl = `${SITE}/my-novel-2.html`;
    stubFetch({ ...twoPageNovel(), [chapterUrl]: chapterPageHtml({ title: "Chapter 2" }) });

    await expect(runWith(HOME_URL, "--delay", "0", "--output", outputPath)).rejects.toThrow("process.exit called");

    expect(mockExit).toHaveBeenCalledWith(3);
    expect(mockConsoleError).toHaveBeenCalledWith(
      `\nError: ParseError: Content region not found (selector "#chapter-content") (${chapterUrl})`,
    );
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("aborts with NetworkError naming listing page 2 when it times out", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    stubFetch({ ...twoPageNovel(), [PAGE_2_URL]: timeout });

    await expect(runWith(HOME_URL, "--delay", "0", "--output", outputPath)).rejects.toThrow("process.exit called");

    expect(mockExit).toHaveBeenCalledWith(2);
    expect(mockConsoleError).toHaveBeenCalledWith(
      `\nError: NetworkError: Request timed out after 30000ms (${PAGE_2_URL})`,
    );
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("exits with IOError when the output cannot be written", async () => {
    stubFetch(twoPageNovel());
    const blocker = path.join(tempDir, "blocker");
    await fs.writeFile(blocker, "", "utf-8");

    await expect(runWith(HOME_URL, "--delay", "0", "--output", path.join(blocker, "novel.html"))).rejects.toThrow(
      "process.exit called",
    );

    expect(mockExit).toHaveBeenCalledWith(4);
  });

  it("exits with error when no URL provided", async () => {
    await expect(runWith()).rejects.toThrow("process.exit called");

    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining("Usage:"));
    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it("rejects an invalid URL", async () => {
    await expect(runWith("not-a-url")).rejects.toThrow("process.exit called");

    expect(mockConsoleError).toHaveBeenCalledWith("Error: Invalid URL format");
    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it("rejects an unknown format", async () => {
    await expect(runWith(HOME_URL, "--format", "pdf")).rejects.toThrow("process.exit called");

    expect(mockConsoleError).toHaveBeenCalledWith('Error: Unknown format "pdf" (expected html or md)');
    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it("shows help and exits with code 0", async () => {
    await expect(runWith("--help")).rejects.toThrow("process.exit called");

    expect(mockConsoleLog).toHaveBeenCalledWith(expect.stringContaining("Usage:"));
    expect(mockExit).toHaveBeenCalledWith(0);
    expect(mockStdoutWrite).not.toHaveBeenCalled();
  });
});
