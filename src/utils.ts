/**
 * Utility functions for the downloader
 * Extracted for testability
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

/** Flag to prevent multiple signal handlers from running */
let isExiting = false;

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Download")
 * @param onInterrupt - Synchronous cleanup run before the process exits
 */
export function setupSignalHandlers(commandName: string, onInterrupt?: () => void): void {
  const handler = (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.error(`\n${commandName} interrupted.`);
    onInterrupt?.();

    // 128 + signal number: SIGINT = 2, SIGTERM = 15
    process.exit(signal === 'SIGINT' ? 130 : 143);
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

/**
 * Check whether a module is the script Node was started with.
 * Resolves symlinks so it also holds when run through an npm bin link.
 *
 * @param moduleUrl - The caller's `import.meta.url`
 */
export function isMainModule(moduleUrl: string, argv: string[] = process.argv): boolean {
  const script = argv[1];
  if (!script) return false;
  try {
    return pathToFileURL(realpathSync(script)).href === moduleUrl;
  } catch {
    return false;
  }
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Create a safe filename from a title.
 * Converts to lowercase, replaces everything except letters and digits with
 * dashes, and truncates to 50 characters.
 *
 * @example
 * sanitizeFilename('Chapter 1: Introduction') // 'chapter-1-introduction'
 * sanitizeFilename('Mi Esposo Es Un Billonario') // 'mi-esposo-es-un-billonario'
 */
export function sanitizeFilename(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 50);
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Derive a filename slug identifying a novel from its home URL.
 * Uses the last non-empty path segment, or the host name for a bare domain.
 *
 * @example
 * deriveNovelSlug('https://www.example.com/my-novel/') // 'my-novel'
 * deriveNovelSlug('https://novels.example.com') // 'novels-example-com'
 */
export function deriveNovelSlug(homeUrl: string): string {
  const parsed = new URL(homeUrl);
  const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  const slug = last ? sanitizeFilename(safeDecode(last).replace(/\.html?$/i, '')) : '';
  return slug || sanitizeFilename(parsed.hostname) || 'novel';
}

/**
 * Title-case a heading: first letter of every word upper case, the rest lower case.
 * Chapter titles on the supported site are published in capitals.
 *
 * @example
 * toTitleCase('CHAPTER 12: THE RETURN') // 'Chapter 12: The Return'
 */
export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}\p{N}'’])(\p{L})/gu, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

/**
 * Resolve a link found on a page to an absolute URL.
 * Returns null for empty, fragment-only, `javascript:` and `mailto:` links.
 *
 * @example
 * resolveUrl('/novel-2.html', 'https://example.com/novel/') // 'https://example.com/novel-2.html'
 * resolveUrl('#top', 'https://example.com/') // null
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  if (/^(javascript|mailto|tel):/i.test(trimmed)) return null;

  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flags - Flag or flag aliases to look for (e.g., ['--output', '-o'])
 * @param defaultValue - Default value if flag not found
 */
export function getStringArg(args: string[], flags: string | string[], defaultValue: string): string {
  return getNullableStringArg(args, flags) ?? defaultValue;
}

/**
 * Get a nullable string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flags - Flag or flag aliases to look for (e.g., '--title')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flags: string | string[]): string | null {
  const names = typeof flags === 'string' ? [flags] : flags;
  let result: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (names.includes(args[i]) && value && !value.startsWith('--')) {
      result = value;
    }
  }
  return result;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found or not a number
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value) {
      const parsed = parseInt(value, 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--delay 1000', skips '1000').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith('-')) {
      return arg;
    }
  }
  return '';
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: 'URL is required' };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return { isValid: false, error: 'URL must use http or https protocol' };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: 'Invalid URL format' };
  }
}
