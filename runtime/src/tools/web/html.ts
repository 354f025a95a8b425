/**
 * Page fetching and HTML helpers shared by the search and crawler tools.
 *
 * Pages are fetched with `fetch` (manual redirects, streamed size cap) and
 * parsed with cheerio, loaded on first use.
 *
 * @module
 */

import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import { ToolkitError, ToolkitErrorCodes, toErrorMessage } from "../../types/errors.js";

// ============================================================================
// Types
// ============================================================================

export interface FetchPageOptions {
  readonly userAgent: string;
  /** Request timeout in milliseconds. */
  readonly timeoutMs: number;
  /** Maximum body size in bytes. Default: 1_048_576 (1 MB). */
  readonly maxResponseBytes?: number;
  readonly logger?: Logger;
}

export interface FetchedPage {
  readonly ok: true;
  readonly html: string;
  readonly contentType: string;
  readonly finalUrl: string;
}

export interface FetchFailure {
  readonly ok: false;
  readonly error: string;
}

export interface PageLink {
  text: string;
  href: string;
}

export interface PageImage {
  alt: string;
  src: string;
}

export type CheerioLoad = (html: string) => CheerioAPI;

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MAX_RESPONSE_BYTES = 1_048_576;
const MAX_REDIRECTS = 5;

/** Schemes allowed in href attributes. Everything else is stripped. */
const SAFE_HREF_SCHEMES = new Set(["http:", "https:", "mailto:"]);

// ============================================================================
// URL helpers
// ============================================================================

/**
 * Check that `url` parses and uses http or https.
 * Returns the failure message, or `undefined` when the URL is usable.
 */
export function checkHttpUrl(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid URL: ${url}`;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return "Only HTTP(S) URLs are allowed";
  }
  return undefined;
}

/**
 * Sanitize an href value: only http/https/mailto and relative links survive.
 * Control and zero-width characters are stripped before the scheme check.
 */
export function sanitizeHref(href: string): string {
  // eslint-disable-next-line no-control-regex
  const trimmed = href.replace(/[\x00-\x1f\x7f\u200b-\u200d\ufeff]/g, "").trim();
  if (trimmed.length === 0) return "";

  const colonIdx = trimmed.indexOf(":");
  if (colonIdx === -1) return trimmed;

  const maybeScheme = trimmed.slice(0, colonIdx);
  if (!/^[a-zA-Z][a-zA-Z0-9+\-.]*$/.test(maybeScheme)) return trimmed;

  return SAFE_HREF_SCHEMES.has(`${maybeScheme.toLowerCase()}:`) ? trimmed : "";
}

/** Resolve `href` against the page URL; unparseable values pass through. */
function absolutize(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

// ============================================================================
// Fetching
// ============================================================================

/**
 * Fetch a page with redirect following and a body size cap.
 */
export async function fetchPage(
  url: string,
  options: FetchPageOptions,
  redirectCount = 0,
): Promise<FetchedPage | FetchFailure> {
  const logger = options.logger ?? silentLogger;
  const maxBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;

  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: { "User-Agent": options.userAgent },
      signal: AbortSignal.timeout(options.timeoutMs),
      redirect: "manual",
    });
  } catch (err) {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      return { ok: false, error: "Request timed out" };
    }
    return { ok: false, error: `Connection failed: ${toErrorMessage(err)}` };
  }

  if (response.status >= 300 && response.status < 400) {
    const location = response.headers.get("location");
    if (!location) {
      return { ok: false, error: `Redirect (${response.status}) without Location header` };
    }
    if (redirectCount >= MAX_REDIRECTS) {
      return { ok: false, error: `Too many redirects (max: ${MAX_REDIRECTS})` };
    }
    const redirectUrl = new URL(location, url).toString();
    const invalid = checkHttpUrl(redirectUrl);
    if (invalid) return { ok: false, error: invalid };
    logger.debug(`Following redirect ${response.status} → ${redirectUrl}`);
    return fetchPage(redirectUrl, options, redirectCount + 1);
  }

  if (response.status >= 400) {
    return { ok: false, error: `HTTP ${response.status} ${response.statusText}`.trim() };
  }

  const html = await readCapped(response, maxBytes);
  return {
    ok: true,
    html,
    contentType: response.headers.get("content-type") ?? "",
    finalUrl: response.url || url,
  };
}

async function readCapped(response: Response, maxBytes: number): Promise<string> {
  const reader = response.body?.getReader();
  if (!reader) {
    const text = await response.text();
    return text.length > maxBytes ? text.slice(0, maxBytes) : text;
  }

  const decoder = new TextDecoder();
  const chunks: string[] = [];
  let totalBytes = 0;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        const keep = value.byteLength - (totalBytes - maxBytes);
        if (keep > 0) chunks.push(decoder.decode(value.slice(0, keep)));
        await reader.cancel();
        break;
      }
      chunks.push(decoder.decode(value, { stream: true }));
    }
  } finally {
    reader.releaseLock();
  }
  chunks.push(decoder.decode());
  return chunks.join("");
}

// ============================================================================
// Cheerio (lazy-loaded)
// ============================================================================

let cheerioLoad: CheerioLoad | null = null;

export async function loadCheerio(): Promise<CheerioLoad> {
  if (cheerioLoad) return cheerioLoad;
  let load: CheerioLoad;
  try {
    const mod = await import("cheerio");
    load = (html) => mod.load(html);
  } catch {
    throw new ToolkitError(
      "cheerio package not installed. Install it: npm install cheerio",
      ToolkitErrorCodes.NOT_FOUND,
    );
  }
  cheerioLoad = load;
  return load;
}

// ============================================================================
// Extraction
// ============================================================================

export function pageTitle($: CheerioAPI): string {
  return $("title").first().text().trim();
}

/** Visible text of the body with whitespace collapsed. */
export function pageText($: CheerioAPI): string {
  $("script, style, noscript, template").remove();
  const root: Cheerio<AnyNode> = $("body").length > 0 ? $("body") : $.root();
  return root.text().replace(/\s+/g, " ").trim();
}

export function extractLinks($: CheerioAPI, baseUrl: string): PageLink[] {
  const links: PageLink[] = [];
  $("a[href]").each((_i, el) => {
    const href = sanitizeHref($(el).attr("href") ?? "");
    if (!href) return;
    const text = $(el).text().replace(/\s+/g, " ").trim();
    links.push({ text: text || "No text", href: absolutize(href, baseUrl) });
  });
  return links;
}

export function extractImages($: CheerioAPI, baseUrl: string): PageImage[] {
  const images: PageImage[] = [];
  $("img[src]").each((_i, el) => {
    const src = $(el).attr("src") ?? "";
    if (!src || src.startsWith("data:")) return;
    images.push({ alt: $(el).attr("alt")?.trim() || "No alt", src: absolutize(src, baseUrl) });
  });
  return images;
}

// ============================================================================
// HTML → Markdown conversion
// ============================================================================

/**
 * Convert inline HTML (links, emphasis, code) to markdown and strip the rest.
 */
function inlineToMd(html: string): string {
  let md = html;
  md = md.replace(
    /<a[^>]*href=(["'])([^"']*)\1[^>]*>(.*?)<\/a>/gis,
    (_match, _quote: string, href: string, text: string) => {
      const safe = sanitizeHref(href);
      return safe ? `[${text}](${safe})` : text;
    },
  );
  md = md.replace(/<(?:strong|b)>(.*?)<\/(?:strong|b)>/gis, "**$1**");
  md = md.replace(/<(?:em|i)>(.*?)<\/(?:em|i)>/gis, "*$1*");
  md = md.replace(/<code>(.*?)<\/code>/gis, "`$1`");
  md = md.replace(/<[^>]*>/g, "");
  return decodeEntities(md).replace(/\s+/g, " ").trim();
}

function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&");
}

/**
 * Convert a parsed page to markdown.
 *
 * Walks block elements in document order: headings, code blocks,
 * blockquotes, list items, tables and paragraphs. A block nested inside an
 * already emitted block is skipped.
 */
export function htmlToMarkdown($: CheerioAPI): string {
  $("script, style, noscript, template").remove();
  const blocks: string[] = [];
  const emitted = new Set<unknown>();

  const title = pageTitle($);
  if (title) blocks.push(`# ${title}`);

  $("h1, h2, h3, h4, h5, h6, pre, blockquote, ul, ol, table, p").each((_i, el) => {
    if ($(el).parents().toArray().some((parent) => emitted.has(parent))) return;

    const tag = el.tagName.toLowerCase();
    let block = "";
    if (/^h[1-6]$/.test(tag)) {
      const text = inlineToMd($(el).html() ?? "");
      if (text) block = `${"#".repeat(Number(tag.slice(1)))} ${text}`;
    } else if (tag === "pre") {
      const code = $(el).text().trim();
      if (code) block = "```\n" + code + "\n```";
    } else if (tag === "blockquote") {
      const text = inlineToMd($(el).html() ?? "");
      if (text) block = `> ${text}`;
    } else if (tag === "ul" || tag === "ol") {
      const items: string[] = [];
      $(el)
        .children("li")
        .each((j, li) => {
          const text = inlineToMd($(li).html() ?? "");
          if (text) items.push(tag === "ol" ? `${j + 1}. ${text}` : `- ${text}`);
        });
      block = items.join("\n");
    } else if (tag === "table") {
      const rows: string[][] = [];
      $(el)
        .find("tr")
        .each((_j, tr) => {
          const cells = $(tr)
            .find("th, td")
            .toArray()
            .map((cell) => inlineToMd($(cell).html() ?? ""));
          if (cells.length > 0) rows.push(cells);
        });
      block = tableToMd(rows);
    } else {
      block = inlineToMd($(el).html() ?? "");
    }

    emitted.add(el);
    if (block) blocks.push(block);
  });

  return blocks.join("\n\n").trim();
}

function tableToMd(rows: string[][]): string {
  if (rows.length === 0) return "";
  const width = Math.max(...rows.map((r) => r.length));
  const padded = rows.map((r) => [...r, ...Array<string>(width - r.length).fill("")]);
  const lines = [
    `| ${padded[0].join(" | ")} |`,
    `| ${padded[0].map(() => "---").join(" | ")} |`,
    ...padded.slice(1).map((r) => `| ${r.join(" | ")} |`),
  ];
  return lines.join("\n");
}

/** Reset the cached cheerio loader. Exported only for test teardown. */
export function _resetForTesting(): void {
  cheerioLoad = null;
}
