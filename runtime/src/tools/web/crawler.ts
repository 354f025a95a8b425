/**
 * Web crawling and scraping tools.
 *
 * Pages are fetched with {@link fetchPage} and converted with cheerio. The
 * `llm` strategy hands the page markdown to a chat provider.
 *
 * @module
 */

import type { CheerioAPI } from "cheerio";
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { boolParam, dispatchAction, intParam, missingParameter, nonEmptyParam } from "../action.js";
import { toErrorMessage } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import type { ToolkitConfig } from "../../config/schema.js";
import { DEFAULT_USER_AGENT, defaultToolkitConfig } from "../../config/schema.js";
import type { ProviderFactory } from "../../llm/factory.js";
import { createLLMProvider } from "../../llm/factory.js";
import type { PageImage, PageLink } from "./html.js";
import {
  checkHttpUrl,
  extractImages,
  extractLinks,
  fetchPage,
  htmlToMarkdown,
  loadCheerio,
  pageText,
  pageTitle,
} from "./html.js";

// ============================================================================
// Types
// ============================================================================

export type ExtractionStrategy = "basic" | "css" | "llm" | "xpath";

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = ["basic", "css", "llm", "xpath"];

export const LLM_EXTRACTION_INSTRUCTION = "Extract the main content and key information from this webpage.";

/** Model used by the default `llm` extractor against the local provider. */
export const DEFAULT_EXTRACTION_MODEL = "llama2";

/**
 * Turns page markdown into extracted data for the `llm` strategy.
 */
export type ContentExtractor = (markdown: string, instruction: string) => Promise<string>;

export interface WebPageToolConfig {
  logger?: Logger;
  userAgent?: string;
  /** Default request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  maxResponseBytes?: number;
}

export interface WebCrawlerConfig extends WebPageToolConfig {
  /** Replaces the chat-provider extractor used by the `llm` strategy */
  extractor?: ContentExtractor;
  chat?: ToolkitConfig["chat"];
  providerFactory?: ProviderFactory;
}

function isExtractionStrategy(value: string): value is ExtractionStrategy {
  return EXTRACTION_STRATEGIES.some((strategy) => strategy === value);
}

function cap(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Drop plain paragraph blocks with fewer than `threshold` words.
 * Headings, lists, quotes, code and tables are kept.
 */
export function filterBlocks(markdown: string, threshold: number): string {
  if (threshold <= 0) return markdown;
  return markdown
    .split("\n\n")
    .filter((block) => /^(#|```|\||>|- |\d+\. )/.test(block) || countWords(block) >= threshold)
    .join("\n\n");
}

/**
 * Default `llm` extractor: the local chat provider with the instruction as
 * the system message.
 */
export function createProviderExtractor(
  chat: ToolkitConfig["chat"],
  providerFactory: ProviderFactory = createLLMProvider,
): ContentExtractor {
  return async (markdown, instruction) => {
    const provider = providerFactory("local", { ollamaHost: chat.ollamaHost, timeoutMs: chat.timeoutMs });
    const response = await provider.chat(
      [
        { role: "system", content: instruction },
        { role: "user", content: markdown },
      ],
      { model: DEFAULT_EXTRACTION_MODEL, temperature: 0, maxTokens: chat.maxTokens },
    );
    return response.content;
  };
}

// ============================================================================
// WebCrawlerTool
// ============================================================================

interface CrawledPage {
  url: string;
  html: string;
  title: string;
  markdown: string;
  links: PageLink[];
  images: PageImage[];
  $: CheerioAPI;
}

export class WebCrawlerTool implements ToolAdapter {
  readonly name = "web_crawler";
  readonly description =
    "A tool for crawling web pages and extracting structured content. " +
    "Can extract text, links, images, and perform smart content extraction.";
  readonly category = "web";
  readonly actions = ["crawl"] as const;
  readonly defaultAction = "crawl";
  readonly parameters: readonly ParameterSpec[] = [
    { name: "url", type: "string", description: "URL to crawl", required: true },
    {
      name: "extraction_strategy",
      type: "string",
      description: "Extraction strategy: basic, llm, css, xpath",
      required: false,
      default: "basic",
      enum: EXTRACTION_STRATEGIES,
    },
    {
      name: "css_selector",
      type: "string",
      description: "CSS selector for targeted extraction (when using css strategy)",
      required: false,
    },
    {
      name: "xpath",
      type: "string",
      description: "XPath expression for targeted extraction (when using xpath strategy)",
      required: false,
    },
    {
      name: "word_count_threshold",
      type: "integer",
      description: "Minimum word count for content blocks",
      required: false,
      default: 10,
    },
    { name: "include_links", type: "boolean", description: "Include links in extraction", required: false, default: false },
    {
      name: "include_images",
      type: "boolean",
      description: "Include images in extraction",
      required: false,
      default: false,
    },
    { name: "timeout", type: "integer", description: "Request timeout in seconds", required: false, default: 30 },
  ];

  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxResponseBytes?: number;
  private readonly extractor: ContentExtractor;

  constructor(config: WebCrawlerConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.maxResponseBytes = config.maxResponseBytes;
    this.extractor =
      config.extractor ??
      createProviderExtractor(config.chat ?? defaultToolkitConfig().chat, config.providerFactory);
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("Web crawler", { crawl: (p) => this.crawl(p) }, action, params, this.logger);
  }

  private async crawl(params: ToolParams): Promise<ToolResult> {
    const url = nonEmptyParam(params, "url");
    if (url === undefined) return missingParameter("url is required");

    const strategy = nonEmptyParam(params, "extraction_strategy") ?? "basic";
    if (!isExtractionStrategy(strategy)) return errorResult(`Unknown extraction strategy: ${strategy}`);

    const cssSelector = nonEmptyParam(params, "css_selector");
    if (strategy === "css" && cssSelector === undefined) {
      return missingParameter("css_selector is required for css extraction strategy");
    }
    if (strategy === "xpath") {
      if (nonEmptyParam(params, "xpath") === undefined) {
        return missingParameter("xpath is required for xpath extraction strategy");
      }
      return errorResult("XPath extraction strategy not yet implemented");
    }

    const invalid = checkHttpUrl(url);
    if (invalid) return errorResult(invalid);

    const timeoutSeconds = intParam(params, "timeout");
    const timeoutMs = timeoutSeconds !== undefined && timeoutSeconds > 0 ? timeoutSeconds * 1000 : this.timeoutMs;
    const page = await this.load(url, timeoutMs);
    if (typeof page === "string") return errorResult(`Crawling failed: ${page}`);

    let extracted: string | undefined;
    if (strategy === "css" && cssSelector !== undefined) {
      const matches = page
        .$(cssSelector)
        .toArray()
        .map((el) => page.$(el).text().replace(/\s+/g, " ").trim())
        .filter(Boolean);
      extracted = JSON.stringify(matches);
    } else if (strategy === "llm") {
      try {
        extracted = await this.extractor(page.markdown, LLM_EXTRACTION_INSTRUCTION);
      } catch (err) {
        return errorResult(`Crawling failed: ${toErrorMessage(err)}`);
      }
    }

    const threshold = intParam(params, "word_count_threshold") ?? 10;
    const content = filterBlocks(page.markdown, threshold);
    const parts = [`URL: ${page.url}`];
    if (page.title) parts.push(`Title: ${page.title}`);
    if (content) parts.push(`Content (Markdown):\n${cap(content, 2000)}`);
    if (boolParam(params, "include_links") && page.links.length > 0) {
      parts.push(`Links:\n${page.links.slice(0, 10).map((l) => `- ${l.text}: ${l.href}`).join("\n")}`);
    }
    if (boolParam(params, "include_images") && page.images.length > 0) {
      parts.push(`Images:\n${page.images.slice(0, 5).map((img) => `- ${img.alt}: ${img.src}`).join("\n")}`);
    }
    if (extracted !== undefined) parts.push(`Extracted Data:\n${cap(extracted, 1000)}`);

    this.logger.debug(`web_crawler: ${page.url} via ${strategy}`);
    return okResult(parts.join("\n\n"), {
      artifacts: {
        html: page.html,
        markdown: page.markdown,
        links: page.links,
        images: page.images,
        ...(extracted !== undefined ? { extracted } : {}),
      },
    });
  }

  /** The parsed page, or the fetch failure message. */
  private async load(url: string, timeoutMs: number): Promise<CrawledPage | string> {
    const fetched = await fetchPage(url, {
      userAgent: this.userAgent,
      timeoutMs,
      maxResponseBytes: this.maxResponseBytes,
      logger: this.logger,
    });
    if (!fetched.ok) return fetched.error;

    const load = await loadCheerio();
    const $ = load(fetched.html);
    return {
      url: fetched.finalUrl,
      html: fetched.html,
      title: pageTitle($),
      links: extractLinks($, fetched.finalUrl),
      images: extractImages($, fetched.finalUrl),
      markdown: htmlToMarkdown(load(fetched.html)),
      $,
    };
  }
}

// ============================================================================
// SimpleWebScraperTool
// ============================================================================

export type ScrapeFormat = "text" | "markdown" | "html";

export class SimpleWebScraperTool implements ToolAdapter {
  readonly name = "simple_web_scraper";
  readonly description = "Simple tool for extracting text content from web pages";
  readonly category = "web";
  readonly actions = ["scrape"] as const;
  readonly defaultAction = "scrape";
  readonly parameters: readonly ParameterSpec[] = [
    { name: "url", type: "string", description: "URL to scrape", required: true },
    {
      name: "format",
      type: "string",
      description: "Output format: text, markdown, html",
      required: false,
      default: "text",
      enum: ["text", "markdown", "html"],
    },
  ];

  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxResponseBytes?: number;

  constructor(config: WebPageToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.maxResponseBytes = config.maxResponseBytes;
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("Web scraper", { scrape: (p) => this.scrape(p) }, action, params, this.logger);
  }

  private async scrape(params: ToolParams): Promise<ToolResult> {
    const url = nonEmptyParam(params, "url");
    if (url === undefined) return missingParameter("url is required");
    const invalid = checkHttpUrl(url);
    if (invalid) return errorResult(invalid);

    const page = await fetchPage(url, {
      userAgent: this.userAgent,
      timeoutMs: this.timeoutMs,
      maxResponseBytes: this.maxResponseBytes,
      logger: this.logger,
    });
    if (!page.ok) return errorResult(`Scraping failed: ${page.error}`);

    let content: string;
    switch (nonEmptyParam(params, "format")) {
      case "html":
        content = page.html || "No HTML content";
        break;
      case "markdown": {
        const load = await loadCheerio();
        content = htmlToMarkdown(load(page.html)) || "No markdown content";
        break;
      }
      default: {
        const load = await loadCheerio();
        content = pageText(load(page.html)) || "No content extracted";
      }
    }
    return okResult(cap(content, 3000));
  }
}
