/**
 * Web search over DuckDuckGo's HTML endpoint.
 *
 * Google and Bing have no keyless endpoint; both engines are served by
 * DuckDuckGo.
 *
 * @module
 */

import type { CheerioAPI } from "cheerio";
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { dispatchAction, intParam, missingParameter, nonEmptyParam } from "../action.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import { DEFAULT_USER_AGENT } from "../../config/schema.js";
import { fetchPage, loadCheerio } from "./html.js";

// ============================================================================
// Types
// ============================================================================

export type SearchEngine = "duckduckgo" | "google" | "bing";

export const SEARCH_ENGINES: readonly SearchEngine[] = ["duckduckgo", "google", "bing"];

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchConfig {
  logger?: Logger;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Default result cap (default: 10) */
  maxResults?: number;
  /** Default region code (default: "us-en") */
  region?: string;
  userAgent?: string;
  /** Search endpoint (default: DuckDuckGo's HTML endpoint) */
  endpoint?: string;
}

const DUCKDUCKGO_HTML_ENDPOINT = "https://html.duckduckgo.com/html/";
const TIME_RANGES = new Set(["d", "w", "m", "y"]);

function isSearchEngine(value: string): value is SearchEngine {
  return SEARCH_ENGINES.some((engine) => engine === value);
}

// ============================================================================
// Result parsing
// ============================================================================

/**
 * Unwrap a DuckDuckGo redirect link (`//duckduckgo.com/l/?uddg=<target>`).
 * Other links are returned unchanged.
 */
export function unwrapRedirect(href: string): string {
  const absolute = href.startsWith("//") ? `https:${href}` : href;
  try {
    const parsed = new URL(absolute, "https://duckduckgo.com");
    return parsed.searchParams.get("uddg") ?? absolute;
  } catch {
    return absolute;
  }
}

export function parseDuckDuckGoResults($: CheerioAPI, maxResults: number): SearchResult[] {
  const results: SearchResult[] = [];
  $(".result").each((_i, el) => {
    if (results.length >= maxResults) return false;
    const result = $(el);
    if (result.hasClass("result--ad")) return undefined;

    const link = result.find("a.result__a").first();
    const href = link.attr("href");
    if (!href) return undefined;

    results.push({
      title: link.text().replace(/\s+/g, " ").trim() || "No title",
      url: unwrapRedirect(href),
      snippet: result.find(".result__snippet").first().text().replace(/\s+/g, " ").trim() || "No description",
    });
    return undefined;
  });
  return results;
}

export function formatSearchResults(results: readonly SearchResult[], query: string): string {
  if (results.length === 0) return `No results found for query: ${query}`;

  let output = `Search results for: ${query}\n`;
  output += "=".repeat(50) + "\n\n";
  results.forEach((result, i) => {
    output += `${i + 1}. ${result.title}\n`;
    output += `   URL: ${result.url}\n`;
    output += `   Description: ${result.snippet}\n\n`;
  });
  return output;
}

// ============================================================================
// WebSearchTool
// ============================================================================

export class WebSearchTool implements ToolAdapter {
  readonly name = "web_search";
  readonly description =
    "Search the web using various search engines (DuckDuckGo, Google, Bing). " +
    "Returns search results with titles, URLs, and snippets.";
  readonly category = "web";
  readonly actions = ["search"] as const;
  readonly defaultAction = "search";
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxResults: number;
  private readonly region: string;
  private readonly userAgent: string;
  private readonly endpoint: string;

  constructor(config: WebSearchConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.maxResults = config.maxResults ?? 10;
    this.region = config.region ?? "us-en";
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.endpoint = config.endpoint ?? DUCKDUCKGO_HTML_ENDPOINT;
    this.parameters = [
      { name: "query", type: "string", description: "The search query", required: true },
      {
        name: "engine",
        type: "string",
        description: "Search engine to use: duckduckgo, google, bing",
        required: false,
        default: "duckduckgo",
      },
      {
        name: "max_results",
        type: "integer",
        description: "Maximum number of results to return",
        required: false,
        default: this.maxResults,
      },
      {
        name: "region",
        type: "string",
        description: "Region for search results (e.g., 'us-en', 'uk-en')",
        required: false,
        default: this.region,
      },
      {
        name: "time_range",
        type: "string",
        description: "Time range for results: d (day), w (week), m (month), y (year)",
        required: false,
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("Web search", { search: (p) => this.search(p) }, action, params, this.logger);
  }

  private async search(params: ToolParams): Promise<ToolResult> {
    const query = nonEmptyParam(params, "query");
    if (query === undefined) return missingParameter("query is required");

    const engine = (nonEmptyParam(params, "engine") ?? "duckduckgo").toLowerCase();
    if (!isSearchEngine(engine)) {
      return errorResult(`Unknown search engine: ${engine}. Supported: duckduckgo, google, bing`);
    }

    const requested = intParam(params, "max_results");
    const maxResults = requested !== undefined && requested > 0 ? requested : this.maxResults;
    const region = nonEmptyParam(params, "region") ?? this.region;
    const timeRange = nonEmptyParam(params, "time_range");

    const results = await this.searchDuckDuckGo(query, maxResults, region, timeRange);
    if (typeof results === "string") return errorResult(`Web search failed: ${results}`);

    this.logger.debug(`web_search: ${results.length} results for "${query}" via ${engine}`);
    return okResult(formatSearchResults(results, query), {
      artifacts: { results, query, engine, count: results.length },
    });
  }

  /** Results, or the failure message. */
  private async searchDuckDuckGo(
    query: string,
    maxResults: number,
    region: string,
    timeRange: string | undefined,
  ): Promise<SearchResult[] | string> {
    const url = new URL(this.endpoint);
    url.searchParams.set("q", query);
    url.searchParams.set("kl", region);
    if (timeRange && TIME_RANGES.has(timeRange)) url.searchParams.set("df", timeRange);

    const page = await fetchPage(url.toString(), {
      userAgent: this.userAgent,
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });
    if (!page.ok) return page.error;

    const load = await loadCheerio();
    return parseDuckDuckGoResults(load(page.html), maxResults);
  }
}

// ============================================================================
// Engine-specific tools
// ============================================================================

/**
 * A search tool with its engine fixed, delegating to {@link WebSearchTool}.
 */
abstract class EngineSearchTool implements ToolAdapter {
  abstract readonly name: string;
  abstract readonly description: string;
  readonly category = "web";
  readonly actions = ["search"] as const;
  readonly defaultAction = "search";
  readonly parameters: readonly ParameterSpec[];

  protected abstract readonly engine: SearchEngine;
  private readonly delegate: WebSearchTool;

  constructor(config: WebSearchConfig = {}) {
    this.delegate = new WebSearchTool(config);
    const forwarded = new Set(this.forwardedParameters());
    this.parameters = this.delegate.parameters.filter((p) => forwarded.has(p.name));
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    if (action !== "search") {
      return this.delegate.execute(action, params);
    }
    const forwarded: Record<string, unknown> = { engine: this.engine };
    for (const name of this.forwardedParameters()) {
      if (params[name] !== undefined) forwarded[name] = params[name];
    }
    return this.delegate.execute("search", forwarded);
  }

  protected forwardedParameters(): readonly string[] {
    return ["query", "max_results"];
  }
}

export class DuckDuckGoSearchTool extends EngineSearchTool {
  readonly name = "duckduckgo_search";
  readonly description =
    "Search the web using DuckDuckGo search engine. Returns search results with titles, URLs, and snippets.";
  protected readonly engine = "duckduckgo";

  protected override forwardedParameters(): readonly string[] {
    return ["query", "max_results", "region", "time_range"];
  }
}

export class GoogleSearchTool extends EngineSearchTool {
  readonly name = "google_search";
  readonly description = "Search the web using Google search engine. Currently falls back to DuckDuckGo.";
  protected readonly engine = "google";
}

export class BingSearchTool extends EngineSearchTool {
  readonly name = "bing_search";
  readonly description = "Search the web using Bing search engine. Currently falls back to DuckDuckGo.";
  protected readonly engine = "bing";
}
