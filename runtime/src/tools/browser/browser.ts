/**
 * Browser automation over Playwright Chromium.
 *
 * Playwright is an optional peer dependency, imported by name on first
 * launch. The launcher is injectable so the adapters run against fakes in
 * tests.
 *
 * @module
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { boolParam, dispatchAction, intParam, missingParameter, nonEmptyParam, stringParam } from "../action.js";
import { SessionGuard } from "../session.js";
import { ToolkitError, ToolkitErrorCodes, toErrorMessage } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import { ensureLazyModule } from "../../utils/lazy-import.js";
import { hasKey, isRecord } from "../../utils/type-guards.js";

// ============================================================================
// Playwright surface
// ============================================================================

/** The subset of a Playwright `Page` the adapters use. */
export interface BrowserPage {
  goto(url: string, options?: { waitUntil?: "load" | "domcontentloaded" | "networkidle" }): Promise<unknown>;
  title(): Promise<string>;
  screenshot(options?: { fullPage?: boolean }): Promise<Buffer>;
  click(selector: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  textContent(selector: string): Promise<string | null>;
  keyboard: { press(key: string): Promise<void> };
  close(): Promise<void>;
}

/** The subset of a Playwright `Browser` the adapters use. */
export interface BrowserHandle {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean }) => Promise<BrowserHandle>;

type ChromiumModule = {
  chromium: { launch(options: { headless: boolean }): Promise<BrowserHandle> };
};

function isChromiumModule(mod: Record<string, unknown>): mod is ChromiumModule {
  return isRecord(mod.chromium) && typeof mod.chromium.launch === "function";
}

/**
 * Launch Chromium through the installed `playwright` package.
 */
export const launchChromium: BrowserLauncher = async ({ headless }) => {
  const chromium = await ensureLazyModule(
    "playwright",
    (message) => new ToolkitError(message, ToolkitErrorCodes.NOT_FOUND),
    (mod) => {
      if (!isChromiumModule(mod)) {
        throw new ToolkitError("playwright does not export a chromium launcher", ToolkitErrorCodes.NOT_FOUND);
      }
      return mod.chromium;
    },
  );
  return chromium.launch({ headless });
};

export interface BrowserToolConfig {
  logger?: Logger;
  /** Default for the `headless` parameter (default: true) */
  headless?: boolean;
  launcher?: BrowserLauncher;
}

const SCROLL_KEYS = {
  down: "PageDown",
  up: "PageUp",
  left: "ArrowLeft",
  right: "ArrowRight",
} as const;

// ============================================================================
// BrowserTool
// ============================================================================

export class BrowserTool implements ToolAdapter {
  readonly name = "browser";
  readonly description =
    "A tool for browser automation. Can navigate to URLs, take screenshots, click elements, fill forms, " +
    "and extract content.";
  readonly category = "browser";
  readonly actions = ["navigate", "screenshot", "click", "fill", "extract_text", "scroll", "wait", "close"] as const;
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly launcher: BrowserLauncher;
  private readonly headless: boolean;
  private readonly session = new SessionGuard("Browser", "Browser is not open.");
  private browser: BrowserHandle | null = null;
  private page: BrowserPage | null = null;
  /** In-flight launch, shared by concurrent first calls */
  private launching: Promise<BrowserPage | null> | null = null;

  constructor(config: BrowserToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.launcher = config.launcher ?? launchChromium;
    this.headless = config.headless ?? true;
    this.parameters = [
      {
        name: "action",
        type: "string",
        description: "Action to perform: navigate, screenshot, click, fill, extract_text, scroll, wait, close",
        required: true,
        enum: this.actions,
      },
      { name: "url", type: "string", description: "URL to navigate to (required for 'navigate' action)", required: false },
      {
        name: "selector",
        type: "string",
        description: "CSS selector for element (required for click, fill, extract_text actions)",
        required: false,
      },
      { name: "text", type: "string", description: "Text to fill in form field (required for 'fill' action)", required: false },
      {
        name: "wait_time",
        type: "integer",
        description: "Time to wait in milliseconds (for 'wait' action)",
        required: false,
        default: 1000,
      },
      {
        name: "scroll_direction",
        type: "string",
        description: "Direction to scroll: up, down, left, right (for 'scroll' action)",
        required: false,
        default: "down",
      },
      {
        name: "headless",
        type: "boolean",
        description: "Run browser in headless mode",
        required: false,
        default: this.headless,
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction(
      "Browser",
      {
        navigate: (p) => this.withPage(p, (page) => this.navigate(page, p)),
        screenshot: (p) => this.withPage(p, (page) => this.screenshot(page)),
        click: (p) => this.withPage(p, (page) => this.click(page, p)),
        fill: (p) => this.withPage(p, (page) => this.fill(page, p)),
        extract_text: (p) => this.withPage(p, (page) => this.extractText(page, p)),
        scroll: (p) => this.withPage(p, (page) => this.scroll(page, p)),
        wait: (p) => this.withPage(p, () => this.wait(p)),
        close: () => this.close(),
      },
      action,
      params,
      this.logger,
    );
  }

  async dispose(): Promise<void> {
    if (!this.session.isClosed) await this.close();
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  private async withPage(
    params: ToolParams,
    run: (page: BrowserPage) => Promise<ToolResult>,
  ): Promise<ToolResult> {
    const blocked = this.session.gate(false);
    if (blocked) return blocked;
    const page = await this.ensurePage(boolParam(params, "headless") ?? this.headless);
    if (page === null) return this.session.closedResult();
    return run(page);
  }

  /** The open page, launching on first use; null when closed mid-launch. */
  private async ensurePage(headless: boolean): Promise<BrowserPage | null> {
    if (this.page) return this.page;
    if (this.launching) return this.launching;

    this.launching = (async () => {
      this.logger.debug(`Launching Chromium (headless: ${headless})`);
      const browser = await this.launcher({ headless });
      let page: BrowserPage;
      try {
        page = await browser.newPage();
      } catch (err) {
        await this.release(null, browser);
        throw err;
      }
      if (this.session.isClosed) {
        this.logger.debug("Browser closed during launch; releasing it");
        await this.release(page, browser);
        return null;
      }
      this.browser = browser;
      this.page = page;
      this.session.markOpen();
      return page;
    })();

    try {
      return await this.launching;
    } finally {
      this.launching = null;
    }
  }

  /** Close a page and browser nobody else holds, logging failures. */
  private async release(page: BrowserPage | null, browser: BrowserHandle): Promise<void> {
    try {
      if (page) await page.close();
      await browser.close();
    } catch (err) {
      this.logger.warn(`Failed to release browser: ${toErrorMessage(err)}`);
    }
  }

  private async close(): Promise<ToolResult> {
    const blocked = this.session.gate(false);
    if (blocked) return blocked;

    const page = this.page;
    const browser = this.browser;
    this.page = null;
    this.browser = null;
    this.session.markClosed();
    try {
      if (page) await page.close();
      if (browser) await browser.close();
    } catch (err) {
      return errorResult(`Failed to close browser: ${toErrorMessage(err)}`);
    }
    return okResult("Browser closed successfully");
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  private async navigate(page: BrowserPage, params: ToolParams): Promise<ToolResult> {
    const url = nonEmptyParam(params, "url");
    if (url === undefined) return missingParameter("URL is required for navigate action");
    try {
      await page.goto(url, { waitUntil: "networkidle" });
      const title = await page.title();
      return okResult(`Successfully navigated to ${url}. Page title: ${title}`);
    } catch (err) {
      return errorResult(`Failed to navigate to ${url}: ${toErrorMessage(err)}`);
    }
  }

  private async screenshot(page: BrowserPage): Promise<ToolResult> {
    try {
      const data = (await page.screenshot({ fullPage: true })).toString("base64");
      return okResult(`Screenshot taken successfully. Base64 data: ${data.slice(0, 100)}...`, {
        artifacts: { screenshot: data },
      });
    } catch (err) {
      return errorResult(`Failed to take screenshot: ${toErrorMessage(err)}`);
    }
  }

  private async click(page: BrowserPage, params: ToolParams): Promise<ToolResult> {
    const selector = nonEmptyParam(params, "selector");
    if (selector === undefined) return missingParameter("Selector is required for click action");
    try {
      await page.click(selector);
      return okResult(`Successfully clicked element: ${selector}`);
    } catch (err) {
      return errorResult(`Failed to click element ${selector}: ${toErrorMessage(err)}`);
    }
  }

  private async fill(page: BrowserPage, params: ToolParams): Promise<ToolResult> {
    const selector = nonEmptyParam(params, "selector");
    const text = stringParam(params, "text");
    if (selector === undefined || !text) {
      return missingParameter("Selector and text are required for fill action");
    }
    try {
      await page.fill(selector, text);
      return okResult(`Successfully filled ${selector} with text`);
    } catch (err) {
      return errorResult(`Failed to fill ${selector}: ${toErrorMessage(err)}`);
    }
  }

  private async extractText(page: BrowserPage, params: ToolParams): Promise<ToolResult> {
    const selector = nonEmptyParam(params, "selector");
    try {
      if (selector !== undefined) {
        const text = (await page.textContent(selector)) ?? "";
        return okResult(`Text from ${selector}: ${text}`);
      }
      const text = (await page.textContent("body")) ?? "";
      return okResult(`Page text: ${text.slice(0, 1000)}${text.length > 1000 ? "..." : ""}`);
    } catch (err) {
      return errorResult(`Failed to extract text: ${toErrorMessage(err)}`);
    }
  }

  private async scroll(page: BrowserPage, params: ToolParams): Promise<ToolResult> {
    const direction = nonEmptyParam(params, "scroll_direction") ?? "down";
    if (!hasKey(SCROLL_KEYS, direction)) return errorResult(`Invalid scroll direction: ${direction}`);
    const key = SCROLL_KEYS[direction];
    try {
      await page.keyboard.press(key);
      return okResult(`Scrolled ${direction}`);
    } catch (err) {
      return errorResult(`Failed to scroll: ${toErrorMessage(err)}`);
    }
  }

  private async wait(params: ToolParams): Promise<ToolResult> {
    const waitTime = intParam(params, "wait_time") ?? 1000;
    await sleep(Math.max(0, waitTime));
    return okResult(`Waited ${waitTime}ms`);
  }
}

// ============================================================================
// SimpleBrowserTool
// ============================================================================

/**
 * One-shot browser: every call launches, visits `url`, answers and closes.
 */
export class SimpleBrowserTool implements ToolAdapter {
  readonly name = "simple_browser";
  readonly description = "Simple browser tool for basic web operations";
  readonly category = "browser";
  readonly actions = ["content", "screenshot", "title"] as const;
  readonly defaultAction = "content";
  readonly parameters: readonly ParameterSpec[] = [
    { name: "url", type: "string", description: "URL to visit and extract content from", required: true },
    {
      name: "action",
      type: "string",
      description: "Action to perform: content, screenshot, title",
      required: false,
      default: "content",
      enum: ["content", "screenshot", "title"],
    },
  ];

  private readonly logger: Logger;
  private readonly launcher: BrowserLauncher;

  constructor(config: BrowserToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.launcher = config.launcher ?? launchChromium;
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction(
      "Simple browser",
      {
        content: (p) => this.visit(p, async (page) => {
          const text = (await page.textContent("body")) ?? "";
          return okResult(text.length > 2000 ? `${text.slice(0, 2000)}...` : text);
        }),
        screenshot: (p) => this.visit(p, async (page, url) => {
          const data = (await page.screenshot({ fullPage: true })).toString("base64");
          return okResult(`Screenshot taken of ${url}`, { artifacts: { screenshot: data } });
        }),
        title: (p) => this.visit(p, async (page) => okResult(`Page title: ${await page.title()}`)),
      },
      action,
      params,
      this.logger,
    );
  }

  private async visit(
    params: ToolParams,
    run: (page: BrowserPage, url: string) => Promise<ToolResult>,
  ): Promise<ToolResult> {
    const url = nonEmptyParam(params, "url");
    if (url === undefined) return missingParameter("url is required");

    let browser: BrowserHandle | null = null;
    try {
      browser = await this.launcher({ headless: true });
      const page = await browser.newPage();
      await page.goto(url, { waitUntil: "networkidle" });
      return await run(page, url);
    } catch (err) {
      return errorResult(`Browser error: ${toErrorMessage(err)}`);
    } finally {
      if (browser) {
        await browser.close().catch((err: unknown) => {
          this.logger.warn(`simple_browser: close failed: ${toErrorMessage(err)}`);
        });
      }
    }
  }
}
