import { describe, it, expect, vi, beforeEach } from "vitest";
import { BrowserTool, SimpleBrowserTool, type BrowserHandle, type BrowserLauncher, type BrowserPage } from "./browser.js";

const PNG_BYTES = Buffer.from("fake-png-data");

function createFakes() {
  const page = {
    goto: vi.fn<BrowserPage["goto"]>(async () => null),
    title: vi.fn<BrowserPage["title"]>(async () => "Example Domain"),
    screenshot: vi.fn<BrowserPage["screenshot"]>(async () => PNG_BYTES),
    click: vi.fn<BrowserPage["click"]>(async () => undefined),
    fill: vi.fn<BrowserPage["fill"]>(async () => undefined),
    textContent: vi.fn<BrowserPage["textContent"]>(async () => "body text"),
    keyboard: { press: vi.fn<BrowserPage["keyboard"]["press"]>(async () => undefined) },
    close: vi.fn<BrowserPage["close"]>(async () => undefined),
  } satisfies BrowserPage;
  const browser = {
    newPage: vi.fn<BrowserHandle["newPage"]>(async () => page),
    close: vi.fn<BrowserHandle["close"]>(async () => undefined),
  } satisfies BrowserHandle;
  const launcher = vi.fn<BrowserLauncher>(async () => browser);
  return { page, browser, launcher };
}

describe("BrowserTool", () => {
  let fakes: ReturnType<typeof createFakes>;
  let tool: BrowserTool;

  beforeEach(() => {
    fakes = createFakes();
    tool = new BrowserTool({ launcher: fakes.launcher });
  });

  it("opens implicitly on first use and reuses the page", async () => {
    const first = await tool.execute("navigate", { url: "https://example.com" });
    await tool.execute("click", { selector: "#go" });

    expect(first.output).toBe("Successfully navigated to https://example.com. Page title: Example Domain");
    expect(fakes.page.goto).toHaveBeenCalledWith("https://example.com", { waitUntil: "networkidle" });
    expect(fakes.launcher).toHaveBeenCalledTimes(1);
    expect(fakes.launcher).toHaveBeenCalledWith({ headless: true });
  });

  it("launches once for concurrent first calls", async () => {
    await Promise.all([tool.execute("screenshot"), tool.execute("extract_text")]);
    expect(fakes.launcher).toHaveBeenCalledTimes(1);
  });

  it("passes the headless flag to the launcher", async () => {
    await tool.execute("screenshot", { headless: "false" });
    expect(fakes.launcher).toHaveBeenCalledWith({ headless: false });
  });

  it("returns a base64 preview and keeps the full data in artifacts", async () => {
    const result = await tool.execute("screenshot");
    const data = PNG_BYTES.toString("base64");

    expect(result.output).toBe(`Screenshot taken successfully. Base64 data: ${data}...`);
    expect(result.metadata?.artifacts?.screenshot).toBe(data);
    expect(fakes.page.screenshot).toHaveBeenCalledWith({ fullPage: true });
  });

  it("clicks, fills and scrolls", async () => {
    expect((await tool.execute("click", { selector: "#submit" })).output).toBe("Successfully clicked element: #submit");
    expect((await tool.execute("fill", { selector: "#q", text: "hello" })).output).toBe(
      "Successfully filled #q with text",
    );
    expect((await tool.execute("scroll", {})).output).toBe("Scrolled down");
    expect((await tool.execute("scroll", { scroll_direction: "left" })).output).toBe("Scrolled left");

    expect(fakes.page.fill).toHaveBeenCalledWith("#q", "hello");
    expect(fakes.page.keyboard.press.mock.calls).toEqual([["PageDown"], ["ArrowLeft"]]);
    expect((await tool.execute("scroll", { scroll_direction: "sideways" })).error).toBe(
      "Invalid scroll direction: sideways",
    );
    expect((await tool.execute("scroll", { scroll_direction: "constructor" })).error).toBe(
      "Invalid scroll direction: constructor",
    );
    expect(fakes.page.keyboard.press).toHaveBeenCalledTimes(2);
  });

  it("extracts element text or truncated page text", async () => {
    fakes.page.textContent.mockResolvedValueOnce("Heading").mockResolvedValueOnce("x".repeat(1200));

    expect((await tool.execute("extract_text", { selector: "h1" })).output).toBe("Text from h1: Heading");
    expect((await tool.execute("extract_text")).output).toBe(`Page text: ${"x".repeat(1000)}...`);
  });

  it("waits the requested time", async () => {
    expect((await tool.execute("wait", { wait_time: 5 })).output).toBe("Waited 5ms");
  });

  it("validates required parameters", async () => {
    expect((await tool.execute("navigate", {})).error).toBe("URL is required for navigate action");
    expect((await tool.execute("click", {})).error).toBe("Selector is required for click action");
    expect((await tool.execute("fill", { selector: "#q" })).error).toBe(
      "Selector and text are required for fill action",
    );
  });

  it("reports page failures per action", async () => {
    fakes.page.click.mockRejectedValueOnce(new Error("element not visible"));
    const result = await tool.execute("click", { selector: "#hidden" });
    expect(result.error).toBe("Failed to click element #hidden: element not visible");
    expect(result.metadata?.code).toBe("EXECUTION_FAILED");
  });

  it("closes, then rejects every action with no way back", async () => {
    await tool.execute("navigate", { url: "https://example.com" });
    const closed = await tool.execute("close");

    expect(closed.output).toBe("Browser closed successfully");
    expect(fakes.page.close).toHaveBeenCalledTimes(1);
    expect(fakes.browser.close).toHaveBeenCalledTimes(1);

    for (const action of ["navigate", "screenshot", "close"]) {
      const result = await tool.execute(action, { url: "https://example.com" });
      expect(result.success).toBe(false);
      expect(result.metadata?.code).toBe("SESSION_CLOSED");
      expect(result.error).toBe("Browser session is closed. Create a new tool instance to continue.");
    }
    expect(fakes.launcher).toHaveBeenCalledTimes(1);
  });

  it("reports an unknown action with the vocabulary", async () => {
    const result = await tool.execute("hover");
    expect(result.error).toBe(
      "Unknown action: hover. Available actions: navigate, screenshot, click, fill, extract_text, scroll, wait, close",
    );
  });

  it("dispose closes an open browser once", async () => {
    await tool.execute("screenshot");
    await tool.dispose();
    await tool.dispose();
    expect(fakes.browser.close).toHaveBeenCalledTimes(1);
  });

  it("turns launch failures into tool errors", async () => {
    const failing = new BrowserTool({
      launcher: async () => {
        throw new Error("playwright package not installed. Install it: npm install playwright");
      },
    });
    const result = await failing.execute("screenshot");
    expect(result.error).toBe(
      "Browser tool error: playwright package not installed. Install it: npm install playwright",
    );
  });

  it("closes the launched browser when opening a page fails", async () => {
    fakes.browser.newPage.mockRejectedValueOnce(new Error("target crashed"));

    const result = await tool.execute("screenshot");
    expect(result.error).toBe("Browser tool error: target crashed");
    expect(fakes.browser.close).toHaveBeenCalledTimes(1);

    await tool.dispose();
    expect(fakes.browser.close).toHaveBeenCalledTimes(1);
  });

  it("releases a browser whose launch finishes after close", async () => {
    let finishLaunch: (browser: BrowserHandle) => void = () => undefined;
    const launchStarted = new Promise<void>((started) => {
      fakes.launcher.mockImplementationOnce(() => {
        started();
        return new Promise<BrowserHandle>((resolve) => {
          finishLaunch = resolve;
        });
      });
    });

    const pending = tool.execute("navigate", { url: "https://example.com" });
    await launchStarted;
    expect((await tool.execute("close")).output).toBe("Browser closed successfully");
    finishLaunch(fakes.browser);

    expect(await pending).toEqual({
      success: false,
      output: null,
      error: "Browser session is closed. Create a new tool instance to continue.",
      metadata: { code: "SESSION_CLOSED" },
    });
    expect(fakes.page.goto).not.toHaveBeenCalled();
    expect(fakes.page.close).toHaveBeenCalledTimes(1);
    expect(fakes.browser.close).toHaveBeenCalledTimes(1);
  });
});

describe("SimpleBrowserTool", () => {
  it("returns capped body text and closes the browser", async () => {
    const fakes = createFakes();
    fakes.page.textContent.mockResolvedValueOnce("y".repeat(2100));
    const result = await new SimpleBrowserTool({ launcher: fakes.launcher }).execute("content", {
      url: "https://example.com",
    });

    expect(result.output).toBe(`${"y".repeat(2000)}...`);
    expect(fakes.page.textContent).toHaveBeenCalledWith("body");
    expect(fakes.browser.close).toHaveBeenCalledTimes(1);
  });

  it("takes screenshots and reads titles with a fresh browser per call", async () => {
    const fakes = createFakes();
    const tool = new SimpleBrowserTool({ launcher: fakes.launcher });

    const shot = await tool.execute("screenshot", { url: "https://example.com" });
    const title = await tool.execute("title", { url: "https://example.com" });

    expect(shot.output).toBe("Screenshot taken of https://example.com");
    expect(shot.metadata?.artifacts?.screenshot).toBe(PNG_BYTES.toString("base64"));
    expect(title.output).toBe("Page title: Example Domain");
    expect(fakes.launcher).toHaveBeenCalledTimes(2);
    expect(fakes.browser.close).toHaveBeenCalledTimes(2);
  });

  it("closes the browser when navigation fails", async () => {
    const fakes = createFakes();
    fakes.page.goto.mockRejectedValueOnce(new Error("net::ERR_NAME_NOT_RESOLVED"));
    const result = await new SimpleBrowserTool({ launcher: fakes.launcher }).execute("content", {
      url: "https://missing.test",
    });

    expect(result.error).toBe("Browser error: net::ERR_NAME_NOT_RESOLVED");
    expect(fakes.browser.close).toHaveBeenCalledTimes(1);
  });
});
