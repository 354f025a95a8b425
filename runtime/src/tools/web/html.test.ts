import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  checkHttpUrl,
  extractImages,
  extractLinks,
  fetchPage,
  htmlToMarkdown,
  loadCheerio,
  pageText,
  sanitizeHref,
} from "./html.js";

const options = { userAgent: "toolbelt-test", timeoutMs: 1000 };

describe("sanitizeHref", () => {
  it("keeps safe schemes and relative links", () => {
    expect(sanitizeHref("https://example.com/a")).toBe("https://example.com/a");
    expect(sanitizeHref("mailto:someone@example.com")).toBe("mailto:someone@example.com");
    expect(sanitizeHref("/docs/intro")).toBe("/docs/intro");
  });

  it("drops script schemes, including obfuscated ones", () => {
    expect(sanitizeHref("javascript:alert(1)")).toBe("");
    expect(sanitizeHref("java\tscript:alert(1)")).toBe("");
    expect(sanitizeHref("data:text/html,hi")).toBe("");
  });
});

describe("checkHttpUrl", () => {
  it("accepts http(s) and rejects the rest", () => {
    expect(checkHttpUrl("https://example.com")).toBeUndefined();
    expect(checkHttpUrl("ftp://example.com")).toBe("Only HTTP(S) URLs are allowed");
    expect(checkHttpUrl("not a url")).toBe("Invalid URL: not a url");
  });
});

describe("htmlToMarkdown", () => {
  it("converts blocks in document order without duplicating nested content", async () => {
    const load = await loadCheerio();
    const $ = load(
      "<html><head><title>Guide</title></head><body>" +
        "<h1>Intro</h1>" +
        '<p>Read the <a href="/docs">docs</a> and <strong>enjoy</strong>.</p>' +
        "<ul><li>one</li><li><p>two</p></li></ul>" +
        "<blockquote><p>quoted</p></blockquote>" +
        "<pre><code>let x = 1;</code></pre>" +
        "<script>tracking()</script>" +
        "</body></html>",
    );

    expect(htmlToMarkdown($)).toBe(
      "# Guide\n\n# Intro\n\nRead the [docs](/docs) and **enjoy**.\n\n- one\n- two\n\n> quoted\n\n```\nlet x = 1;\n```",
    );
  });

  it("renders tables with a header separator", async () => {
    const load = await loadCheerio();
    const $ = load("<table><tr><th>Name</th><th>Qty</th></tr><tr><td>apple</td><td>3</td></tr></table>");
    expect(htmlToMarkdown($)).toBe("| Name | Qty |\n| --- | --- |\n| apple | 3 |");
  });
});

describe("page extraction", () => {
  it("collects text, absolute links and images", async () => {
    const load = await loadCheerio();
    const html =
      "<body><p>Hello   <b>there</b></p>\n<script>ignored()</script>\n" +
      '<a href="/a">First</a>\n<a href="javascript:void(0)">Bad</a>\n<a href="https://other.test/">  </a>\n' +
      '<img src="/logo.png" alt="Logo"><img src="data:image/png;base64,AAAA"></body>';

    expect(extractLinks(load(html), "https://site.test/page")).toEqual([
      { text: "First", href: "https://site.test/a" },
      { text: "No text", href: "https://other.test/" },
    ]);
    expect(extractImages(load(html), "https://site.test/page")).toEqual([
      { alt: "Logo", src: "https://site.test/logo.png" },
    ]);
    expect(pageText(load(html))).toBe("Hello there First Bad");
  });
});

describe("fetchPage", () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("follows relative redirects", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response(null, { status: 302, headers: { location: "/final" } }))
      .mockResolvedValueOnce(new Response("<p>done</p>", { status: 200, headers: { "content-type": "text/html" } }));

    const page = await fetchPage("https://example.com/start", options);

    expect(page).toEqual({
      ok: true,
      html: "<p>done</p>",
      contentType: "text/html",
      finalUrl: "https://example.com/final",
    });
    expect(mockFetch.mock.calls[1][0]).toBe("https://example.com/final");
  });

  it("stops after too many redirects", async () => {
    mockFetch.mockImplementation(async () => new Response(null, { status: 301, headers: { location: "/loop" } }));
    const page = await fetchPage("https://example.com/", options);
    expect(page).toEqual({ ok: false, error: "Too many redirects (max: 5)" });
    expect(mockFetch).toHaveBeenCalledTimes(6);
  });

  it("caps the body size", async () => {
    mockFetch.mockResolvedValueOnce(new Response("abcdefghij"));
    const page = await fetchPage("https://example.com/", { ...options, maxResponseBytes: 4 });
    expect(page.ok && page.html).toBe("abcd");
  });

  it("reports HTTP errors, timeouts and connection failures", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response("missing", { status: 404, statusText: "Not Found" }))
      .mockRejectedValueOnce(Object.assign(new Error("timed out"), { name: "TimeoutError" }))
      .mockRejectedValueOnce(new Error("ECONNREFUSED"));

    expect(await fetchPage("https://example.com/", options)).toEqual({ ok: false, error: "HTTP 404 Not Found" });
    expect(await fetchPage("https://example.com/", options)).toEqual({ ok: false, error: "Request timed out" });
    expect(await fetchPage("https://example.com/", options)).toEqual({
      ok: false,
      error: "Connection failed: ECONNREFUSED",
    });
  });
});
