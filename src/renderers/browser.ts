/**
 * Browser Renderer
 * Captures slides with a headless Chromium through Playwright
 */

import { pathToFileURL } from "node:url";
import { chromium, type Browser } from "playwright-core";
import type {
  ArtifactHandle,
  ArtifactKind,
  RenderCallOptions,
  Renderer,
  SlideInput,
} from "../types";

export interface BrowserRendererOptions {
  width: number;
  height: number;
  timeout: number; // Navigation and load-state timeout
  settleDelay: number; // Extra wait for scripted layout after fonts are ready
}

/**
 * Pins the document to the slide frame so overflowing content is clipped
 */
function frameStyles(width: number, height: number): string {
  return `
    html, body {
      width: ${width}px !important;
      height: ${height}px !important;
      max-height: ${height}px !important;
      overflow: hidden !important;
      margin: 0 !important;
    }
    .slide {
      height: ${height}px !important;
      max-height: ${height}px !important;
      overflow: hidden !important;
    }
  `;
}

export class BrowserRenderer implements Renderer {
  readonly name = "browser";
  private browser: Browser | null = null;

  constructor(
    readonly kind: ArtifactKind,
    private options: BrowserRendererOptions,
  ) {}

  async open(): Promise<void> {
    if (this.browser?.isConnected()) return;

    this.browser = await chromium.launch({
      headless: true,
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        "--disable-gpu",
      ],
    });
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close();
    }
  }

  async render(
    slide: SlideInput,
    target: ArtifactHandle,
    { signal }: RenderCallOptions,
  ): Promise<void> {
    if (!this.browser) {
      throw new Error("Browser renderer is not open");
    }

    const { width, height, timeout, settleDelay } = this.options;

    // Fresh context per slide: no cookies, storage or layout shared between calls
    const context = await this.browser.newContext({
      viewport: { width, height },
      deviceScaleFactor: 1,
    });

    let closing: Promise<void> | undefined;
    const onAbort = () => {
      closing ??= context.close();
    };
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      const page = await context.newPage();
      page.setDefaultTimeout(timeout);

      await page.goto(pathToFileURL(slide.path).href, {
        waitUntil: "networkidle",
        timeout,
      });
      await page.evaluate("document.fonts.ready.then(() => true)");
      await page.addStyleTag({ content: frameStyles(width, height) });
      if (settleDelay > 0) {
        await page.waitForTimeout(settleDelay);
      }

      if (this.kind === "pdf") {
        await page.emulateMedia({ media: "screen" });
        await page.pdf({
          path: target.path,
          width: `${width}px`,
          height: `${height}px`,
          printBackground: true,
          pageRanges: "1",
        });
      } else {
        await page.screenshot({
          path: target.path,
          type: "png",
          clip: { x: 0, y: 0, width, height },
        });
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
      await (closing ?? context.close());
    }
  }
}
