import puppeteer, { type Browser } from "puppeteer-core";
import { PDFDocument } from "pdf-lib";
import type { AppConfig } from "./config";
import { ConfigurationError } from "./errors";
import { trimOnce } from "./trim";
import type { Section } from "./types";

/** HTML → printed PDF bytes. */
export interface PageRenderer {
  renderPdf(html: string): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface PageCounter {
  countPages(pdf: Uint8Array): Promise<number>;
}

/**
 * A4 PDFs through a headless Chrome. The browser starts on the first render
 * and is reused until close().
 */
export class PuppeteerPageRenderer implements PageRenderer {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly executablePath: string) {}

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      this.browser = puppeteer.launch({
        executablePath: this.executablePath,
        headless: true,
        args: ["--no-sandbox", "--disable-setuid-sandbox"],
      });
    }
    return this.browser;
  }

  async renderPdf(html: string): Promise<Uint8Array> {
    const browser = await this.getBrowser();
    const page = await browser.newPage();
    try {
      await page.setContent(html, { waitUntil: "networkidle0" });
      return await page.pdf({
        format: "A4",
        printBackground: true,
        margin: { top: "0", right: "0", bottom: "0", left: "0" },
      });
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = null;
    if (pending) {
      await (await pending).close();
    }
  }
}

export function createPageRenderer(config: AppConfig): PageRenderer {
  if (!config.chromePath) {
    throw new ConfigurationError(
      "No Chrome executable configured. Set CHROME_PATH (or PUPPETEER_EXECUTABLE_PATH) to render PDFs."
    );
  }
  return new PuppeteerPageRenderer(config.chromePath);
}

export class PdfLibPageCounter implements PageCounter {
  async countPages(pdf: Uint8Array): Promise<number> {
    const doc = await PDFDocument.load(pdf);
    return doc.getPageCount();
  }
}

export interface FitResult {
  html: string;
  pdf: Uint8Array;
  /** null when the page count could not be read */
  pages: number | null;
  trims: number;
  withinBudget: boolean;
}

/**
 * Render, count pages and trim the least important content until the
 * document fits in `maxPages`. Mutates `sections`. When trimming runs out
 * the last render is returned with `withinBudget: false`.
 */
export async function fitToPageBudget(params: {
  sections: Section[];
  buildHtml: (sections: Section[]) => string;
  renderer: PageRenderer;
  counter: PageCounter;
  maxPages: number;
}): Promise<FitResult> {
  const { sections, buildHtml, renderer, counter, maxPages } = params;
  let trims = 0;

  for (;;) {
    const html = buildHtml(sections);
    const pdf = await renderer.renderPdf(html);
    if (maxPages <= 0) {
      return { html, pdf, pages: await countOrNull(counter, pdf), trims, withinBudget: true };
    }

    const pages = await countOrNull(counter, pdf);
    if (pages === null) {
      return { html, pdf, pages, trims, withinBudget: true };
    }
    if (pages <= maxPages) {
      return { html, pdf, pages, trims, withinBudget: true };
    }
    if (!trimOnce(sections)) {
      console.warn(`Could not fit resume in ${maxPages} page(s); ${pages} page(s) after ${trims} trims`);
      return { html, pdf, pages, trims, withinBudget: false };
    }
    trims++;
  }
}

async function countOrNull(counter: PageCounter, pdf: Uint8Array): Promise<number | null> {
  try {
    return await counter.countPages(pdf);
  } catch (err) {
    console.warn("Page count failed, treating the document as within budget:", err);
    return null;
  }
}
