/**
 * Format Bridge
 * One-shot conversions between finished PDF and PPTX files
 */

import { copyFile, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  PDFDocument,
  StandardFonts,
  type PDFFont,
  type PDFPage,
} from "pdf-lib";
import { DeckSink } from "../sinks";
import {
  BridgeError,
  errorMessage,
  fileExists,
  rasterizePdf,
  readDeck,
  runProcess,
  wrapWords,
} from "../utils";
import type { PdfRasterizer } from "../utils/rasterize-pdf";
import type { DeckSlideContent } from "../utils/read-deck";
import type { Logger } from "../utils/logger";

export interface BridgeResult {
  method: "rasterize" | "converter" | "fallback";
  pages: number;
}

// ============================================================================
// PDF -> deck
// ============================================================================

export interface PdfToDeckOptions {
  dpi: number;
  rasterize?: PdfRasterizer;
  logger?: Logger;
}

/**
 * Rasterize every PDF page and place one full-bleed image per deck slide
 */
export async function pdfToDeck(
  pdfPath: string,
  outputPath: string,
  options: PdfToDeckOptions,
): Promise<BridgeResult> {
  const rasterize = options.rasterize ?? rasterizePdf;

  let images: Uint8Array[];
  try {
    images = await rasterize(await readFile(pdfPath), {
      scale: { dpi: options.dpi },
    });
  } catch (error) {
    throw new BridgeError(
      `Could not rasterize ${pdfPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (images.length === 0) {
    throw new BridgeError(`No pages found in ${pdfPath}`);
  }

  const sink = new DeckSink(path.parse(pdfPath).name);
  for (const [i, image] of images.entries()) {
    options.logger?.debug(`Placing page ${i + 1}/${images.length}`);
    sink.appendImage(image);
  }
  await sink.finalize(outputPath);

  return { method: "rasterize", pages: images.length };
}

// ============================================================================
// Deck -> PDF
// ============================================================================

export interface DeckToPdfOptions {
  command: string; // Document converter, e.g. "soffice"
  timeout: number;
  width: number; // Fallback page size in points
  height: number;
  logger?: Logger;
}

/**
 * Convert a deck with the external converter, or degrade to image/text pages
 */
export async function deckToPdf(
  pptxPath: string,
  outputPath: string,
  options: DeckToPdfOptions,
): Promise<BridgeResult> {
  const { logger } = options;

  try {
    const pages = await convertWithOffice(pptxPath, outputPath, options);
    return { method: "converter", pages };
  } catch (error) {
    logger?.warn(
      `${options.command} conversion unavailable (${errorMessage(error)}); using degraded image/text extraction`,
    );
  }

  try {
    const pages = await convertByExtraction(pptxPath, outputPath, options);
    return { method: "fallback", pages };
  } catch (error) {
    if (error instanceof BridgeError) throw error;
    throw new BridgeError(
      `Could not convert ${pptxPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

async function convertWithOffice(
  pptxPath: string,
  outputPath: string,
  { command, timeout }: DeckToPdfOptions,
): Promise<number> {
  const outDir = await mkdtemp(path.join(tmpdir(), "slideforge-office-"));

  try {
    await runProcess(
      command,
      ["--headless", "--convert-to", "pdf", "--outdir", outDir, pptxPath],
      { timeout },
    );

    const produced = path.join(outDir, `${path.parse(pptxPath).name}.pdf`);
    if (!(await fileExists(produced))) {
      throw new Error(`${command} did not produce ${path.basename(produced)}`);
    }

    const pages = (await PDFDocument.load(await readFile(produced))).getPageCount();
    await copyFile(produced, outputPath);
    return pages;
  } finally {
    await rm(outDir, { recursive: true, force: true });
  }
}

// ============================================================================
// Degraded fallback
// ============================================================================

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
}

const MARGIN_X = 50;
const BOTTOM_LIMIT = 50;
const WRAP_CHARS = 80;

async function convertByExtraction(
  pptxPath: string,
  outputPath: string,
  options: DeckToPdfOptions,
): Promise<number> {
  const slides = await readDeck(await readFile(pptxPath));
  if (slides.length === 0) {
    throw new BridgeError(`No slides found in ${pptxPath}`);
  }

  const pdf = await PDFDocument.create();
  const fonts: Fonts = {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold),
  };

  for (const slide of slides) {
    options.logger?.debug(`Extracting slide ${slide.number}/${slides.length}`);
    const page = pdf.addPage([options.width, options.height]);
    const drawn = await drawFirstImage(pdf, page, slide, options);
    if (!drawn) {
      drawTextPage(page, slide, fonts);
    }
  }

  await writeFile(outputPath, await pdf.save());
  return slides.length;
}

/**
 * Stretch the first embeddable picture over the page
 */
async function drawFirstImage(
  pdf: PDFDocument,
  page: PDFPage,
  slide: DeckSlideContent,
  { width, height, logger }: DeckToPdfOptions,
): Promise<boolean> {
  for (const image of slide.images) {
    try {
      const embedded =
        image.format === "png"
          ? await pdf.embedPng(image.bytes)
          : await pdf.embedJpg(image.bytes);
      page.drawImage(embedded, { x: 0, y: 0, width, height });
      return true;
    } catch (error) {
      logger?.warn(
        `Could not embed ${image.source} from slide ${slide.number}: ${errorMessage(error)}`,
      );
    }
  }
  return false;
}

/**
 * Heading plus wrapped shape text, top to bottom until the page runs out
 */
function drawTextPage(
  page: PDFPage,
  slide: DeckSlideContent,
  fonts: Fonts,
): void {
  let y = page.getHeight() - 70;

  page.drawText(`Slide ${slide.number}`, {
    x: MARGIN_X,
    y,
    size: 24,
    font: fonts.bold,
  });
  y -= 40;

  for (const text of slide.texts) {
    const lines = wrapWords(text, WRAP_CHARS);
    for (const [i, line] of lines.entries()) {
      page.drawText(toWinAnsi(line), {
        x: MARGIN_X,
        y,
        size: 14,
        font: fonts.regular,
      });
      y -= i === lines.length - 1 ? 30 : 20;
    }
    if (y < BOTTOM_LIMIT) break;
  }
}

// Standard fonts only encode WinAnsi
function toWinAnsi(text: string): string {
  return text.replace(/[^\x20-\x7e\xa0-\xff]/g, "?");
}
