/**
 * Deck Sink
 * Builds a PPTX with one full-bleed image per slide using pptxgenjs
 */

import { readFile } from "fs/promises";
import PptxGenJS from "pptxgenjs";
import type { ArtifactHandle, OutputSink } from "../types";

// 16:9 deck in inches
export const DECK_WIDTH = 16;
export const DECK_HEIGHT = 9;
const LAYOUT_NAME = "SLIDEFORGE_16x9";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function isPng(bytes: Uint8Array): boolean {
  return (
    bytes.length > PNG_SIGNATURE.length &&
    PNG_SIGNATURE.every((byte, i) => bytes[i] === byte)
  );
}

export class DeckSink implements OutputSink {
  readonly kind = "png" as const;
  private readonly deck: PptxGenJS;
  private slides = 0;

  constructor(title?: string) {
    this.deck = new PptxGenJS();
    this.deck.defineLayout({
      name: LAYOUT_NAME,
      width: DECK_WIDTH,
      height: DECK_HEIGHT,
    });
    this.deck.layout = LAYOUT_NAME;
    if (title) {
      this.deck.title = title;
    }
  }

  get pageCount(): number {
    return this.slides;
  }

  async append(artifact: ArtifactHandle): Promise<void> {
    const bytes = await readFile(artifact.path);
    this.appendImage(bytes);
  }

  /**
   * Add one slide holding the image stretched over the whole page
   */
  appendImage(bytes: Uint8Array): void {
    if (!isPng(bytes)) {
      throw new Error("Artifact is not a PNG image");
    }

    const slide = this.deck.addSlide();
    slide.addImage({
      data: `image/png;base64,${Buffer.from(bytes).toString("base64")}`,
      x: 0,
      y: 0,
      w: DECK_WIDTH,
      h: DECK_HEIGHT,
    });
    this.slides++;
  }

  async finalize(outputPath: string): Promise<void> {
    if (this.slides === 0) {
      throw new Error("Cannot write a deck without slides");
    }
    await this.deck.writeFile({ fileName: outputPath });
  }
}
