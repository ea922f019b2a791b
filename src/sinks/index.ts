/**
 * Output sink exports
 */

import { PdfSink } from "./pdf-sink";
import { DeckSink } from "./deck-sink";
import type { OutputFormat, OutputSink } from "../types";

export { PdfSink } from "./pdf-sink";
export { DeckSink, DECK_WIDTH, DECK_HEIGHT, isPng } from "./deck-sink";

export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
  pdf: ".pdf",
  pptx: ".pptx",
};

export function createSink(format: OutputFormat, title?: string): OutputSink {
  return format === "pdf" ? new PdfSink() : new DeckSink(title);
}
