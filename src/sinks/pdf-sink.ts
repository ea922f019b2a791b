/**
 * PDF Sink
 * Concatenates single-page PDF artifacts into one document with pdf-lib
 */

import { readFile, writeFile } from "fs/promises";
import { PDFDocument } from "pdf-lib";
import type { ArtifactHandle, OutputSink } from "../types";

export class PdfSink implements OutputSink {
  readonly kind = "pdf" as const;
  private document: PDFDocument | null = null;
  private pages = 0;

  get pageCount(): number {
    return this.pages;
  }

  async append(artifact: ArtifactHandle): Promise<void> {
    const bytes = await readFile(artifact.path);
    const source = await PDFDocument.load(bytes);
    const indices = source.getPageIndices();
    if (indices.length === 0) {
      throw new Error(`Artifact ${artifact.id} has no pages`);
    }

    const output = await this.output();
    // Single-page contract: extra pages from overflowing content are dropped
    const [page] = await output.copyPages(source, [indices[0]]);
    output.addPage(page);
    this.pages++;
  }

  async finalize(outputPath: string): Promise<void> {
    const output = await this.output();
    if (this.pages === 0) {
      throw new Error("Cannot write a PDF without pages");
    }
    await writeFile(outputPath, await output.save());
  }

  private async output(): Promise<PDFDocument> {
    if (!this.document) {
      this.document = await PDFDocument.create();
    }
    return this.document;
  }
}
