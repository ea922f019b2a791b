/**
 * Layout Engine Renderer
 * Typesets slides with WeasyPrint (no browser); deck output is rasterized with MuPDF
 */

import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { rasterizePdf, runProcess } from "../utils";
import type { PdfRasterizer } from "../utils/rasterize-pdf";
import type {
  ArtifactHandle,
  ArtifactKind,
  RenderCallOptions,
  Renderer,
  SlideInput,
} from "../types";

export interface LayoutEngineRendererOptions {
  command: string; // WeasyPrint executable
  width: number;
  height: number;
  timeout: number;
  rasterize?: PdfRasterizer;
}

export class LayoutEngineRenderer implements Renderer {
  readonly name = "layout";
  private workDir: string | null = null;
  private stylesheet: string | null = null;

  constructor(
    readonly kind: ArtifactKind,
    private options: LayoutEngineRendererOptions,
  ) {}

  async open(): Promise<void> {
    if (this.stylesheet) return;

    const { width, height } = this.options;
    this.workDir = await mkdtemp(join(tmpdir(), "slideforge-layout-"));
    this.stylesheet = join(this.workDir, "page.css");
    await writeFile(
      this.stylesheet,
      `@page { size: ${width}px ${height}px; margin: 0; }\n`,
      "utf-8",
    );
  }

  async close(): Promise<void> {
    const workDir = this.workDir;
    this.workDir = null;
    this.stylesheet = null;
    if (workDir) {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  async render(
    slide: SlideInput,
    target: ArtifactHandle,
    { signal }: RenderCallOptions,
  ): Promise<void> {
    if (!this.stylesheet) {
      throw new Error("Layout engine renderer is not open");
    }

    const { command, timeout, width } = this.options;
    const pdfPath = this.kind === "pdf" ? target.path : `${target.path}.pdf`;

    try {
      await runProcess(
        command,
        [slide.path, pdfPath, "--stylesheet", this.stylesheet],
        { signal, timeout },
      );

      if (this.kind === "png") {
        const rasterize = this.options.rasterize ?? rasterizePdf;
        const [image] = await rasterize(await readFile(pdfPath), {
          scale: { width },
          maxPages: 1,
        });
        if (!image) {
          throw new Error(`${command} produced an empty document`);
        }
        await writeFile(target.path, image);
      }
    } finally {
      if (pdfPath !== target.path) {
        await rm(pdfPath, { force: true });
      }
    }
  }
}
