/**
 * PDF rasterization with MuPDF
 * mupdf loads a WebAssembly module, so it is imported on first use
 */

export type RasterScale =
  | { dpi: number } // 72 dpi renders one pixel per point
  | { width: number }; // Fit each page to this pixel width

export interface RasterizeOptions {
  scale: RasterScale;
  maxPages?: number;
}

export type PdfRasterizer = (
  pdf: Uint8Array,
  options: RasterizeOptions,
) => Promise<Uint8Array[]>;

/**
 * Render PDF pages to PNG images, in page order
 */
export const rasterizePdf: PdfRasterizer = async (pdf, options) => {
  const mupdf = await import("mupdf");
  const document = mupdf.Document.openDocument(pdf, "application/pdf");

  try {
    const count = Math.min(
      document.countPages(),
      options.maxPages ?? Number.POSITIVE_INFINITY,
    );
    const images: Uint8Array[] = [];

    for (let i = 0; i < count; i++) {
      const page = document.loadPage(i);
      const [x0, , x1] = page.getBounds();
      const factor =
        "dpi" in options.scale
          ? options.scale.dpi / 72
          : options.scale.width / (x1 - x0);

      const pixmap = page.toPixmap(
        mupdf.Matrix.scale(factor, factor),
        mupdf.ColorSpace.DeviceRGB,
        false,
        true,
      );
      images.push(pixmap.asPNG());
      pixmap.destroy();
      page.destroy();
    }

    return images;
  } finally {
    document.destroy();
  }
};
