/**
 * Resolver Module
 * Discovers slide documents, orders them naturally and applies range selection
 */

import glob from "fast-glob";
import path from "node:path";
import { stat } from "fs/promises";
import {
  compareSlides,
  extractOrderingKey,
  fileExists,
  parseRange,
  selectionIndices,
  InputError,
} from "../utils";
import type { ConversionContext, SlideInput, SlideSet } from "../types";

export interface ResolveOptions {
  extension: string; // e.g. ".html"
}

/**
 * Discover the slide documents directly inside a directory
 *
 * Order: first integer in the filename ascending, files without digits last,
 * ties by filename. `page2, page10, page1` resolves to `page1, page2, page10`.
 */
export async function resolveSlides(
  directory: string,
  options: ResolveOptions,
): Promise<SlideSet> {
  const inputDir = path.resolve(directory);

  const isDirectory =
    (await fileExists(inputDir)) && (await stat(inputDir)).isDirectory();
  if (!isDirectory) {
    throw new InputError("no-input", `Slides directory not found: ${inputDir}`);
  }

  // Single-level pattern: no recursion into subdirectories
  const files = await glob(`*${escapeExtension(options.extension)}`, {
    cwd: inputDir,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
  });

  if (files.length === 0) {
    throw new InputError(
      "no-input",
      `No ${options.extension} slides found in ${inputDir}`,
    );
  }

  const unordered = files.map((file) => {
    const filename = path.basename(file);
    return { path: file, filename, orderKey: extractOrderingKey(filename) };
  });

  return unordered
    .sort(compareSlides)
    .map((slide, position): SlideInput => ({ ...slide, position }));
}

/**
 * Narrow a slide set to a range spec, preserving order
 * Throws InputError on malformed specs and on empty selections
 */
export function selectRange(slides: SlideSet, rangeSpec: string): SlideSet {
  const selection = parseRange(rangeSpec);
  const indices = selectionIndices(selection, slides.length);

  if (indices.length === 0) {
    throw new InputError(
      "empty-selection",
      `Range "${rangeSpec}" selects no slides (${slides.length} available)`,
    );
  }

  return indices.map((i) => slides[i]);
}

/**
 * Resolves slides for the run and writes them to the context
 *
 * Writes to context:
 * - slides: ordered slide set with the range applied
 */
export async function scan(ctx: ConversionContext): Promise<SlideSet> {
  const { config, range, logger } = ctx;
  const all = await resolveSlides(config.input.directory, {
    extension: config.input.extension,
  });

  const slides = range !== undefined ? selectRange(all, range) : all;
  logger.debug(
    `Resolved ${all.length} slides, ${slides.length} selected: ${slides
      .map((s) => s.filename)
      .join(", ")}`,
  );

  ctx.slides = slides;
  return slides;
}

function escapeExtension(extension: string): string {
  return glob.escapePath(extension);
}
