/**
 * Output Module
 * Resolves the final artifact path before any rendering starts
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import { OUTPUT_EXTENSIONS } from "../sinks";
import { fileExists, withExtension, InputError } from "../utils";
import type { ConversionContext } from "../types";

/**
 * Writes to context:
 * - outputPath: <output.directory>/<filename><format extension>
 */
export async function prepareOutput(ctx: ConversionContext): Promise<string> {
  const { directory, filename, format, overwrite } = ctx.config.output;
  const outputDir = path.resolve(directory);
  const outputPath = path.resolve(
    outputDir,
    withExtension(filename, OUTPUT_EXTENSIONS[format]),
  );

  if (!overwrite && (await fileExists(outputPath))) {
    throw new InputError(
      "output-exists",
      `Output file already exists: ${outputPath} (use --force to overwrite)`,
    );
  }

  await mkdir(path.dirname(outputPath), { recursive: true });

  ctx.outputPath = outputPath;
  return outputPath;
}
