import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { InputError } from "./errors";
import { fileExists } from "./fs";
import { loadTemplate } from "./load-template";

export interface SlideTemplateContext {
  number: number;
  title: string;
  filename: string;
  width: number;
  height: number;
}

export interface ScaffoldOptions {
  count: number;
  width: number;
  height: number;
  template?: string | null; // Custom .hbs path, bundled template when omitted
}

export interface ScaffoldResult {
  created: string[];
  skipped: string[]; // Already present, left untouched
}

/**
 * Create placeholder slides page1.html..pageN.html
 * Existing files are never overwritten
 */
export async function scaffoldSlides(
  directory: string,
  options: ScaffoldOptions,
): Promise<ScaffoldResult> {
  const { count, width, height } = options;
  if (!Number.isInteger(count) || count < 1) {
    throw new InputError(
      "invalid-count",
      `Slide count must be a positive integer, got ${count}`,
    );
  }

  await mkdir(directory, { recursive: true });
  const render = await loadTemplate<SlideTemplateContext>(
    options.template ?? null,
  );

  const result: ScaffoldResult = { created: [], skipped: [] };

  for (let number = 1; number <= count; number++) {
    const filename = `page${number}.html`;
    const file = join(directory, filename);

    if (await fileExists(file)) {
      result.skipped.push(file);
      continue;
    }

    const html = render({
      number,
      title: `Slide ${number}`,
      filename,
      width,
      height,
    });
    await writeFile(file, html, { encoding: "utf-8", flag: "wx" });
    result.created.push(file);
  }

  return result;
}
