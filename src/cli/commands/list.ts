/**
 * List command - Print the resolved slide order
 */

import chalk from "chalk";
import ora from "ora";
import * as modules from "../../modules";
import { fileSize } from "../../utils";
import { loadCliConfig, printInitHint, reportFailure } from "../shared";

interface ListOptions {
  input?: string;
  config?: string;
}

export async function listCommand(opts: ListOptions): Promise<void> {
  const spinner = ora({ text: "Scanning slides...", indent: 2 });

  try {
    const { config } = await loadCliConfig(opts);
    const directory = opts.input ?? config.input.directory;

    const slides = await modules.resolveSlides(directory, {
      extension: config.input.extension,
    });

    console.log(`\n  ${chalk.bold.white("Slides")} ${chalk.dim(`· ${directory}`)}`);
    const width = String(slides.length).length;
    for (const slide of slides) {
      const size = await fileSize(slide.path);
      const kb = size === null ? "?" : (size / 1024).toFixed(1);
      console.log(
        `   ${chalk.cyan(String(slide.position + 1).padStart(width))}. ${slide.filename} ${chalk.dim(`(${kb} KB)`)}`,
      );
    }
    console.log(`\n   ${chalk.dim(`${slides.length} slide(s)`)}\n`);
  } catch (error) {
    const exitCode = reportFailure(error, spinner, "Could not list slides");
    printInitHint(error);
    process.exit(exitCode);
  }
}
