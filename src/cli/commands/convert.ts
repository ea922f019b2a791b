/**
 * Convert command - Loads config and runs the slide aggregation pipeline
 */

import ora from "ora";
import { z } from "zod";
import { Converter } from "../../converter";
import * as modules from "../../modules";
import { AggregateFailure } from "../../utils";
import { loadCliConfig, printInitHint, reportFailure } from "../shared";
import type { ConversionContext, ProgressEvent } from "../../types";

const ConvertOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  format: z.enum(["pdf", "pptx"]).optional(),
  backend: z.enum(["browser", "layout"]).optional(),
  range: z.string().optional(),
  parallel: z.boolean().optional(),
  workers: z.coerce.number().optional(),
  config: z.string().optional(),
  force: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ConvertOptionsSchema>;

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 });
  const controller = new AbortController();
  const onInterrupt = (): void => {
    spinner.text = "Cancelling...";
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  let exitCode = 0;
  let verbose = false;

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);
    verbose = options.verbose ?? false;

    const { config, logger } = await loadCliConfig(options);

    // Override with CLI options
    if (options.input) config.input.directory = options.input;
    if (options.output) config.output.filename = options.output;
    if (options.format) config.output.format = options.format;
    if (options.backend) config.render.backend = options.backend;
    if (options.parallel) config.render.parallel = true;
    if (options.workers !== undefined) config.render.workers = options.workers;
    if (options.force) config.output.overwrite = true;

    if (config.logging.showProgress) {
      spinner.start();
    }

    const ctx: ConversionContext = {
      config,
      logger,
      range: options.range,
      signal: controller.signal,
      onProgress: (event) => {
        spinner.text = progressText(event);
      },
    };

    spinner.text = "Scanning slides...";
    const result = await new Converter(ctx).run();

    // Clear and stop spinner before displaying the report
    spinner.clear();
    spinner.stop();

    modules.report(result.report, {
      outputPath: result.outputPath,
      verbose,
    });
  } catch (error) {
    exitCode = reportFailure(error, spinner, "Conversion failed");
    printInitHint(error);
    if (error instanceof AggregateFailure) {
      modules.report(error.report, { verbose });
    }
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }

  process.exit(exitCode);
}

function progressText(event: ProgressEvent): string {
  switch (event.type) {
    case "start":
      return `Rendering 0/${event.total}`;
    case "rendered":
    case "failed":
      return `Rendering ${event.completed}/${event.total}`;
    case "merging":
      return `Merging ${event.total} slides...`;
  }
}
